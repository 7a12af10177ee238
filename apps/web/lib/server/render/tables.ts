import type { DesignStyle } from "@shirtsmith/contracts";

export interface StyleTreatment {
  fontStack: string[];
  fontWeight: number;
  fontStyle: "normal" | "italic";
  outlineEm: number;
  letterSpacingEm: number;
  shadow: { offsetEm: number; opacity: number } | null;
  uppercase: boolean;
}

export type Rgb = readonly [number, number, number];

export interface Palette {
  fill: Rgb;
  outline: Rgb;
}

const SANS = ["DejaVu Sans", "Liberation Sans", "Helvetica", "Arial", "sans-serif"];
const SERIF = ["DejaVu Serif", "Liberation Serif", "Georgia", "serif"];
const SCRIPT = ["Brush Script MT", "URW Chancery L", "cursive", "serif"];

export const STYLE_TREATMENTS: Record<DesignStyle, StyleTreatment> = {
  modern: {
    fontStack: SANS,
    fontWeight: 700,
    fontStyle: "normal",
    outlineEm: 0.03,
    letterSpacingEm: 0,
    shadow: null,
    uppercase: false
  },
  retro: {
    fontStack: SERIF,
    fontWeight: 700,
    fontStyle: "normal",
    outlineEm: 0.04,
    letterSpacingEm: 0.05,
    shadow: { offsetEm: 0.06, opacity: 0.55 },
    uppercase: true
  },
  bold: {
    fontStack: SANS,
    fontWeight: 900,
    fontStyle: "normal",
    outlineEm: 0.06,
    letterSpacingEm: 0.02,
    shadow: null,
    uppercase: true
  },
  script: {
    fontStack: SCRIPT,
    fontWeight: 400,
    fontStyle: "italic",
    outlineEm: 0.02,
    letterSpacingEm: 0,
    shadow: null,
    uppercase: false
  },
  graffiti: {
    fontStack: ["Impact", ...SANS],
    fontWeight: 900,
    fontStyle: "italic",
    outlineEm: 0.08,
    letterSpacingEm: 0.03,
    shadow: { offsetEm: 0.08, opacity: 0.8 },
    uppercase: true
  },
  vintage: {
    fontStack: SERIF,
    fontWeight: 400,
    fontStyle: "normal",
    outlineEm: 0.03,
    letterSpacingEm: 0.08,
    shadow: { offsetEm: 0.04, opacity: 0.4 },
    uppercase: true
  },
  minimal: {
    fontStack: SANS,
    fontWeight: 300,
    fontStyle: "normal",
    outlineEm: 0.015,
    letterSpacingEm: 0.1,
    shadow: null,
    uppercase: false
  }
};

export const DEFAULT_TREATMENT: StyleTreatment = STYLE_TREATMENTS.modern;

export function treatmentFor(style: string): StyleTreatment {
  const key = style.trim().toLowerCase();
  for (const [name, treatment] of Object.entries(STYLE_TREATMENTS)) {
    if (name === key) {
      return treatment;
    }
  }
  return DEFAULT_TREATMENT;
}

export const COLOR_TABLE: Record<string, Rgb> = {
  white: [255, 255, 255],
  black: [0, 0, 0],
  red: [220, 20, 60],
  "dark red": [139, 0, 0],
  orange: [255, 140, 0],
  yellow: [255, 215, 0],
  gold: [212, 175, 55],
  green: [34, 139, 34],
  "lime green": [50, 205, 50],
  teal: [0, 128, 128],
  blue: [30, 90, 220],
  "light blue": [135, 206, 250],
  navy: [0, 0, 128],
  purple: [128, 0, 128],
  pink: [255, 105, 180],
  brown: [139, 69, 19],
  grey: [128, 128, 128],
  gray: [128, 128, 128],
  silver: [192, 192, 192]
};

export const DEFAULT_PALETTE: Palette = {
  fill: [255, 255, 255],
  outline: [0, 0, 0]
};

const HEX_COLOR = /#([0-9a-f]{6})\b/i;

function contrastingOutline(fill: Rgb): Rgb {
  const brightness = (fill[0] + fill[1] + fill[2]) / 3;
  return brightness > 128 ? [0, 0, 0] : [255, 255, 255];
}

function lookupColor(preference: string): Rgb | null {
  const hex = HEX_COLOR.exec(preference);
  if (hex?.[1]) {
    const value = hex[1];
    return [
      Number.parseInt(value.slice(0, 2), 16),
      Number.parseInt(value.slice(2, 4), 16),
      Number.parseInt(value.slice(4, 6), 16)
    ];
  }

  const lowered = preference.toLowerCase();
  const names = Object.keys(COLOR_TABLE).sort((a, b) => b.length - a.length);
  for (const name of names) {
    const rgb = COLOR_TABLE[name];
    if (rgb && new RegExp(`\\b${name}\\b`).test(lowered)) {
      return rgb;
    }
  }
  return null;
}

export function resolvePalette(preference: string | null | undefined): Palette {
  if (!preference) {
    return DEFAULT_PALETTE;
  }

  const fill = lookupColor(preference);
  if (!fill) {
    return DEFAULT_PALETTE;
  }

  return { fill, outline: contrastingOutline(fill) };
}

export function toCssColor(rgb: Rgb): string {
  return `rgb(${rgb[0]},${rgb[1]},${rgb[2]})`;
}
