import type { TextLayout } from "@shirtsmith/contracts";

export const GLYPH_WIDTH_EM = 0.6;
export const LINE_HEIGHT_EM = 1.2;
export const SAFE_AREA_RATIO = 0.9;
export const REFERENCE_LENGTH = 10;
export const ABSOLUTE_MIN_FONT_SIZE = 8;

export interface CanvasSize {
  width: number;
  height: number;
}

export interface FontBounds {
  min: number;
  max: number;
}

export interface LayoutOptions {
  canvas: CanvasSize;
  fontSize: FontBounds;
  letterSpacingEm: number;
}

export function fontSizeForLength(length: number, bounds: FontBounds): number {
  const scaled = Math.round((bounds.max * REFERENCE_LENGTH) / Math.max(length, REFERENCE_LENGTH));
  return Math.min(bounds.max, Math.max(bounds.min, scaled));
}

export function measureLine(text: string, fontSize: number, letterSpacingEm: number): number {
  return text.length * fontSize * (GLYPH_WIDTH_EM + letterSpacingEm);
}

function maxCharsPerLine(usableWidth: number, fontSize: number, letterSpacingEm: number): number {
  return Math.max(1, Math.floor(usableWidth / (fontSize * (GLYPH_WIDTH_EM + letterSpacingEm))));
}

export function wrapWords(text: string, maxChars: number): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let current = "";

  for (const word of words) {
    const pieces: string[] = [];
    for (let start = 0; start < word.length; start += maxChars) {
      pieces.push(word.slice(start, start + maxChars));
    }

    for (const piece of pieces) {
      const candidate = current ? `${current} ${piece}` : piece;
      if (candidate.length <= maxChars) {
        current = candidate;
        continue;
      }
      if (current) {
        lines.push(current);
      }
      current = piece;
    }
  }

  if (current) {
    lines.push(current);
  }

  return lines.length > 0 ? lines : [""];
}

function describe(lines: string[], fontSize: number, letterSpacingEm: number): TextLayout {
  const lineHeight = fontSize * LINE_HEIGHT_EM;
  return {
    fontSize,
    lines,
    lineHeight,
    blockWidth: Math.max(...lines.map((line) => measureLine(line, fontSize, letterSpacingEm))),
    blockHeight: lines.length * lineHeight
  };
}

/**
 * Sizes the phrase inversely to its length, wraps it once it no longer fits on one line,
 * and only shrinks below the configured minimum when the wrapped block is still too tall.
 */
export function layoutText(text: string, options: LayoutOptions): TextLayout {
  const usableWidth = Math.floor(options.canvas.width * SAFE_AREA_RATIO);
  const usableHeight = Math.floor(options.canvas.height * SAFE_AREA_RATIO);
  const { letterSpacingEm } = options;

  let fontSize = fontSizeForLength(text.length, options.fontSize);
  let lines =
    measureLine(text, fontSize, letterSpacingEm) <= usableWidth
      ? [text]
      : wrapWords(text, maxCharsPerLine(usableWidth, fontSize, letterSpacingEm));
  let layout = describe(lines, fontSize, letterSpacingEm);

  while (layout.blockHeight > usableHeight && fontSize > ABSOLUTE_MIN_FONT_SIZE) {
    fontSize = Math.max(ABSOLUTE_MIN_FONT_SIZE, Math.floor(fontSize * 0.9));
    lines = wrapWords(text, maxCharsPerLine(usableWidth, fontSize, letterSpacingEm));
    layout = describe(lines, fontSize, letterSpacingEm);
  }

  return layout;
}
