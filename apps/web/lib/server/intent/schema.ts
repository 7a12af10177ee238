import { z } from "zod";
import {
  DESIGN_STYLES,
  MAX_PHRASE_LENGTH,
  PLACEHOLDER_PHRASE,
  type DesignRequest,
  type DesignStyle
} from "@shirtsmith/contracts";

export function isDesignStyle(value: string): value is DesignStyle {
  return DESIGN_STYLES.some((style) => style === value);
}

export function normaliseStyle(value: string | null | undefined, fallback: DesignStyle): DesignStyle {
  const candidate = value?.trim().toLowerCase() ?? "";
  return isDesignStyle(candidate) ? candidate : fallback;
}

export function normalisePhrase(value: string): string {
  const collapsed = value.replace(/\s+/g, " ").trim();
  if (!collapsed) {
    return PLACEHOLDER_PHRASE;
  }
  return collapsed.slice(0, MAX_PHRASE_LENGTH).trim();
}

function optionalText(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export const ExtractedIntentSchema = z.object({
  phrase: z.string(),
  style: z.string().nullable().optional(),
  wants_image: z.boolean().nullable().optional(),
  image_description: z.string().nullable().optional(),
  color_preference: z.string().nullable().optional()
});

export type ExtractedIntent = z.infer<typeof ExtractedIntentSchema>;

export function toDesignRequest(extracted: ExtractedIntent, defaultStyle: DesignStyle): DesignRequest {
  return {
    phrase: normalisePhrase(extracted.phrase),
    style: normaliseStyle(extracted.style, defaultStyle),
    wantsImage: extracted.wants_image === true,
    imageDescription: optionalText(extracted.image_description),
    colorPreference: optionalText(extracted.color_preference)
  };
}

export const INTENT_JSON_SCHEMA = {
  type: "object",
  additionalProperties: false,
  required: ["phrase", "style", "wants_image", "image_description", "color_preference"],
  properties: {
    phrase: {
      type: "string",
      description: "The exact text the user wants printed, without surrounding quotes."
    },
    style: {
      type: "string",
      enum: [...DESIGN_STYLES],
      description: "Lettering style. Use modern when nothing is implied."
    },
    wants_image: {
      type: "boolean",
      description: "True when the user asked for artwork alongside the text."
    },
    image_description: {
      type: ["string", "null"],
      description: "What the artwork should show, if requested."
    },
    color_preference: {
      type: ["string", "null"],
      description: "Colour the user mentioned for the lettering or shirt."
    }
  }
} as const;
