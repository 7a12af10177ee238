import { Buffer } from "node:buffer";
import { createHash } from "node:crypto";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";
import type { DesignRequest, RenderedDesign, TextLayout } from "@shirtsmith/contracts";
import type { Logger } from "../logger";
import { layoutText, type CanvasSize, type FontBounds } from "./layout";
import { resolvePalette, toCssColor, treatmentFor, type Palette, type StyleTreatment } from "./tables";

export type SvgEncoder = (svg: string) => Promise<Buffer>;

export interface RendererOptions {
  canvas: CanvasSize;
  fontSize: FontBounds;
  fontFamily?: string;
  outputDir?: string;
  logger: Logger;
  encode?: SvgEncoder;
}

export interface Renderer {
  render(request: DesignRequest): Promise<RenderedDesign>;
}

export class RenderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RenderError";
  }
}

export const encodePng: SvgEncoder = (svg) =>
  sharp(Buffer.from(svg, "utf-8"))
    .ensureAlpha()
    .toColourspace("srgb")
    .png({ compressionLevel: 9 })
    .toBuffer();

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function fontFamilyAttribute(stack: string[]): string {
  return stack.map((family) => (/\s/.test(family) ? `'${family}'` : family)).join(", ");
}

function round(value: number): number {
  return Number(value.toFixed(2));
}

export function buildSvg(
  layout: TextLayout,
  canvas: CanvasSize,
  treatment: StyleTreatment,
  palette: Palette,
  fontStack: string[]
): string {
  const centreX = canvas.width / 2;
  const top = (canvas.height - layout.blockHeight) / 2;
  const outline = round(layout.fontSize * treatment.outlineEm * 2);
  const spacing = round(layout.fontSize * treatment.letterSpacingEm);

  const lineYs = layout.lines.map((_, index) => round(top + (index + 0.5) * layout.lineHeight));
  const elements: string[] = [];

  const { shadow } = treatment;
  if (shadow) {
    const offset = round(layout.fontSize * shadow.offsetEm);
    layout.lines.forEach((line, index) => {
      elements.push(
        `<text x="${round(centreX + offset)}" y="${round(lineYs[index] + offset)}" fill="${toCssColor(palette.outline)}" fill-opacity="${shadow.opacity}">${escapeXml(line)}</text>`
      );
    });
  }

  layout.lines.forEach((line, index) => {
    elements.push(
      `<text x="${round(centreX)}" y="${lineYs[index]}" fill="${toCssColor(palette.fill)}" stroke="${toCssColor(palette.outline)}" stroke-width="${outline}" stroke-linejoin="round" paint-order="stroke">${escapeXml(line)}</text>`
    );
  });

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${canvas.width}" height="${canvas.height}" viewBox="0 0 ${canvas.width} ${canvas.height}">`,
    `<g font-family="${escapeXml(fontFamilyAttribute(fontStack))}" font-size="${layout.fontSize}" font-weight="${treatment.fontWeight}" font-style="${treatment.fontStyle}" letter-spacing="${spacing}" text-anchor="middle" dominant-baseline="central">`,
    ...elements,
    "</g>",
    "</svg>"
  ].join("\n");
}

export class DesignRenderer implements Renderer {
  private readonly encode: SvgEncoder;
  private readonly logger: Logger;

  constructor(private readonly options: RendererOptions) {
    this.encode = options.encode ?? encodePng;
    this.logger = options.logger.child({ component: "renderer" });
  }

  async render(request: DesignRequest): Promise<RenderedDesign> {
    const treatment = treatmentFor(request.style);
    const palette = resolvePalette(request.colorPreference);
    const text = treatment.uppercase ? request.phrase.toUpperCase() : request.phrase;
    const { canvas } = this.options;

    const layout = layoutText(text, {
      canvas,
      fontSize: this.options.fontSize,
      letterSpacingEm: treatment.letterSpacingEm
    });

    const fontStack = this.options.fontFamily
      ? [this.options.fontFamily, ...treatment.fontStack]
      : treatment.fontStack;
    const svg = buildSvg(layout, canvas, treatment, palette, fontStack);

    let imageBytes: Buffer;
    try {
      imageBytes = await this.encode(svg);
    } catch (error) {
      throw new RenderError("Unable to encode the design image.", { cause: error });
    }

    this.logger.debug("render.completed", {
      style: request.style,
      fontSize: layout.fontSize,
      lines: layout.lines.length,
      bytes: imageBytes.length
    });

    const localReference = await this.keepCopy(svg, imageBytes);

    return {
      imageBytes,
      format: "png",
      width: canvas.width,
      height: canvas.height,
      layout,
      ...(localReference ? { localReference } : {})
    };
  }

  private async keepCopy(svg: string, imageBytes: Buffer): Promise<string | undefined> {
    const { outputDir } = this.options;
    if (!outputDir) {
      return undefined;
    }

    const digest = createHash("sha256").update(svg).digest("hex").slice(0, 16);
    const filePath = path.join(outputDir, `design-${digest}.png`);

    try {
      await mkdir(outputDir, { recursive: true });
      await writeFile(filePath, imageBytes);
      return filePath;
    } catch (error) {
      this.logger.warn("render.copy_failed", { filePath, error });
      return undefined;
    }
  }
}
