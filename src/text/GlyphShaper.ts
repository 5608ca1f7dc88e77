/**
 * Glyph Shaper
 *
 * Expands text spans into positioned glyph records using font atlas metrics.
 * Text is laid out on a single baseline per span; code points missing from
 * the font leave a gap of half the font size.
 */

import { GlyphFlags, type GlyphRecord } from "./glyphRecord";
import { parseTtfMetrics, ttfAscent, ttfDescent, type TtfMetrics } from "./ttfMetrics";
import type { FontAtlasMetadata, FontBlob, FontService, TextSpan } from "./types";

/** A glyph record plus the source it was shaped from */
export interface ShapedGlyph extends GlyphRecord {
  codepoint: number;
  /** Index of the span that produced the glyph */
  span: number;
}

export interface ShapeResult {
  glyphs: ShapedGlyph[];
  /** Spans that produced no glyphs because their font could not be resolved */
  skippedSpans: number[];
}

/** Advance used for code points the font has no glyph for, as a fraction of font size */
const MISSING_GLYPH_ADVANCE = 0.5;

export class GlyphShaper {
  private readonly fonts: FontService | undefined;
  private readonly kerningMaps = new WeakMap<FontAtlasMetadata, Map<string, number>>();
  private readonly ttfMetrics = new WeakMap<Uint8Array, TtfMetrics | null>();

  constructor(fonts?: FontService) {
    this.fonts = fonts;
  }

  /**
   * Resolve the atlas for a span's font id.
   *
   * @param fontId - -1 for the default font, otherwise a registered blob id
   * @param blobs - Font blobs registered with the scene, indexed by id
   */
  resolveFont(fontId: number, blobs: readonly FontBlob[]): FontAtlasMetadata | undefined {
    if (!this.fonts) return undefined;
    if (fontId < 0) return this.fonts.getDefaultFont();
    const blob = blobs[fontId];
    return blob ? this.fonts.getFont(blob.name) : undefined;
  }

  /**
   * Shape every span, in order.
   *
   * Spans whose font cannot be resolved contribute no glyphs; each distinct
   * missing font is logged once per call.
   */
  shape(spans: readonly TextSpan[], blobs: readonly FontBlob[]): ShapeResult {
    const glyphs: ShapedGlyph[] = [];
    const skippedSpans: number[] = [];
    const warned = new Set<number>();

    spans.forEach((span, spanIndex) => {
      const font = this.resolveFont(span.fontId, blobs);
      if (!font) {
        skippedSpans.push(spanIndex);
        if (!warned.has(span.fontId)) {
          warned.add(span.fontId);
          console.warn(
            `[GlyphShaper] No font for id ${span.fontId}${this.describeBlob(span.fontId, blobs)}, text skipped`
          );
        }
        return;
      }

      const scale = span.fontSize / font.size;
      const flags = span.fontId >= 0 ? GlyphFlags.CustomAtlas : 0;
      let pen = span.x;
      let prev: number | undefined;

      for (const char of span.text) {
        const codepoint = char.codePointAt(0);
        if (codepoint === undefined) continue;

        if (prev !== undefined) {
          pen += this.getKerning(font, prev, codepoint) * scale;
        }
        prev = codepoint;

        const glyph = font.glyphs[codepoint];
        if (!glyph) {
          pen += span.fontSize * MISSING_GLYPH_ADVANCE;
          continue;
        }

        glyphs.push({
          x: pen + glyph.xOffset * scale,
          y: span.y - glyph.yOffset * scale,
          width: glyph.width * scale,
          height: glyph.height * scale,
          glyphIndex: glyph.index,
          layer: span.layer,
          flags,
          color: span.color,
          codepoint,
          span: spanIndex,
        });

        pen += glyph.xAdvance * scale;
      }
    });

    return { glyphs, skippedSpans };
  }

  /**
   * Measure the advance width of a single line of text.
   *
   * @returns Width in scene units, 0 when the font cannot be resolved
   */
  measureTextWidth(
    text: string,
    fontSize: number,
    fontId: number,
    blobs: readonly FontBlob[]
  ): number {
    const font = this.resolveFont(fontId, blobs);
    if (!font) return 0;

    const scale = fontSize / font.size;
    let width = 0;
    let prev: number | undefined;

    for (const char of text) {
      const codepoint = char.codePointAt(0);
      if (codepoint === undefined) continue;

      if (prev !== undefined) {
        width += this.getKerning(font, prev, codepoint) * scale;
      }
      prev = codepoint;

      const glyph = font.glyphs[codepoint];
      width += glyph ? glyph.xAdvance * scale : fontSize * MISSING_GLYPH_ADVANCE;
    }

    return width;
  }

  /**
   * Distance from the baseline to the top of the line.
   *
   * Prefers the blob's own `hhea` metrics, then the atlas baseline, then
   * 0.8 × fontSize.
   */
  fontAscent(fontSize: number, fontId: number, blobs: readonly FontBlob[]): number {
    const ttf = this.blobMetrics(fontId, blobs);
    if (ttf) return ttfAscent(ttf, fontSize);

    const font = this.resolveFont(fontId, blobs);
    if (font) return font.baseline * (fontSize / font.size);
    return fontSize * 0.8;
  }

  /**
   * Distance from the baseline to the bottom of the line (positive).
   */
  fontDescent(fontSize: number, fontId: number, blobs: readonly FontBlob[]): number {
    const ttf = this.blobMetrics(fontId, blobs);
    if (ttf) return ttfDescent(ttf, fontSize);

    const font = this.resolveFont(fontId, blobs);
    if (font) return (font.size - font.baseline) * (fontSize / font.size);
    return fontSize * 0.2;
  }

  /**
   * Get kerning between two code points (pixels, at base font size).
   */
  getKerning(font: FontAtlasMetadata, first: number, second: number): number {
    if (!font.kerning || font.kerning.length === 0) return 0;

    let map = this.kerningMaps.get(font);
    if (!map) {
      map = new Map();
      for (const k of font.kerning) {
        map.set(`${k.first},${k.second}`, k.amount);
      }
      this.kerningMaps.set(font, map);
    }
    return map.get(`${first},${second}`) ?? 0;
  }

  private blobMetrics(fontId: number, blobs: readonly FontBlob[]): TtfMetrics | undefined {
    if (fontId < 0) return undefined;
    const blob = blobs[fontId];
    if (!blob) return undefined;

    let metrics = this.ttfMetrics.get(blob.data);
    if (metrics === undefined) {
      metrics = parseTtfMetrics(blob.data) ?? null;
      this.ttfMetrics.set(blob.data, metrics);
    }
    return metrics ?? undefined;
  }

  private describeBlob(fontId: number, blobs: readonly FontBlob[]): string {
    if (!this.fonts) return " (no font service)";
    const blob = fontId >= 0 ? blobs[fontId] : undefined;
    return blob ? ` ("${blob.name}")` : "";
  }
}
