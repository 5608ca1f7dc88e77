/**
 * Built-in Monospace Font
 *
 * Generates atlas metadata for a fixed-pitch font so text can be shaped
 * without loading any font files. Glyph slots are packed row by row the way
 * an atlas generator would lay them out; the texture itself is produced by
 * the renderer.
 */

import type { FontAtlasMetadata, GlyphMetrics } from "./types";

/** Characters to include in the atlas */
const DEFAULT_CHARSET =
  " !\"#$%&'()*+,-./0123456789:;<=>?@ABCDEFGHIJKLMNOPQRSTUVWXYZ[\\]^_`abcdefghijklmnopqrstuvwxyz{|}~";

export interface MonospaceFontOptions {
  /** Font name (default: "monospace") */
  name?: string;
  /** Base font size in pixels (default: 32) */
  fontSize?: number;
  /** Advance as a fraction of the font size (default: 0.6) */
  advanceRatio?: number;
  /** Ascent as a fraction of the font size (default: 0.8) */
  ascentRatio?: number;
  /** Atlas texture size (default: 512) */
  atlasSize?: number;
  /** Characters to include (default: ASCII printable) */
  charset?: string;
  /** Padding between glyphs (default: 2) */
  padding?: number;
}

/**
 * Generate metadata for a fixed-pitch font atlas.
 *
 * @param options - Font generation options
 * @returns Atlas metadata with one glyph per charset character
 */
export function createMonospaceFont(
  options: MonospaceFontOptions = {}
): FontAtlasMetadata {
  const {
    name = "monospace",
    fontSize = 32,
    advanceRatio = 0.6,
    ascentRatio = 0.8,
    atlasSize = 512,
    charset = DEFAULT_CHARSET,
    padding = 2,
  } = options;

  const advance = fontSize * advanceRatio;
  const ascent = fontSize * ascentRatio;
  const width = Math.ceil(advance);
  const height = fontSize;

  const glyphs: Record<number, GlyphMetrics> = {};
  let cursorX = padding;
  let cursorY = padding;
  let index = 0;

  for (const char of charset) {
    const codepoint = char.codePointAt(0);
    if (codepoint === undefined) continue;

    // Wrap to next row
    if (cursorX + width + padding > atlasSize) {
      cursorX = padding;
      cursorY += height + padding;
    }

    if (cursorY + height + padding > atlasSize) {
      console.warn(`[createMonospaceFont] Atlas full, stopping at character '${char}'`);
      break;
    }

    glyphs[codepoint] = {
      id: codepoint,
      index,
      x: cursorX,
      y: cursorY,
      width,
      height,
      xOffset: 0,
      yOffset: ascent,
      xAdvance: advance,
    };

    index++;
    cursorX += width + padding;
  }

  return {
    name,
    size: fontSize,
    atlasWidth: atlasSize,
    atlasHeight: atlasSize,
    sdfSpread: 4,
    lineHeight: fontSize * 1.2,
    baseline: ascent,
    glyphs,
  };
}
