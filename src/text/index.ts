/**
 * Text shaping and font metrics
 */

export * from "./types";
export { GlyphShaper, type ShapedGlyph, type ShapeResult } from "./GlyphShaper";
export { FontRegistry } from "./FontRegistry";
export { createMonospaceFont, type MonospaceFontOptions } from "./createMonospaceFont";
export {
  GlyphFlags,
  GLYPH_RECORD_BYTES,
  GLYPH_RECORD_WORDS,
  toHalf,
  fromHalf,
  writeGlyphRecord,
  readGlyphRecord,
  type GlyphRecord,
} from "./glyphRecord";
export { parseTtfMetrics, ttfAscent, ttfDescent, type TtfMetrics } from "./ttfMetrics";
export { buildReadingOrder, findNearestGlyph, applySelection, selectedText } from "./selection";
