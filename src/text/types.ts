/**
 * Text Types
 *
 * Font metrics consumed by the glyph shaper, and the text span records a
 * scene stores until glyphs are shaped.
 */

/** Metrics for a single glyph in the font atlas */
export interface GlyphMetrics {
  /** Unicode code point */
  id: number;
  /** Slot of the glyph in the atlas, written to the glyph record */
  index: number;
  /** Position in atlas texture (pixels) */
  x: number;
  y: number;
  /** Size in atlas texture (pixels) */
  width: number;
  height: number;
  /** Offset from the pen to the glyph's left edge (pixels, at base font size) */
  xOffset: number;
  /** Distance from the baseline up to the glyph's top edge (pixels, at base font size) */
  yOffset: number;
  /** Horizontal advance after rendering this glyph (pixels, at base font size) */
  xAdvance: number;
}

/** Kerning pair for precise spacing */
export interface KerningPair {
  /** First code point */
  first: number;
  /** Second code point */
  second: number;
  /** Kerning amount (pixels, at base font size) */
  amount: number;
}

/** Complete font atlas metadata */
export interface FontAtlasMetadata {
  /** Font family name */
  name: string;
  /** Base font size the atlas was generated at */
  size: number;
  /** Atlas texture dimensions */
  atlasWidth: number;
  atlasHeight: number;
  /** SDF spread (distance field radius in pixels) */
  sdfSpread: number;
  /** Line height (pixels, at base font size) */
  lineHeight: number;
  /** Baseline offset from the line top, i.e. the ascent (pixels, at base font size) */
  baseline: number;
  /** Glyph metrics indexed by code point */
  glyphs: Record<number, GlyphMetrics>;
  /** Optional kerning pairs */
  kerning?: KerningPair[];
}

/**
 * Font lookup used while shaping.
 *
 * Registered font blobs are resolved by name; spans without a font id use the
 * default font.
 */
export interface FontService {
  getFont(name: string): FontAtlasMetadata | undefined;
  getDefaultFont(): FontAtlasMetadata;
}

/** A run of text on one baseline */
export interface TextSpan {
  /** Pen start (scene units) */
  x: number;
  /** Baseline (scene units) */
  y: number;
  text: string;
  fontSize: number;
  /** Packed RGBA8888 color */
  color: number;
  layer: number;
  /** -1 for the default font, otherwise an id returned by addFontBlob */
  fontId: number;
}

/** Raw font data registered with a scene */
export interface FontBlob {
  id: number;
  name: string;
  data: Uint8Array;
}

/** Text style options */
export interface TextStyle {
  /** Font size in scene units (default: 16) */
  fontSize?: number;
  /** Packed RGBA8888 color (default: opaque white) */
  color?: number;
  /** Layer (default: 0) */
  layer?: number;
  /** Font id (default: -1, the default font) */
  fontId?: number;
}

/** Font id of the default font */
export const DEFAULT_FONT_ID = -1;

/** Default text style values */
export const DEFAULT_TEXT_STYLE: Required<TextStyle> = {
  fontSize: 16,
  color: 0xffffffff,
  layer: 0,
  fontId: DEFAULT_FONT_ID,
};
