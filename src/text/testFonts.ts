import type { FontAtlasMetadata, GlyphMetrics } from "./types";

function glyph(id: number, index: number, xOffset: number): GlyphMetrics {
  return { id, index, x: index * 8, y: 0, width: 6, height: 10, xOffset, yOffset: 8, xAdvance: 7 };
}

/**
 * Small font at base size 10 with "A" and "V" and an A-V kerning pair.
 */
export function createTestFont(name = "Test"): FontAtlasMetadata {
  return {
    name,
    size: 10,
    atlasWidth: 64,
    atlasHeight: 16,
    sdfSpread: 2,
    lineHeight: 12,
    baseline: 8,
    glyphs: {
      65: glyph(65, 0, 1),
      86: glyph(86, 1, 0),
    },
    kerning: [{ first: 65, second: 86, amount: -2 }],
  };
}

/**
 * Minimal sfnt blob carrying only `head` and `hhea` tables.
 */
export function createTtfBlob(unitsPerEm: number, ascender: number, descender: number): Uint8Array {
  const bytes = new Uint8Array(134);
  const view = new DataView(bytes.buffer);
  view.setUint32(0, 0x00010000);
  view.setUint16(4, 2);
  // Table records: tag, checksum, offset, length
  view.setUint32(12, 0x68656164);
  view.setUint32(20, 44);
  view.setUint32(24, 54);
  view.setUint32(28, 0x68686561);
  view.setUint32(36, 98);
  view.setUint32(40, 36);
  view.setUint16(44 + 18, unitsPerEm);
  view.setInt16(98 + 4, ascender);
  view.setInt16(98 + 6, descender);
  return bytes;
}
