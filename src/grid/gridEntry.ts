/**
 * Grid bucket entries
 *
 * One u32 per entry. The top bit marks a glyph; the lower 31 bits are then a
 * glyph index. Otherwise they are a word offset into the primitive payload
 * region, relative to primDataBase.
 */

export const GLYPH_BIT = 0x80000000;
export const ENTRY_INDEX_MASK = 0x7fffffff;

export function encodePrimEntry(wordOffset: number): number {
  if (wordOffset < 0 || wordOffset > ENTRY_INDEX_MASK) {
    throw new RangeError(`Primitive offset ${wordOffset} does not fit in a grid entry`);
  }
  return wordOffset;
}

export function encodeGlyphEntry(glyphIndex: number): number {
  if (glyphIndex < 0 || glyphIndex > ENTRY_INDEX_MASK) {
    throw new RangeError(`Glyph index ${glyphIndex} does not fit in a grid entry`);
  }
  return (GLYPH_BIT | glyphIndex) >>> 0;
}

export function isGlyphEntry(entry: number): boolean {
  return (entry & GLYPH_BIT) !== 0;
}

export function glyphIndexOf(entry: number): number {
  return entry & ENTRY_INDEX_MASK;
}

export function primOffsetOf(entry: number): number {
  return entry & ENTRY_INDEX_MASK;
}
