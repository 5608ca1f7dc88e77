/**
 * Glyph records
 *
 * Each shaped glyph is five 32-bit words (20 bytes):
 *
 *   0  x (f32)
 *   1  y (f32)
 *   2  width (f16, low half) | height (f16, high half)
 *   3  atlas index (u16) | layer (u8) << 16 | flags (u8) << 24
 *   4  color (u32)
 */

import type { WordViews } from "../primitives/codec";

export const GLYPH_RECORD_WORDS = 5;
export const GLYPH_RECORD_BYTES = GLYPH_RECORD_WORDS * 4;

/** Glyph flag bits */
export const GlyphFlags = {
  /** Glyph comes from a registered font rather than the default atlas */
  CustomAtlas: 1,
  /** Glyph is part of the current text selection */
  Selected: 2,
} as const;

/** A positioned glyph, in scene units */
export interface GlyphRecord {
  /** Top-left corner */
  x: number;
  y: number;
  width: number;
  height: number;
  /** Atlas slot */
  glyphIndex: number;
  layer: number;
  flags: number;
  /** Packed RGBA8888 color */
  color: number;
}

const scratchF32 = new Float32Array(1);
const scratchU32 = new Uint32Array(scratchF32.buffer);

/**
 * Convert a number to IEEE-754 binary16 bits (round half up).
 */
export function toHalf(value: number): number {
  scratchF32[0] = value;
  const bits = scratchU32[0]!;

  const sign = (bits >>> 16) & 0x8000;
  const exp = (bits >>> 23) & 0xff;
  let mant = bits & 0x7fffff;

  // NaN / Infinity
  if (exp === 0xff) return sign | 0x7c00 | (mant !== 0 ? 0x200 : 0);

  const e = exp - 127 + 15;
  if (e >= 0x1f) return sign | 0x7c00;

  if (e <= 0) {
    if (e < -10) return sign;
    mant |= 0x800000;
    const shift = 14 - e;
    let half = mant >>> shift;
    if ((mant >>> (shift - 1)) & 1) half += 1;
    return sign | half;
  }

  let half = sign | (e << 10) | (mant >>> 13);
  // A carry out of the mantissa correctly bumps the exponent
  if (mant & 0x1000) half += 1;
  return half;
}

/**
 * Convert IEEE-754 binary16 bits to a number.
 */
export function fromHalf(bits: number): number {
  const sign = bits & 0x8000 ? -1 : 1;
  const exp = (bits >>> 10) & 0x1f;
  const mant = bits & 0x3ff;

  if (exp === 0) return sign * mant * 2 ** -24;
  if (exp === 0x1f) return mant !== 0 ? NaN : sign * Infinity;
  return sign * (1 + mant / 1024) * 2 ** (exp - 15);
}

/**
 * Write a glyph record at word index `at`.
 */
export function writeGlyphRecord(glyph: GlyphRecord, views: WordViews, at: number): void {
  const { u32, f32 } = views;
  f32[at] = glyph.x;
  f32[at + 1] = glyph.y;
  u32[at + 2] = (toHalf(glyph.width) | (toHalf(glyph.height) << 16)) >>> 0;
  u32[at + 3] =
    ((glyph.glyphIndex & 0xffff) | ((glyph.layer & 0xff) << 16) | ((glyph.flags & 0xff) << 24)) >>> 0;
  u32[at + 4] = glyph.color >>> 0;
}

/**
 * Read the glyph record at word index `at`.
 */
export function readGlyphRecord(views: WordViews, at: number): GlyphRecord {
  const { u32, f32 } = views;
  const size = u32[at + 2]!;
  const packed = u32[at + 3]!;
  return {
    x: f32[at]!,
    y: f32[at + 1]!,
    width: fromHalf(size & 0xffff),
    height: fromHalf(size >>> 16),
    glyphIndex: packed & 0xffff,
    layer: (packed >>> 16) & 0xff,
    flags: packed >>> 24,
    color: u32[at + 4]!,
  };
}
