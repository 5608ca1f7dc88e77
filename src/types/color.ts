/**
 * Color packing
 *
 * Colors travel to the GPU as one u32 word per color: red in the low byte,
 * alpha in the high byte (RGBA8888 read as little-endian bytes).
 */

/** RGBA color with components in 0-1 */
export type Color = [number, number, number, number];

/** Packed RGBA8888 color, or an unpacked RGBA tuple */
export type ColorLike = number | Color;

function toByte(component: number): number {
  return Math.round(Math.min(1, Math.max(0, component)) * 255);
}

/**
 * Pack an RGBA tuple into a u32 color word.
 */
export function packColor(color: Color): number {
  const [r, g, b, a] = color;
  return ((toByte(a) << 24) | (toByte(b) << 16) | (toByte(g) << 8) | toByte(r)) >>> 0;
}

/**
 * Unpack a u32 color word into an RGBA tuple.
 */
export function unpackColor(packed: number): Color {
  return [
    (packed & 0xff) / 255,
    ((packed >>> 8) & 0xff) / 255,
    ((packed >>> 16) & 0xff) / 255,
    ((packed >>> 24) & 0xff) / 255,
  ];
}

/** Normalize a color to its packed u32 form. */
export function toPackedColor(color: ColorLike): number {
  return typeof color === "number" ? color >>> 0 : packColor(color);
}
