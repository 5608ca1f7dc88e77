/**
 * TrueType vertical metrics
 *
 * Reads units-per-em from the `head` table and ascender/descender from the
 * `hhea` table of a TrueType/OpenType font blob.
 */

export interface TtfMetrics {
  unitsPerEm: number;
  /** Design units above the baseline */
  ascender: number;
  /** Design units below the baseline (negative) */
  descender: number;
}

const TAG_HEAD = 0x68656164;
const TAG_HHEA = 0x68686561;

/**
 * Parse vertical metrics from raw font data.
 *
 * @returns Metrics, or undefined when the data is not a font with both tables
 */
export function parseTtfMetrics(data: Uint8Array): TtfMetrics | undefined {
  if (data.byteLength < 12) return undefined;
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

  const numTables = view.getUint16(4);
  let headOffset = 0;
  let hheaOffset = 0;

  for (let i = 0; i < numTables; i++) {
    const entry = 12 + i * 16;
    if (entry + 16 > data.byteLength) break;
    const tag = view.getUint32(entry);
    const offset = view.getUint32(entry + 8);
    if (tag === TAG_HEAD) headOffset = offset;
    else if (tag === TAG_HHEA) hheaOffset = offset;
  }

  if (headOffset === 0 || hheaOffset === 0) return undefined;
  if (headOffset + 20 > data.byteLength || hheaOffset + 8 > data.byteLength) {
    return undefined;
  }

  const unitsPerEm = view.getUint16(headOffset + 18) || 1000;
  return {
    unitsPerEm,
    ascender: view.getInt16(hheaOffset + 4),
    descender: view.getInt16(hheaOffset + 6),
  };
}

export function ttfAscent(metrics: TtfMetrics, fontSize: number): number {
  return (metrics.ascender / metrics.unitsPerEm) * fontSize;
}

export function ttfDescent(metrics: TtfMetrics, fontSize: number): number {
  return (-metrics.descender / metrics.unitsPerEm) * fontSize;
}
