/**
 * Polygon primitives
 *
 * SDF primitives have no general polygon, so filled polygons are emitted as
 * triangles and their outlines as segments.
 */

import type { PrimitiveBuffer } from "../PrimitiveBuffer";
import { toPackedColor, type ColorLike } from "../types/color";
import { openRing, tessellatePolygon } from "./tessellate";
import type { Ring } from "./types";

export interface PolygonStyle {
  fill: ColorLike;
  /** Outline color (default: none) */
  stroke?: ColorLike;
  /** Outline width (default: 0, no outline) */
  strokeWidth?: number;
  /** Layer for every emitted primitive (default: each primitive's id) */
  layer?: number;
}

/**
 * Append a polygon to a buffer.
 *
 * @returns Ids of the primitives added, triangles first
 */
export function addPolygon(
  buffer: PrimitiveBuffer,
  outer: Ring,
  holes: readonly Ring[],
  style: PolygonStyle
): number[] {
  const ids: number[] = [];
  const fill = toPackedColor(style.fill);
  const { vertices: v, indices } = tessellatePolygon(outer, holes);

  for (let i = 0; i + 2 < indices.length; i += 3) {
    const a = indices[i]! * 2;
    const b = indices[i + 1]! * 2;
    const c = indices[i + 2]! * 2;
    const id = buffer.primCount;
    buffer.addTriangle(id, v[a]!, v[a + 1]!, v[b]!, v[b + 1]!, v[c]!, v[c + 1]!, fill, 0, 0, 0, style.layer ?? id);
    ids.push(id);
  }

  const strokeWidth = style.strokeWidth ?? 0;
  if (style.stroke === undefined || strokeWidth <= 0) return ids;

  const stroke = toPackedColor(style.stroke);
  for (const ring of [outer, ...holes]) {
    const open = openRing(ring);
    if (open.length < 3) continue;
    open.forEach(([x0, y0], j) => {
      const [x1, y1] = open[(j + 1) % open.length]!;
      const id = buffer.primCount;
      buffer.addSegment(id, x0, y0, x1, y1, 0, stroke, strokeWidth, 0, style.layer ?? id);
      ids.push(id);
    });
  }
  return ids;
}
