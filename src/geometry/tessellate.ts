/**
 * Polygon tessellation using earcut
 */

import earcut from "earcut";
import type { Ring, TessellatedPolygon } from "./types";

/**
 * Ring points without a repeated closing point.
 */
export function openRing(ring: Ring): Ring {
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (ring.length > 1 && first && last && first[0] === last[0] && first[1] === last[1]) {
    return ring.slice(0, -1);
  }
  return ring;
}

/**
 * Tessellate a polygon (with optional holes) into triangles.
 *
 * @param outer - Outer ring coordinates [[x,y], [x,y], ...]
 * @param holes - Optional array of hole rings
 */
export function tessellatePolygon(outer: Ring, holes: readonly Ring[] = []): TessellatedPolygon {
  // Flatten coordinates for earcut
  const vertices: number[] = [];
  const holeIndices: number[] = [];

  for (const [x, y] of openRing(outer)) {
    vertices.push(x, y);
  }

  for (const hole of holes) {
    const open = openRing(hole);
    if (open.length < 3) continue;
    holeIndices.push(vertices.length / 2);
    for (const [x, y] of open) {
      vertices.push(x, y);
    }
  }

  if (vertices.length < 6) {
    return { vertices, indices: [] };
  }

  const indices = earcut(vertices, holeIndices.length > 0 ? holeIndices : undefined, 2);
  return { vertices, indices };
}
