/**
 * Bounding boxes for grid membership
 *
 * Boxes are conservative: every box grows by half the stroke width, box-like
 * shapes also by their corner rounding. They are only used to decide which
 * grid cells reference a primitive and are never written to the GPU.
 */

import { PrimitiveType, type AABB, type Primitive } from "./types";

function around(cx: number, cy: number, ex: number, ey: number): AABB {
  return { minX: cx - ex, minY: cy - ey, maxX: cx + ex, maxY: cy + ey };
}

function ofPoints(coords: readonly number[], expand: number): AABB {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (let i = 0; i + 1 < coords.length; i += 2) {
    const x = coords[i]!;
    const y = coords[i + 1]!;
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }
  return {
    minX: minX - expand,
    minY: minY - expand,
    maxX: maxX + expand,
    maxY: maxY + expand,
  };
}

/**
 * Compute the bounding box of a primitive.
 */
export function primitiveAABB(p: Primitive): AABB {
  const e = p.strokeWidth * 0.5;

  switch (p.type) {
    case PrimitiveType.Circle:
      return around(p.cx, p.cy, p.r + e, p.r + e);
    case PrimitiveType.Box:
      return around(p.cx, p.cy, p.hw + p.round + e, p.hh + p.round + e);
    case PrimitiveType.RoundedBox: {
      const r = Math.max(...p.radii);
      return around(p.cx, p.cy, p.hw + r + e, p.hh + r + e);
    }
    case PrimitiveType.Segment:
      return ofPoints([p.x0, p.y0, p.x1, p.y1], e);
    case PrimitiveType.Triangle:
    case PrimitiveType.Bezier2:
      // Control points bound a quadratic curve
      return ofPoints([p.ax, p.ay, p.bx, p.by, p.cx, p.cy], e);
    case PrimitiveType.Bezier3:
      return ofPoints([p.ax, p.ay, p.bx, p.by, p.cx, p.cy, p.dx, p.dy], e);
    case PrimitiveType.Ellipse:
      return around(p.cx, p.cy, p.rx + e, p.ry + e);
    case PrimitiveType.Arc: {
      const r = Math.max(p.ra, p.rb) + e;
      return around(p.cx, p.cy, r, r);
    }
  }
}

/** Smallest box containing both boxes */
export function unionAABB(a: AABB, b: AABB): AABB {
  return {
    minX: Math.min(a.minX, b.minX),
    minY: Math.min(a.minY, b.minY),
    maxX: Math.max(a.maxX, b.maxX),
    maxY: Math.max(a.maxY, b.maxY),
  };
}

export function aabbArea(box: AABB): number {
  return Math.max(0, box.maxX - box.minX) * Math.max(0, box.maxY - box.minY);
}

/**
 * Check if two boxes overlap. Touching edges count as overlap.
 */
export function aabbOverlap(a: AABB, b: AABB): boolean {
  return !(
    a.maxX < b.minX ||
    b.maxX < a.minX ||
    a.maxY < b.minY ||
    b.maxY < a.minY
  );
}

export function aabbContains(box: AABB, x: number, y: number): boolean {
  return x >= box.minX && x <= box.maxX && y >= box.minY && y <= box.maxY;
}
