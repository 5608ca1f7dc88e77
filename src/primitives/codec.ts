/**
 * Primitive record encoding
 *
 * Writes and reads the fixed word layout described in ./types. Records live
 * in word arrays that alias one ArrayBuffer through a Uint32Array and a
 * Float32Array view, so u32 and f32 words can be mixed freely.
 */

import {
  GEOMETRY_WORD,
  LAYER_WORD,
  PrimitiveType,
  TYPE_WORD,
  isPrimitiveType,
  primitiveWordCount,
  styleWordIndex,
  type Primitive,
  type PrimitiveStyle,
} from "./types";

/** Paired u32/f32 views over the same words */
export interface WordViews {
  u32: Uint32Array;
  f32: Float32Array;
}

export function createWordViews(buffer: ArrayBufferLike, byteOffset = 0, words?: number): WordViews {
  const length = words ?? (buffer.byteLength - byteOffset) / 4;
  return {
    u32: new Uint32Array(buffer, byteOffset, length),
    f32: new Float32Array(buffer, byteOffset, length),
  };
}

/**
 * Geometry words of a primitive, in record order.
 */
export function primitiveGeometry(p: Primitive): number[] {
  switch (p.type) {
    case PrimitiveType.Circle:
      return [p.cx, p.cy, p.r];
    case PrimitiveType.Box:
      return [p.cx, p.cy, p.hw, p.hh];
    case PrimitiveType.RoundedBox:
      return [p.cx, p.cy, p.hw, p.hh, ...p.radii];
    case PrimitiveType.Segment:
      return [p.x0, p.y0, p.x1, p.y1];
    case PrimitiveType.Triangle:
    case PrimitiveType.Bezier2:
      return [p.ax, p.ay, p.bx, p.by, p.cx, p.cy];
    case PrimitiveType.Bezier3:
      return [p.ax, p.ay, p.bx, p.by, p.cx, p.cy, p.dx, p.dy];
    case PrimitiveType.Ellipse:
      return [p.cx, p.cy, p.rx, p.ry];
    case PrimitiveType.Arc:
      return [p.cx, p.cy, p.sin, p.cos, p.ra, p.rb];
  }
}

/**
 * Encode a primitive at word index `at`.
 *
 * @returns Number of words written
 */
export function encodePrimitive(p: Primitive, views: WordViews, at: number): number {
  const { u32, f32 } = views;
  const geometry = primitiveGeometry(p);

  u32[at + TYPE_WORD] = p.type;
  u32[at + LAYER_WORD] = p.layer >>> 0;
  for (let i = 0; i < geometry.length; i++) {
    f32[at + GEOMETRY_WORD + i] = geometry[i]!;
  }

  const s = at + styleWordIndex(p.type);
  u32[s] = p.fill >>> 0;
  u32[s + 1] = p.stroke >>> 0;
  f32[s + 2] = p.strokeWidth;
  f32[s + 3] = p.round;

  return primitiveWordCount(p.type);
}

/**
 * Decode the primitive record starting at word index `at`.
 *
 * @returns The primitive, or undefined when the type tag is unknown or the
 * record runs past the end of the views
 */
export function decodePrimitive(views: WordViews, at: number): Primitive | undefined {
  const { u32, f32 } = views;
  const type = u32[at + TYPE_WORD];
  if (type === undefined || !isPrimitiveType(type)) return undefined;
  if (at + primitiveWordCount(type) > u32.length) return undefined;

  const layer = u32[at + LAYER_WORD]!;
  const g = (i: number): number => f32[at + GEOMETRY_WORD + i]!;
  const s = at + styleWordIndex(type);
  const style: PrimitiveStyle = {
    fill: u32[s]!,
    stroke: u32[s + 1]!,
    strokeWidth: f32[s + 2]!,
    round: f32[s + 3]!,
  };

  switch (type) {
    case PrimitiveType.Circle:
      return { type, layer, cx: g(0), cy: g(1), r: g(2), ...style };
    case PrimitiveType.Box:
      return { type, layer, cx: g(0), cy: g(1), hw: g(2), hh: g(3), ...style };
    case PrimitiveType.RoundedBox:
      return {
        type,
        layer,
        cx: g(0),
        cy: g(1),
        hw: g(2),
        hh: g(3),
        radii: [g(4), g(5), g(6), g(7)],
        ...style,
      };
    case PrimitiveType.Segment:
      return { type, layer, x0: g(0), y0: g(1), x1: g(2), y1: g(3), ...style };
    case PrimitiveType.Triangle:
      return {
        type,
        layer,
        ax: g(0),
        ay: g(1),
        bx: g(2),
        by: g(3),
        cx: g(4),
        cy: g(5),
        ...style,
      };
    case PrimitiveType.Bezier2:
      return {
        type,
        layer,
        ax: g(0),
        ay: g(1),
        bx: g(2),
        by: g(3),
        cx: g(4),
        cy: g(5),
        ...style,
      };
    case PrimitiveType.Bezier3:
      return {
        type,
        layer,
        ax: g(0),
        ay: g(1),
        bx: g(2),
        by: g(3),
        cx: g(4),
        cy: g(5),
        dx: g(6),
        dy: g(7),
        ...style,
      };
    case PrimitiveType.Ellipse:
      return { type, layer, cx: g(0), cy: g(1), rx: g(2), ry: g(3), ...style };
    case PrimitiveType.Arc:
      return {
        type,
        layer,
        cx: g(0),
        cy: g(1),
        sin: g(2),
        cos: g(3),
        ra: g(4),
        rb: g(5),
        ...style,
      };
  }
}
