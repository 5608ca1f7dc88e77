/**
 * SDF primitive types
 *
 * Every primitive is a fixed-size record of 32-bit words:
 *
 *   [type, layer, geometry..., fill, stroke, strokeWidth, round]
 *
 * The type and layer words and both colors are u32, everything else is f32.
 */

/** Type tag written to word 0 of each primitive record */
export const PrimitiveType = {
  Circle: 0,
  Box: 1,
  Segment: 2,
  Triangle: 3,
  Bezier2: 4,
  Bezier3: 5,
  Ellipse: 6,
  Arc: 7,
  RoundedBox: 8,
} as const;

export type PrimitiveType = (typeof PrimitiveType)[keyof typeof PrimitiveType];

/** Number of geometry words per primitive type */
export const GEOMETRY_WORDS: Readonly<Record<PrimitiveType, number>> = {
  [PrimitiveType.Circle]: 3,
  [PrimitiveType.Box]: 4,
  [PrimitiveType.Segment]: 4,
  [PrimitiveType.Triangle]: 6,
  [PrimitiveType.Bezier2]: 6,
  [PrimitiveType.Bezier3]: 8,
  [PrimitiveType.Ellipse]: 4,
  [PrimitiveType.Arc]: 6,
  [PrimitiveType.RoundedBox]: 8,
};

/** Words before the geometry (type, layer) */
export const HEADER_WORDS = 2;
/** Words after the geometry (fill, stroke, strokeWidth, round) */
export const STYLE_WORDS = 4;

export const TYPE_WORD = 0;
export const LAYER_WORD = 1;
export const GEOMETRY_WORD = 2;

export function isPrimitiveType(tag: number): tag is PrimitiveType {
  return Number.isInteger(tag) && tag >= 0 && tag <= PrimitiveType.RoundedBox;
}

/** Total record size in words, including type/layer and style words */
export function primitiveWordCount(type: PrimitiveType): number {
  return HEADER_WORDS + GEOMETRY_WORDS[type] + STYLE_WORDS;
}

/** Word index of the fill color within a record; stroke, width and round follow */
export function styleWordIndex(type: PrimitiveType): number {
  return HEADER_WORDS + GEOMETRY_WORDS[type];
}

/** Fill, stroke and corner rounding shared by every primitive */
export interface PrimitiveStyle {
  /** Fill color (packed RGBA8888, 0 = no fill) */
  fill: number;
  /** Stroke color (packed RGBA8888, 0 = no stroke) */
  stroke: number;
  /** Stroke width in scene units */
  strokeWidth: number;
  /** Corner rounding applied to the distance field */
  round: number;
}

interface PrimitiveBase extends PrimitiveStyle {
  layer: number;
}

export interface CirclePrimitive extends PrimitiveBase {
  type: typeof PrimitiveType.Circle;
  cx: number;
  cy: number;
  r: number;
}

export interface BoxPrimitive extends PrimitiveBase {
  type: typeof PrimitiveType.Box;
  cx: number;
  cy: number;
  /** Half extents */
  hw: number;
  hh: number;
}

export interface RoundedBoxPrimitive extends PrimitiveBase {
  type: typeof PrimitiveType.RoundedBox;
  cx: number;
  cy: number;
  hw: number;
  hh: number;
  /** Corner radii */
  radii: [number, number, number, number];
}

export interface SegmentPrimitive extends PrimitiveBase {
  type: typeof PrimitiveType.Segment;
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface TrianglePrimitive extends PrimitiveBase {
  type: typeof PrimitiveType.Triangle;
  ax: number;
  ay: number;
  bx: number;
  by: number;
  cx: number;
  cy: number;
}

export interface Bezier2Primitive extends PrimitiveBase {
  type: typeof PrimitiveType.Bezier2;
  ax: number;
  ay: number;
  bx: number;
  by: number;
  cx: number;
  cy: number;
}

export interface Bezier3Primitive extends PrimitiveBase {
  type: typeof PrimitiveType.Bezier3;
  ax: number;
  ay: number;
  bx: number;
  by: number;
  cx: number;
  cy: number;
  dx: number;
  dy: number;
}

export interface EllipsePrimitive extends PrimitiveBase {
  type: typeof PrimitiveType.Ellipse;
  cx: number;
  cy: number;
  rx: number;
  ry: number;
}

export interface ArcPrimitive extends PrimitiveBase {
  type: typeof PrimitiveType.Arc;
  cx: number;
  cy: number;
  /** Sine and cosine of the half aperture */
  sin: number;
  cos: number;
  /** Radius */
  ra: number;
  /** Thickness */
  rb: number;
}

/** Decoded primitive record */
export type Primitive =
  | CirclePrimitive
  | BoxPrimitive
  | RoundedBoxPrimitive
  | SegmentPrimitive
  | TrianglePrimitive
  | Bezier2Primitive
  | Bezier3Primitive
  | EllipsePrimitive
  | ArcPrimitive;

/** Axis-aligned bounding box in scene units */
export interface AABB {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}
