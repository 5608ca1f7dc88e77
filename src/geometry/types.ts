/**
 * Polygon types
 */

/** Coordinate as [x, y] */
export type Coord = [number, number];

/** Ring of coordinates; a closing point equal to the first is optional */
export type Ring = readonly Coord[];

/** Triangulated polygon */
export interface TessellatedPolygon {
  /** Interleaved vertex data [x, y, x, y, ...] */
  vertices: number[];
  /** Vertex indices, three per triangle */
  indices: number[];
}
