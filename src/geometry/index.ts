/**
 * Polygon geometry
 */

export * from "./types";
export { tessellatePolygon, openRing } from "./tessellate";
export { addPolygon, type PolygonStyle } from "./polygon";
