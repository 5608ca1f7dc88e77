/**
 * SDF primitive records
 */

export * from "./types";
export {
  createWordViews,
  encodePrimitive,
  decodePrimitive,
  primitiveGeometry,
  type WordViews,
} from "./codec";
export {
  primitiveAABB,
  unionAABB,
  aabbArea,
  aabbOverlap,
  aabbContains,
} from "./aabb";
