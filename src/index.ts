/**
 * sdf-scene - SDF primitive scenes laid out for GPU rendering
 */

export const VERSION = "0.1.0";

export { PrimitiveBuffer } from "./PrimitiveBuffer";
export {
  SceneBuilder,
  PRIMS_SCOPE,
  DERIVED_SCOPE,
  type SceneBuilderOptions,
  type BuildPhase,
  type SceneLayout,
  type SceneHit,
} from "./SceneBuilder";
export { SceneCard, DEFAULT_SCENE_CARD_OPTIONS, type SceneCardOptions } from "./SceneCard";
export {
  serializeScene,
  deserializeScene,
  SCENE_MAGIC,
  SCENE_FORMAT_VERSION,
  type DeserializeErrorCode,
  type DeserializeResult,
} from "./serialize";
export { PreconditionError, ok, fail, type ErrorDetail, type Result } from "./errors";

// Colors
export { packColor, unpackColor, toPackedColor, type Color, type ColorLike } from "./types/color";

export * from "./primitives";
export * from "./grid";
export * from "./text";
export * from "./layout";
export * from "./allocation";
export * from "./geometry";
