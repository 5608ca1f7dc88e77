/**
 * GPU scene layout
 */

export {
  METADATA_WORDS,
  METADATA_BYTES,
  SceneFlags,
  encodeMetadata,
  decodeMetadata,
  type SceneMetadata,
} from "./metadata";
export { SceneReader, type ReaderHit } from "./SceneReader";
