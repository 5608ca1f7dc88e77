/**
 * Scene metadata header
 *
 * 16 words (64 bytes) telling the shader where every region of a built scene
 * lives. Offsets are in words, in the addressing of the shared storage buffer.
 *
 *   0  primitiveOffset     8  sceneMinX (f32)
 *   1  primitiveCount      9  sceneMinY (f32)
 *   2  gridOffset         10  sceneMaxX (f32)
 *   3  gridWidth          11  sceneMaxY (f32)
 *   4  gridHeight         12  widthCells
 *   5  cellSize (f32)     13  heightCells
 *   6  glyphOffset        14  flags
 *   7  glyphCount         15  bgColor
 */

import { createWordViews } from "../primitives/codec";

export const METADATA_WORDS = 16;
export const METADATA_BYTES = METADATA_WORDS * 4;

/** Header flag bits */
export const SceneFlags = {
  ShowBounds: 1,
  ShowGrid: 2,
  ShowEvalCount: 4,
  CustomAtlas: 32,
} as const;

export interface SceneMetadata {
  primitiveOffset: number;
  primitiveCount: number;
  gridOffset: number;
  gridWidth: number;
  gridHeight: number;
  cellSize: number;
  glyphOffset: number;
  glyphCount: number;
  sceneMinX: number;
  sceneMinY: number;
  sceneMaxX: number;
  sceneMaxY: number;
  /** Viewport size in terminal cells, 0 when unknown */
  widthCells: number;
  heightCells: number;
  flags: number;
  bgColor: number;
}

/**
 * Encode a header into 64 bytes.
 */
export function encodeMetadata(meta: SceneMetadata): Uint8Array {
  const bytes = new Uint8Array(METADATA_BYTES);
  const { u32, f32 } = createWordViews(bytes.buffer);

  u32[0] = meta.primitiveOffset;
  u32[1] = meta.primitiveCount;
  u32[2] = meta.gridOffset;
  u32[3] = meta.gridWidth;
  u32[4] = meta.gridHeight;
  f32[5] = meta.cellSize;
  u32[6] = meta.glyphOffset;
  u32[7] = meta.glyphCount;
  f32[8] = meta.sceneMinX;
  f32[9] = meta.sceneMinY;
  f32[10] = meta.sceneMaxX;
  f32[11] = meta.sceneMaxY;
  u32[12] = meta.widthCells;
  u32[13] = meta.heightCells;
  u32[14] = meta.flags;
  u32[15] = meta.bgColor;

  return bytes;
}

/**
 * Decode a header from the first 64 bytes of `bytes`.
 */
export function decodeMetadata(bytes: Uint8Array): SceneMetadata {
  if (bytes.byteLength < METADATA_BYTES) {
    throw new RangeError(`Metadata header needs ${METADATA_BYTES} bytes, got ${bytes.byteLength}`);
  }
  // Copy so the views are aligned regardless of where the header sits
  const { u32, f32 } = createWordViews(bytes.slice(0, METADATA_BYTES).buffer);

  return {
    primitiveOffset: u32[0]!,
    primitiveCount: u32[1]!,
    gridOffset: u32[2]!,
    gridWidth: u32[3]!,
    gridHeight: u32[4]!,
    cellSize: f32[5]!,
    glyphOffset: u32[6]!,
    glyphCount: u32[7]!,
    sceneMinX: f32[8]!,
    sceneMinY: f32[9]!,
    sceneMaxX: f32[10]!,
    sceneMaxY: f32[11]!,
    widthCells: u32[12]!,
    heightCells: u32[13]!,
    flags: u32[14]!,
    bgColor: u32[15]!,
  };
}
