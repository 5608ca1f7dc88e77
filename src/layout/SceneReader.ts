/**
 * Scene Reader
 *
 * Reads a written scene back out of storage using only its header, the way
 * the shader does. Used to inspect uploaded scenes and to check a layout
 * without the builder that produced it.
 */

import { glyphIndexOf, isGlyphEntry, primOffsetOf } from "../grid/gridEntry";
import { clampCell } from "../grid/SpatialGrid";
import { createWordViews, decodePrimitive, type WordViews } from "../primitives/codec";
import type { Primitive } from "../primitives/types";
import { GLYPH_RECORD_WORDS, readGlyphRecord, type GlyphRecord } from "../text/glyphRecord";
import type { SceneMetadata } from "./metadata";

export type ReaderHit =
  | { kind: "primitive"; index: number; primitive: Primitive }
  | { kind: "glyph"; index: number; glyph: GlyphRecord };

export class SceneReader {
  readonly metadata: SceneMetadata;
  private readonly views: WordViews;

  /**
   * @param storage - The allocator's storage the header's offsets point into
   */
  constructor(storage: ArrayBufferLike, metadata: SceneMetadata) {
    this.metadata = metadata;
    this.views = createWordViews(storage);
  }

  /** First word of the primitive records */
  get primDataBase(): number {
    return this.metadata.primitiveOffset + this.metadata.primitiveCount;
  }

  /**
   * Record offset of primitive `index`, relative to primDataBase.
   */
  recordOffset(index: number): number | undefined {
    if (index < 0 || index >= this.metadata.primitiveCount) return undefined;
    return this.views.u32[this.metadata.primitiveOffset + index];
  }

  primitive(index: number): Primitive | undefined {
    const offset = this.recordOffset(index);
    return offset === undefined ? undefined : decodePrimitive(this.views, this.primDataBase + offset);
  }

  glyph(index: number): GlyphRecord | undefined {
    if (index < 0 || index >= this.metadata.glyphCount) return undefined;
    return readGlyphRecord(this.views, this.metadata.glyphOffset + index * GLYPH_RECORD_WORDS);
  }

  /**
   * Raw entries of the cell containing a scene position.
   */
  cellEntries(x: number, y: number): number[] {
    const { gridOffset, gridWidth, gridHeight, cellSize, sceneMinX, sceneMinY } = this.metadata;
    const cx = clampCell((x - sceneMinX) / cellSize, gridWidth);
    const cy = clampCell((y - sceneMinY) / cellSize, gridHeight);

    const u32 = this.views.u32;
    const start = gridOffset + u32[gridOffset + cy * gridWidth + cx]!;
    const count = u32[start]!;
    return Array.from(u32.subarray(start + 1, start + 1 + count));
  }

  /**
   * Decoded primitives and glyphs of the cell containing a scene position.
   */
  queryPoint(x: number, y: number): ReaderHit[] {
    const hits: ReaderHit[] = [];
    for (const entry of this.cellEntries(x, y)) {
      if (isGlyphEntry(entry)) {
        const index = glyphIndexOf(entry);
        const glyph = this.glyph(index);
        if (glyph) hits.push({ kind: "glyph", index, glyph });
        continue;
      }

      const index = this.indexOfOffset(primOffsetOf(entry));
      const primitive = index < 0 ? undefined : this.primitive(index);
      if (primitive) hits.push({ kind: "primitive", index, primitive });
    }
    return hits;
  }

  /** Binary search of the offset table, which is sorted ascending */
  private indexOfOffset(offset: number): number {
    const u32 = this.views.u32;
    const base = this.metadata.primitiveOffset;
    let lo = 0;
    let hi = this.metadata.primitiveCount - 1;

    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const value = u32[base + mid]!;
      if (value === offset) return mid;
      if (value < offset) lo = mid + 1;
      else hi = mid - 1;
    }
    return -1;
  }
}
