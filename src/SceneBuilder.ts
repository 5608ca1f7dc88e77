/**
 * Scene Builder
 *
 * Turns the content of a PrimitiveBuffer into the GPU layout read by the SDF
 * shader, in strict phases:
 *
 *   calculate()          bounding boxes, glyph shaping, spatial grid
 *   declareBufferNeeds() reserve the "prims" and "derived" regions
 *   (allocator commits)
 *   allocateBuffers()    bind handles for both regions
 *   writeBuffers()       serialize primitives, grid, glyphs and the header
 *
 * Any allocation failure drops the builder back to "uncomputed"; the next
 * attempt starts again at calculate(). The last successful build stays
 * queryable until another build succeeds.
 */

import { PreconditionError, fail, ok } from "./errors";
import type {
  AllocError,
  AllocResult,
  BufferAllocator,
  BufferHandle,
  MetadataHandle,
  MetadataService,
} from "./allocation/types";
import { encodeGlyphEntry, encodePrimEntry, glyphIndexOf, isGlyphEntry, primOffsetOf } from "./grid/gridEntry";
import { DEFAULT_GRID_OPTIONS, SpatialGrid, chooseCellSize, type GridOptions } from "./grid/SpatialGrid";
import { METADATA_BYTES, SceneFlags, encodeMetadata, type SceneMetadata } from "./layout/metadata";
import { createWordViews } from "./primitives/codec";
import { primitiveAABB } from "./primitives/aabb";
import type { AABB, Primitive } from "./primitives/types";
import type { PrimitiveBuffer } from "./PrimitiveBuffer";
import { GlyphShaper, type ShapedGlyph } from "./text/GlyphShaper";
import { GLYPH_RECORD_WORDS, GlyphFlags, writeGlyphRecord } from "./text/glyphRecord";
import { applySelection, buildReadingOrder, findNearestGlyph, selectedText } from "./text/selection";
import { DEFAULT_FONT_ID, type FontService } from "./text/types";

/** Allocation scope of the offset table and primitive records */
export const PRIMS_SCOPE = "prims";
/** Allocation scope of the grid and glyph records */
export const DERIVED_SCOPE = "derived";

export interface SceneBuilderOptions {
  /** Spatial grid tuning */
  grid?: GridOptions;
  /** Font lookup; without one, text produces no glyphs */
  fonts?: FontService;
}

export type BuildPhase = "uncomputed" | "calculated" | "declared" | "allocated" | "written";

/** Result of calculate(): everything needed to size and write the buffers */
interface CalculatedScene {
  bounds: AABB;
  primCount: number;
  primWords: number;
  primitives: Primitive[];
  /** Record offset (relative to primDataBase) to primitive index */
  primByOffset: Map<number, number>;
  glyphs: ShapedGlyph[];
  grid: SpatialGrid;
  primBytes: number;
  derivedBytes: number;
}

/** Where a written scene lives */
export interface SceneLayout {
  metadata: SceneMetadata;
  metadataHandle: MetadataHandle;
  prims: BufferHandle;
  derived: BufferHandle;
}

/** A successful build: its layout plus the CPU-side index it was written from */
interface BuiltScene {
  scene: CalculatedScene;
  layout: SceneLayout;
  /** Glyph indices in reading order, built on first selection use */
  readingOrder?: number[];
}

type BuildState =
  | { phase: "uncomputed" }
  | { phase: "calculated"; scene: CalculatedScene }
  | { phase: "declared"; scene: CalculatedScene }
  | { phase: "allocated"; scene: CalculatedScene; prims: BufferHandle; derived: BufferHandle }
  | { phase: "written"; scene: CalculatedScene };

export type SceneHit =
  | { kind: "primitive"; index: number; primitive: Primitive }
  | { kind: "glyph"; index: number; glyph: ShapedGlyph };

export class SceneBuilder {
  readonly buffer: PrimitiveBuffer;
  private readonly allocator: BufferAllocator;
  private readonly metadataService: MetadataService;
  private readonly shaper: GlyphShaper;
  /** Allocation slot of both scopes; unique per builder sharing an allocator */
  readonly slot: number;
  private readonly gridOptions: Required<GridOptions>;

  private state: BuildState = { phase: "uncomputed" };
  private metadataHandle: MetadataHandle | undefined;
  private built: BuiltScene | undefined;
  private widthCells = 0;
  private heightCells = 0;

  constructor(
    buffer: PrimitiveBuffer,
    allocator: BufferAllocator,
    metadata: MetadataService,
    slot: number,
    options: SceneBuilderOptions = {}
  ) {
    this.buffer = buffer;
    this.allocator = allocator;
    this.metadataService = metadata;
    this.shaper = new GlyphShaper(options.fonts);
    this.slot = slot;
    this.gridOptions = { ...DEFAULT_GRID_OPTIONS, ...options.grid };
  }

  get phase(): BuildPhase {
    return this.state.phase;
  }

  /** Layout of the last successful build */
  get lastLayout(): SceneLayout | undefined {
    return this.built?.layout;
  }

  /**
   * Viewport size in terminal cells, written to the header.
   */
  setViewport(widthCells: number, heightCells: number): void {
    this.widthCells = widthCells >>> 0;
    this.heightCells = heightCells >>> 0;
  }

  /**
   * Drop any in-progress build. The last successful build is kept.
   */
  reset(): void {
    this.state = { phase: "uncomputed" };
  }

  // ---------------------------------------------------------------------------
  // Phases
  // ---------------------------------------------------------------------------

  /**
   * Compute bounding boxes, shape text and build the spatial grid over the
   * buffer's current content. Always allowed; restarts any build in progress.
   */
  calculate(): void {
    const bounds = this.buffer.sceneBounds;
    if (!bounds) {
      this.reset();
      throw new PreconditionError("Scene bounds must be set before calculate()");
    }

    const primitives: Primitive[] = [];
    this.buffer.forEachPrimitive((primitive) => {
      primitives.push(primitive);
    });
    const primitiveBoxes = primitives.map(primitiveAABB);

    const { glyphs } = this.shaper.shape(this.buffer.textSpans, this.buffer.fontBlobs);
    const glyphBoxes = glyphs.map(glyphAABB);

    const cellSize = chooseCellSize(bounds, primitiveBoxes, glyphBoxes, this.gridOptions);
    const grid = new SpatialGrid(bounds, cellSize, this.gridOptions.maxGridDim);

    const recordOffsets = this.buffer.recordOffsets;
    const primByOffset = new Map<number, number>();
    primitiveBoxes.forEach((box, i) => {
      const offset = recordOffsets[i]!;
      primByOffset.set(offset, i);
      grid.insert(box, encodePrimEntry(offset));
    });
    glyphBoxes.forEach((box, i) => {
      grid.insert(box, encodeGlyphEntry(i));
    });

    const primCount = this.buffer.primCount;
    const primWords = this.buffer.totalWords;

    this.state = {
      phase: "calculated",
      scene: {
        bounds: { ...bounds },
        primCount,
        primWords,
        primitives,
        primByOffset,
        glyphs,
        grid,
        primBytes: this.buffer.gpuBufferSize(),
        derivedBytes: (grid.serializedWords + glyphs.length * GLYPH_RECORD_WORDS) * 4,
      },
    };
  }

  /**
   * Reserve space for both regions with the allocator. Writes nothing.
   */
  declareBufferNeeds(): void {
    const state = this.state;
    if (state.phase !== "calculated") {
      throw this.phaseError("declareBufferNeeds", "calculated");
    }

    this.allocator.reserve(state.scene.primBytes);
    this.allocator.reserve(state.scene.derivedBytes);
    this.state = { phase: "declared", scene: state.scene };
  }

  /**
   * Bind handles for both regions after the allocator has committed.
   */
  allocateBuffers(): AllocResult<void> {
    const state = this.state;
    if (state.phase !== "declared") {
      throw this.phaseError("allocateBuffers", "declared");
    }

    if (!this.metadataHandle) {
      const meta = this.metadataService.allocateMetadata(METADATA_BYTES);
      if (!meta.ok) return this.abort(meta.error);
      this.metadataHandle = meta.value;
    }

    const prims = this.allocator.allocateBuffer(this.slot, PRIMS_SCOPE, state.scene.primBytes);
    if (!prims.ok) return this.abort(prims.error);

    const derived = this.allocator.allocateBuffer(this.slot, DERIVED_SCOPE, state.scene.derivedBytes);
    if (!derived.ok) return this.abort(derived.error);

    this.state = {
      phase: "allocated",
      scene: state.scene,
      prims: prims.value,
      derived: derived.value,
    };
    return ok(undefined);
  }

  /**
   * Serialize the scene into the bound regions, write the header and mark
   * both regions dirty for upload.
   */
  writeBuffers(): AllocResult<SceneLayout> {
    const state = this.state;
    if (state.phase !== "allocated") {
      throw this.phaseError("writeBuffers", "allocated");
    }

    const { scene, prims, derived } = state;
    if (this.buffer.primCount !== scene.primCount || this.buffer.totalWords !== scene.primWords) {
      this.reset();
      throw new PreconditionError("Primitives changed after calculate()");
    }
    if (prims.size < scene.primBytes || derived.size < scene.derivedBytes) {
      return this.abort({
        code: "BUFFER_TOO_SMALL",
        detail: `Handles hold ${prims.size}/${derived.size} bytes, ${scene.primBytes}/${scene.derivedBytes} needed`,
      });
    }
    const metadataHandle = this.metadataHandle;
    if (!metadataHandle) {
      return this.abort({ code: "ALLOC_METADATA", detail: "No metadata slot" });
    }

    this.buffer.writeGPU(new Uint32Array(prims.buffer, prims.offset, scene.primBytes / 4));

    const gridWords = scene.grid.serializedWords;
    const views = createWordViews(derived.buffer, derived.offset, scene.derivedBytes / 4);
    scene.grid.write(views.u32, 0);
    scene.glyphs.forEach((glyph, i) => {
      writeGlyphRecord(glyph, views, gridWords + i * GLYPH_RECORD_WORDS);
    });

    const customAtlas = scene.glyphs.some((g) => (g.flags & GlyphFlags.CustomAtlas) !== 0);
    const metadata: SceneMetadata = {
      primitiveOffset: prims.offset / 4,
      primitiveCount: scene.primCount,
      gridOffset: derived.offset / 4,
      gridWidth: scene.grid.width,
      gridHeight: scene.grid.height,
      cellSize: scene.grid.cellSize,
      glyphOffset: derived.offset / 4 + gridWords,
      glyphCount: scene.glyphs.length,
      sceneMinX: scene.bounds.minX,
      sceneMinY: scene.bounds.minY,
      sceneMaxX: scene.bounds.maxX,
      sceneMaxY: scene.bounds.maxY,
      widthCells: this.widthCells,
      heightCells: this.heightCells,
      flags: (this.buffer.flags | (customAtlas ? SceneFlags.CustomAtlas : 0)) >>> 0,
      bgColor: this.buffer.bgColor,
    };

    const written = this.metadataService.writeMetadata(metadataHandle, encodeMetadata(metadata));
    if (!written.ok) return this.abort(written.error);

    this.allocator.markDirty(prims);
    this.allocator.markDirty(derived);

    const layout: SceneLayout = { metadata, metadataHandle, prims, derived };
    this.built = { scene, layout };
    this.state = { phase: "written", scene };
    return ok(layout);
  }

  // ---------------------------------------------------------------------------
  // Queries against the last successful build
  // ---------------------------------------------------------------------------

  /**
   * Primitives and glyphs referenced by the grid cell containing a point, in
   * grid order. The same clamped lookup the shader performs.
   */
  queryPoint(x: number, y: number): SceneHit[] {
    const built = this.built;
    if (!built) return [];

    const hits: SceneHit[] = [];
    for (const entry of built.scene.grid.queryPoint(x, y)) {
      if (isGlyphEntry(entry)) {
        const index = glyphIndexOf(entry);
        const glyph = built.scene.glyphs[index];
        if (glyph) hits.push({ kind: "glyph", index, glyph });
      } else {
        const index = built.scene.primByOffset.get(primOffsetOf(entry));
        const primitive = index === undefined ? undefined : built.scene.primitives[index];
        if (index !== undefined && primitive) hits.push({ kind: "primitive", index, primitive });
      }
    }
    return hits;
  }

  /** Glyphs of the last successful build */
  get glyphs(): readonly ShapedGlyph[] {
    return this.built?.scene.glyphs ?? [];
  }

  // ---------------------------------------------------------------------------
  // Text metrics
  // ---------------------------------------------------------------------------

  measureTextWidth(text: string, fontSize: number, fontId: number = DEFAULT_FONT_ID): number {
    return this.shaper.measureTextWidth(text, fontSize, fontId, this.buffer.fontBlobs);
  }

  fontAscent(fontSize: number, fontId: number = DEFAULT_FONT_ID): number {
    return this.shaper.fontAscent(fontSize, fontId, this.buffer.fontBlobs);
  }

  fontDescent(fontSize: number, fontId: number = DEFAULT_FONT_ID): number {
    return this.shaper.fontDescent(fontSize, fontId, this.buffer.fontBlobs);
  }

  // ---------------------------------------------------------------------------
  // Selection
  // ---------------------------------------------------------------------------

  /**
   * Find the glyph nearest to a scene position.
   *
   * @returns Reading-order position, or -1 when the scene has no glyphs
   */
  findNearestGlyph(x: number, y: number): number {
    const built = this.built;
    if (!built) return -1;
    return findNearestGlyph(built.scene.glyphs, this.readingOrder(built), x, y);
  }

  /**
   * Select glyphs between two reading-order positions (inclusive). A negative
   * position clears the selection. Glyph records of the written build are
   * updated in place and marked dirty.
   *
   * @returns Number of selected glyphs
   */
  setSelectionRange(start: number, end: number): number {
    const built = this.built;
    if (!built) return 0;

    const { scene, layout } = built;
    const count = applySelection(scene.glyphs, this.readingOrder(built), start, end);

    // Rewrite glyph records only while the handles are still current
    if (this.state.phase === "written" && this.state.scene === scene && scene.glyphs.length > 0) {
      const gridWords = scene.grid.serializedWords;
      const views = createWordViews(layout.derived.buffer, layout.derived.offset, scene.derivedBytes / 4);
      scene.glyphs.forEach((glyph, i) => {
        writeGlyphRecord(glyph, views, gridWords + i * GLYPH_RECORD_WORDS);
      });
      this.allocator.markDirty(layout.derived);
    }
    return count;
  }

  /** Text of the selected glyphs, in reading order */
  getSelectedText(): string {
    const built = this.built;
    if (!built) return "";
    return selectedText(built.scene.glyphs, this.readingOrder(built));
  }

  // ---------------------------------------------------------------------------

  private readingOrder(built: BuiltScene): number[] {
    built.readingOrder ??= buildReadingOrder(built.scene.glyphs);
    return built.readingOrder;
  }

  private abort(error: AllocError): AllocResult<never> {
    this.reset();
    return fail(error.code, error.detail);
  }

  private phaseError(operation: string, expected: BuildPhase): PreconditionError {
    return new PreconditionError(
      `${operation}() requires phase "${expected}", builder is "${this.state.phase}"`
    );
  }
}

function glyphAABB(glyph: ShapedGlyph): AABB {
  return {
    minX: glyph.x,
    minY: glyph.y,
    maxX: glyph.x + glyph.width,
    maxY: glyph.y + glyph.height,
  };
}
