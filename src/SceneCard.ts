/**
 * Scene Card
 *
 * One drawable SDF scene: a PrimitiveBuffer the caller fills, and the
 * SceneBuilder that lays it out. rebuild() drives every build phase against
 * an allocator that serves only this scene. Hosts sharing an allocator
 * between several scenes drive the builder phases themselves.
 */

import type { AllocError, AllocResult, BufferAllocator, MetadataService, UploadQueue } from "./allocation/types";
import type { GridOptions } from "./grid/SpatialGrid";
import { PrimitiveBuffer } from "./PrimitiveBuffer";
import { SceneBuilder, type SceneHit, type SceneLayout } from "./SceneBuilder";
import type { FontService } from "./text/types";

export interface SceneCardOptions {
  /** Minimum time between two logged rebuild failures (default: 5000) */
  logIntervalMs?: number;
  /** Spatial grid tuning */
  grid?: GridOptions;
}

export const DEFAULT_SCENE_CARD_OPTIONS: Required<Omit<SceneCardOptions, "grid">> = {
  logIntervalMs: 5000,
};

export class SceneCard {
  readonly buffer: PrimitiveBuffer;
  readonly builder: SceneBuilder;
  private readonly allocator: BufferAllocator;
  private readonly logIntervalMs: number;
  private lastLogAt = -Infinity;
  private suppressed = 0;

  constructor(
    allocator: BufferAllocator,
    metadata: MetadataService,
    slot: number,
    fonts?: FontService,
    options: SceneCardOptions = {}
  ) {
    const opts = { ...DEFAULT_SCENE_CARD_OPTIONS, ...options };
    this.allocator = allocator;
    this.logIntervalMs = opts.logIntervalMs;
    this.buffer = new PrimitiveBuffer();
    this.builder = new SceneBuilder(this.buffer, allocator, metadata, slot, {
      grid: options.grid,
      fonts,
    });
  }

  /** Layout of the last successful rebuild */
  get layout(): SceneLayout | undefined {
    return this.builder.lastLayout;
  }

  /**
   * Lay out the buffer's current content and upload it.
   *
   * On failure the builder is reset and the previous layout stays current.
   */
  rebuild(queue?: UploadQueue): AllocResult<SceneLayout> {
    const result = this.runPhases(queue);
    if (!result.ok) {
      this.builder.reset();
      this.logFailure(result.error);
    }
    return result;
  }

  /**
   * Primitives and glyphs under a scene position, from the last good layout.
   */
  hitTest(x: number, y: number): SceneHit[] {
    return this.builder.queryPoint(x, y);
  }

  private runPhases(queue: UploadQueue | undefined): AllocResult<SceneLayout> {
    this.builder.calculate();
    this.builder.declareBufferNeeds();

    const committed = this.allocator.commitReservations();
    if (!committed.ok) return committed;

    const allocated = this.builder.allocateBuffers();
    if (!allocated.ok) return allocated;

    const written = this.builder.writeBuffers();
    if (!written.ok) return written;

    const flushed = this.allocator.flush(queue);
    if (!flushed.ok) return flushed;

    return written;
  }

  private logFailure(error: AllocError): void {
    const now = Date.now();
    if (now - this.lastLogAt < this.logIntervalMs) {
      this.suppressed++;
      return;
    }

    const suffix = this.suppressed > 0 ? ` (${this.suppressed} similar failures suppressed)` : "";
    console.warn(`[SceneCard] Rebuild failed: ${error.code}: ${error.detail}${suffix}`);
    this.lastLogAt = now;
    this.suppressed = 0;
  }
}
