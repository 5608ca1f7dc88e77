/**
 * Uniform spatial hash grid over the scene bounds.
 *
 * Every primitive and glyph is referenced from each cell its bounding box
 * overlaps. Cell coordinates are clamped into the grid, so boxes that touch
 * or cross the scene edge land in the border cells and a point query at the
 * exact scene maximum still finds them.
 */

import { aabbArea } from "../primitives/aabb";
import type { AABB } from "../primitives/types";

export interface GridOptions {
  /** Fixed cell size in scene units (default: 0, chosen from content) */
  cellSize?: number;
  /** Cell size as a multiple of the mean primitive extent (default: 1.5) */
  cellSizeFactor?: number;
  /** Cell size as a multiple of the mean glyph height, for text-only scenes (default: 2) */
  glyphCellSizeFactor?: number;
  /** Fewest cells the scene may be split into (default: 16) */
  minCells?: number;
  /** Most cells the scene may be split into (default: 65536) */
  maxCells?: number;
  /** Largest grid width or height (default: 512) */
  maxGridDim?: number;
}

export const DEFAULT_GRID_OPTIONS: Required<GridOptions> = {
  cellSize: 0,
  cellSizeFactor: 1.5,
  glyphCellSizeFactor: 2,
  minCells: 16,
  maxCells: 65536,
  maxGridDim: 512,
};

/** Inclusive range of cell coordinates */
export interface CellRange {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/**
 * Choose a cell size so cells hold a roughly constant number of entries.
 *
 * Uses the mean primitive box area when there are primitives, the mean glyph
 * height for text-only scenes, and one cell covering the whole scene when it
 * is empty. The result is clamped between the sizes giving `maxCells` and
 * `minCells` cells and rounded to f32 so it matches the value the GPU reads.
 */
export function chooseCellSize(
  bounds: AABB,
  primitiveBoxes: readonly AABB[],
  glyphBoxes: readonly AABB[],
  options: GridOptions = {}
): number {
  const opts = { ...DEFAULT_GRID_OPTIONS, ...options };
  const sceneWidth = bounds.maxX - bounds.minX;
  const sceneHeight = bounds.maxY - bounds.minY;
  const sceneArea = sceneWidth * sceneHeight;

  let cellSize: number;
  if (opts.cellSize > 0) {
    cellSize = opts.cellSize;
  } else if (primitiveBoxes.length > 0) {
    let total = 0;
    for (const box of primitiveBoxes) total += aabbArea(box);
    cellSize = Math.sqrt(total / primitiveBoxes.length) * opts.cellSizeFactor;
  } else if (glyphBoxes.length > 0) {
    let total = 0;
    for (const box of glyphBoxes) total += box.maxY - box.minY;
    cellSize = (total / glyphBoxes.length) * opts.glyphCellSizeFactor;
  } else {
    // Nothing to index: a single cell
    return positiveOr1(Math.fround(Math.max(sceneWidth, sceneHeight)));
  }

  if (opts.cellSize <= 0 && sceneArea > 0) {
    const minSize = Math.sqrt(sceneArea / opts.maxCells);
    const maxSize = Math.sqrt(sceneArea / opts.minCells);
    cellSize = Math.min(maxSize, Math.max(minSize, cellSize));
  }

  // Never more than maxGridDim cells along either axis
  const longest = Math.max(sceneWidth, sceneHeight);
  if (longest / cellSize > opts.maxGridDim) {
    cellSize = longest / opts.maxGridDim;
  }

  return positiveOr1(Math.fround(cellSize));
}

function positiveOr1(cellSize: number): number {
  return Number.isFinite(cellSize) && cellSize > 0 ? cellSize : 1;
}

export class SpatialGrid {
  readonly bounds: AABB;
  readonly cellSize: number;
  readonly width: number;
  readonly height: number;
  private cells: number[][];
  private entryCount = 0;

  constructor(bounds: AABB, cellSize: number, maxGridDim: number = DEFAULT_GRID_OPTIONS.maxGridDim) {
    if (!(cellSize > 0)) {
      throw new RangeError(`Grid cell size must be positive, got ${cellSize}`);
    }
    this.bounds = { ...bounds };
    this.cellSize = cellSize;
    this.width = clampDim(Math.ceil((bounds.maxX - bounds.minX) / cellSize), maxGridDim);
    this.height = clampDim(Math.ceil((bounds.maxY - bounds.minY) / cellSize), maxGridDim);
    this.cells = Array.from({ length: this.width * this.height }, () => []);
  }

  get cellCount(): number {
    return this.width * this.height;
  }

  /** Total entries across all buckets (an entry in k cells counts k times) */
  get totalEntries(): number {
    return this.entryCount;
  }

  clear(): void {
    for (const cell of this.cells) cell.length = 0;
    this.entryCount = 0;
  }

  /**
   * Clamped cell column for a scene x coordinate.
   */
  cellX(x: number): number {
    return clampCell((x - this.bounds.minX) / this.cellSize, this.width);
  }

  /**
   * Clamped cell row for a scene y coordinate.
   */
  cellY(y: number): number {
    return clampCell((y - this.bounds.minY) / this.cellSize, this.height);
  }

  cellRange(box: AABB): CellRange {
    return {
      x0: this.cellX(box.minX),
      y0: this.cellY(box.minY),
      x1: this.cellX(box.maxX),
      y1: this.cellY(box.maxY),
    };
  }

  /**
   * Add an entry to every cell the box overlaps.
   */
  insert(box: AABB, entry: number): void {
    const { x0, y0, x1, y1 } = this.cellRange(box);
    for (let cy = y0; cy <= y1; cy++) {
      for (let cx = x0; cx <= x1; cx++) {
        this.cells[cy * this.width + cx]!.push(entry);
        this.entryCount++;
      }
    }
  }

  /**
   * Entries of the cell containing a point.
   */
  queryPoint(x: number, y: number): readonly number[] {
    return this.cells[this.cellY(y) * this.width + this.cellX(x)] ?? [];
  }

  /**
   * Entries of every cell overlapping a box, without duplicates, in first-seen order.
   */
  queryBox(box: AABB): number[] {
    const { x0, y0, x1, y1 } = this.cellRange(box);
    const seen = new Set<number>();
    for (let cy = y0; cy <= y1; cy++) {
      for (let cx = x0; cx <= x1; cx++) {
        for (const entry of this.cells[cy * this.width + cx]!) {
          seen.add(entry);
        }
      }
    }
    return [...seen];
  }

  /** Size of the serialized grid in words */
  get serializedWords(): number {
    return this.cellCount * 2 + this.entryCount;
  }

  /**
   * Serialize as `cellCount` bucket-start words (relative to `at`) followed
   * by one `[count, entries...]` bucket per cell.
   *
   * @returns Number of words written
   */
  write(target: Uint32Array, at: number): number {
    const cellCount = this.cellCount;
    let cursor = cellCount;

    for (let i = 0; i < cellCount; i++) {
      const cell = this.cells[i]!;
      target[at + i] = cursor;
      target[at + cursor] = cell.length;
      for (let j = 0; j < cell.length; j++) {
        target[at + cursor + 1 + j] = cell[j]!;
      }
      cursor += 1 + cell.length;
    }

    return cursor;
  }
}

function clampDim(cells: number, maxGridDim: number): number {
  return Math.min(Math.max(1, cells), maxGridDim);
}

/**
 * Cell coordinate for a position `v` measured in cells from the grid origin,
 * clamped into `[0, dim - 1]`.
 */
export function clampCell(v: number, dim: number): number {
  if (!(v > 0)) return 0;
  return Math.min(Math.floor(v), dim - 1);
}
