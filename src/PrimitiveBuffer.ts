/**
 * Primitive Buffer
 *
 * Append-only store of SDF draw commands and text spans for one scene.
 * Primitives are kept as their final word records; text is kept as spans and
 * shaped later by the scene builder.
 *
 * GPU layout written by writeGPU():
 *
 *   [offset table: primCount words][record 0][record 1]...
 *
 * Each table entry is the word offset of a record relative to the end of the
 * table (primDataBase).
 */

import { PreconditionError } from "./errors";
import { decodePrimitive, encodePrimitive } from "./primitives/codec";
import {
  PrimitiveType,
  primitiveWordCount,
  type AABB,
  type Primitive,
} from "./primitives/types";
import { DEFAULT_TEXT_STYLE, type FontBlob, type TextSpan } from "./text/types";
import { WordArena } from "./WordArena";

export class PrimitiveBuffer {
  private readonly arena: WordArena;
  /** Arena word offset of each primitive record */
  private readonly offsets: number[] = [];
  private readonly spans: TextSpan[] = [];
  private readonly fonts: FontBlob[] = [];
  private bounds: AABB | undefined;
  private background = 0;
  private sceneFlags = 0;

  constructor(initialCapacity: number = 256) {
    this.arena = new WordArena(initialCapacity);
  }

  /** Number of primitives */
  get primCount(): number {
    return this.offsets.length;
  }

  /** Number of text spans */
  get textCount(): number {
    return this.spans.length;
  }

  /** Total record words over all primitives */
  get totalWords(): number {
    return this.arena.count;
  }

  /**
   * Word offset of each record relative to primDataBase, as writeGPU() lays
   * them out.
   */
  get recordOffsets(): readonly number[] {
    return this.offsets;
  }

  get textSpans(): readonly TextSpan[] {
    return this.spans;
  }

  get fontBlobs(): readonly FontBlob[] {
    return this.fonts;
  }

  // ---------------------------------------------------------------------------
  // Primitives
  // ---------------------------------------------------------------------------

  addCircle(
    id: number,
    cx: number,
    cy: number,
    r: number,
    fill: number,
    stroke = 0,
    strokeWidth = 0,
    round = 0,
    layer = id
  ): number {
    return this.addPrimitive(id, {
      type: PrimitiveType.Circle,
      layer,
      cx,
      cy,
      r,
      fill,
      stroke,
      strokeWidth,
      round,
    });
  }

  /**
   * Add an axis-aligned box given its center and half extents.
   */
  addBox(
    id: number,
    cx: number,
    cy: number,
    hw: number,
    hh: number,
    fill: number,
    stroke = 0,
    strokeWidth = 0,
    round = 0,
    layer = id
  ): number {
    return this.addPrimitive(id, {
      type: PrimitiveType.Box,
      layer,
      cx,
      cy,
      hw,
      hh,
      fill,
      stroke,
      strokeWidth,
      round,
    });
  }

  /**
   * Add a box with a separate radius per corner.
   */
  addRoundedBox(
    id: number,
    cx: number,
    cy: number,
    hw: number,
    hh: number,
    radii: readonly [number, number, number, number],
    fill: number,
    stroke = 0,
    strokeWidth = 0,
    round = 0,
    layer = id
  ): number {
    return this.addPrimitive(id, {
      type: PrimitiveType.RoundedBox,
      layer,
      cx,
      cy,
      hw,
      hh,
      radii: [radii[0], radii[1], radii[2], radii[3]],
      fill,
      stroke,
      strokeWidth,
      round,
    });
  }

  addSegment(
    id: number,
    x0: number,
    y0: number,
    x1: number,
    y1: number,
    fill: number,
    stroke = 0,
    strokeWidth = 0,
    round = 0,
    layer = id
  ): number {
    return this.addPrimitive(id, {
      type: PrimitiveType.Segment,
      layer,
      x0,
      y0,
      x1,
      y1,
      fill,
      stroke,
      strokeWidth,
      round,
    });
  }

  addTriangle(
    id: number,
    ax: number,
    ay: number,
    bx: number,
    by: number,
    cx: number,
    cy: number,
    fill: number,
    stroke = 0,
    strokeWidth = 0,
    round = 0,
    layer = id
  ): number {
    return this.addPrimitive(id, {
      type: PrimitiveType.Triangle,
      layer,
      ax,
      ay,
      bx,
      by,
      cx,
      cy,
      fill,
      stroke,
      strokeWidth,
      round,
    });
  }

  /**
   * Add a quadratic Bézier curve from (ax, ay) through control point (bx, by) to (cx, cy).
   */
  addBezier2(
    id: number,
    ax: number,
    ay: number,
    bx: number,
    by: number,
    cx: number,
    cy: number,
    fill: number,
    stroke = 0,
    strokeWidth = 0,
    round = 0,
    layer = id
  ): number {
    return this.addPrimitive(id, {
      type: PrimitiveType.Bezier2,
      layer,
      ax,
      ay,
      bx,
      by,
      cx,
      cy,
      fill,
      stroke,
      strokeWidth,
      round,
    });
  }

  /**
   * Add a cubic Bézier curve from (ax, ay) to (dx, dy).
   */
  addBezier3(
    id: number,
    ax: number,
    ay: number,
    bx: number,
    by: number,
    cx: number,
    cy: number,
    dx: number,
    dy: number,
    fill: number,
    stroke = 0,
    strokeWidth = 0,
    round = 0,
    layer = id
  ): number {
    return this.addPrimitive(id, {
      type: PrimitiveType.Bezier3,
      layer,
      ax,
      ay,
      bx,
      by,
      cx,
      cy,
      dx,
      dy,
      fill,
      stroke,
      strokeWidth,
      round,
    });
  }

  addEllipse(
    id: number,
    cx: number,
    cy: number,
    rx: number,
    ry: number,
    fill: number,
    stroke = 0,
    strokeWidth = 0,
    round = 0,
    layer = id
  ): number {
    return this.addPrimitive(id, {
      type: PrimitiveType.Ellipse,
      layer,
      cx,
      cy,
      rx,
      ry,
      fill,
      stroke,
      strokeWidth,
      round,
    });
  }

  /**
   * Add a circular arc of radius `ra` and thickness `rb`, symmetric about the
   * vertical axis, with an aperture given by the sine and cosine of its half angle.
   */
  addArc(
    id: number,
    cx: number,
    cy: number,
    sin: number,
    cos: number,
    ra: number,
    rb: number,
    fill: number,
    stroke = 0,
    strokeWidth = 0,
    round = 0,
    layer = id
  ): number {
    return this.addPrimitive(id, {
      type: PrimitiveType.Arc,
      layer,
      cx,
      cy,
      sin,
      cos,
      ra,
      rb,
      fill,
      stroke,
      strokeWidth,
      round,
    });
  }

  /**
   * Append a decoded primitive record.
   *
   * @param id - Must equal the current primitive count
   * @returns The primitive's id
   */
  addPrimitive(id: number, primitive: Primitive): number {
    if (id !== this.offsets.length) {
      throw new PreconditionError(
        `Primitive id ${id} does not match insertion index ${this.offsets.length}`
      );
    }

    const at = this.arena.allocate(primitiveWordCount(primitive.type));
    encodePrimitive(primitive, this.arena.words, at);
    this.offsets.push(at);
    return id;
  }

  /**
   * Decode primitive `index`.
   */
  primitive(index: number): Primitive | undefined {
    const at = this.offsets[index];
    return at === undefined ? undefined : decodePrimitive(this.arena.words, at);
  }

  /**
   * Copy of the record words of primitive `index`.
   */
  primitiveWords(index: number): Uint32Array {
    const at = this.offsets[index];
    if (at === undefined) return new Uint32Array(0);
    const end = this.offsets[index + 1] ?? this.arena.count;
    return this.arena.slice(at, end);
  }

  forEachPrimitive(callback: (primitive: Primitive, index: number) => void): void {
    for (let i = 0; i < this.offsets.length; i++) {
      const primitive = this.primitive(i);
      if (primitive) callback(primitive, i);
    }
  }

  // ---------------------------------------------------------------------------
  // Text
  // ---------------------------------------------------------------------------

  /**
   * Add a run of text starting at pen position (x, y) on the baseline.
   * Glyphs are produced when the scene is built.
   *
   * @returns Index of the span
   */
  addText(
    x: number,
    y: number,
    text: string,
    fontSize: number = DEFAULT_TEXT_STYLE.fontSize,
    color: number = DEFAULT_TEXT_STYLE.color,
    layer: number = DEFAULT_TEXT_STYLE.layer,
    fontId: number = DEFAULT_TEXT_STYLE.fontId
  ): number {
    this.spans.push({ x, y, text, fontSize, color: color >>> 0, layer, fontId });
    return this.spans.length - 1;
  }

  /**
   * Register raw font data for later use by text spans.
   *
   * Fonts survive clear().
   *
   * @returns Font id to pass to addText
   */
  addFontBlob(data: Uint8Array, name: string): number {
    const id = this.fonts.length;
    this.fonts.push({ id, name, data: data.slice() });
    return id;
  }

  // ---------------------------------------------------------------------------
  // Scene configuration (survives clear())
  // ---------------------------------------------------------------------------

  setSceneBounds(minX: number, minY: number, maxX: number, maxY: number): void {
    if (!(maxX >= minX && maxY >= minY)) {
      throw new RangeError(`Invalid scene bounds (${minX}, ${minY}) - (${maxX}, ${maxY})`);
    }
    this.bounds = { minX, minY, maxX, maxY };
  }

  get sceneBounds(): Readonly<AABB> | undefined {
    return this.bounds;
  }

  hasSceneBounds(): boolean {
    return this.bounds !== undefined;
  }

  setBgColor(color: number): void {
    this.background = color >>> 0;
  }

  get bgColor(): number {
    return this.background;
  }

  setFlags(flags: number): void {
    this.sceneFlags = flags >>> 0;
  }

  addFlags(flags: number): void {
    this.sceneFlags = (this.sceneFlags | flags) >>> 0;
  }

  get flags(): number {
    return this.sceneFlags;
  }

  /**
   * Drop all primitives and text spans and release their storage. Scene
   * bounds, background color, flags and registered fonts are kept.
   */
  clear(): void {
    this.offsets.length = 0;
    this.spans.length = 0;
    this.arena.release();
  }

  // ---------------------------------------------------------------------------
  // GPU layout
  // ---------------------------------------------------------------------------

  /**
   * Bytes needed by writeGPU(): one offset word per primitive plus every record.
   */
  gpuBufferSize(): number {
    return (this.offsets.length + this.arena.count) * 4;
  }

  /**
   * Write the offset table and records.
   *
   * @param target - Destination, at least gpuBufferSize() / 4 words long
   * @returns Word offset of each record relative to primDataBase
   */
  writeGPU(target: Uint32Array): number[] {
    const count = this.offsets.length;
    const words = this.arena.count;
    if (target.length < count + words) {
      throw new RangeError(
        `GPU target holds ${target.length} words, ${count + words} needed`
      );
    }

    // Records are stored back to back, so arena offsets are already relative
    // to the start of the payload region
    const recordOffsets = this.offsets.slice();
    for (let i = 0; i < count; i++) {
      target[i] = recordOffsets[i]!;
    }
    target.set(this.arena.words.u32.subarray(0, words), count);
    return recordOffsets;
  }
}
