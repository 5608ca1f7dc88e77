/**
 * Scene serialization
 *
 * Saves the content of a PrimitiveBuffer (primitives, text spans, fonts and
 * scene settings) as a little-endian byte stream, independent of any GPU
 * layout. Every section starts on a 4-byte boundary.
 *
 *   "SDFS" u32 version
 *   u32 hasBounds  f64 minX minY maxX maxY  u32 bgColor  u32 flags
 *   u32 primCount  u32 wordCount  u32 words[wordCount]
 *   u32 fontCount  { string name  u32 byteLength  bytes (padded) }[]
 *   u32 spanCount  { f64 x y fontSize  u32 color  i32 layer  i32 fontId  string text }[]
 *
 * Strings are a u32 byte length followed by UTF-8 bytes padded to 4.
 */

import { fail, ok, type ErrorDetail, type Result } from "./errors";
import { createWordViews, decodePrimitive } from "./primitives/codec";
import { isPrimitiveType, primitiveWordCount } from "./primitives/types";
import { PrimitiveBuffer } from "./PrimitiveBuffer";

export const SCENE_MAGIC = "SDFS";
export const SCENE_FORMAT_VERSION = 1;

export type DeserializeErrorCode = "BAD_MAGIC" | "BAD_VERSION" | "TRUNCATED" | "BAD_PRIMITIVE" | "BAD_BOUNDS";

export type DeserializeResult = Result<PrimitiveBuffer, ErrorDetail<DeserializeErrorCode>>;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** The magic bytes read as one little-endian word */
const MAGIC_WORD = new DataView(encoder.encode(SCENE_MAGIC).buffer).getUint32(0, true);

function pad4(n: number): number {
  return (n + 3) & ~3;
}

class ByteWriter {
  private bytes = new Uint8Array(256);
  private view = new DataView(this.bytes.buffer);
  private cursor = 0;

  u32(value: number): void {
    this.ensure(4);
    this.view.setUint32(this.cursor, value >>> 0, true);
    this.cursor += 4;
  }

  i32(value: number): void {
    this.ensure(4);
    this.view.setInt32(this.cursor, value, true);
    this.cursor += 4;
  }

  f64(value: number): void {
    this.ensure(8);
    this.view.setFloat64(this.cursor, value, true);
    this.cursor += 8;
  }

  /** Length-prefixed bytes, zero padded to 4 */
  blob(data: Uint8Array): void {
    this.u32(data.byteLength);
    const padded = pad4(data.byteLength);
    this.ensure(padded);
    this.bytes.set(data, this.cursor);
    this.cursor += padded;
  }

  string(text: string): void {
    this.blob(encoder.encode(text));
  }

  finish(): Uint8Array {
    return this.bytes.slice(0, this.cursor);
  }

  private ensure(extra: number): void {
    const needed = this.cursor + extra;
    if (needed <= this.bytes.byteLength) return;

    let capacity = this.bytes.byteLength * 2;
    while (capacity < needed) capacity *= 2;
    const grown = new Uint8Array(capacity);
    grown.set(this.bytes.subarray(0, this.cursor));
    this.bytes = grown;
    this.view = new DataView(grown.buffer);
  }
}

/** Thrown by ByteReader when the input ends early; never escapes this module */
class TruncatedError extends Error {}

class ByteReader {
  private readonly view: DataView;
  private cursor = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.bytes.byteLength - this.cursor;
  }

  u32(): number {
    this.need(4);
    const value = this.view.getUint32(this.cursor, true);
    this.cursor += 4;
    return value;
  }

  i32(): number {
    this.need(4);
    const value = this.view.getInt32(this.cursor, true);
    this.cursor += 4;
    return value;
  }

  f64(): number {
    this.need(8);
    const value = this.view.getFloat64(this.cursor, true);
    this.cursor += 8;
    return value;
  }

  blob(): Uint8Array {
    const length = this.u32();
    this.need(pad4(length));
    const data = this.bytes.slice(this.cursor, this.cursor + length);
    this.cursor += pad4(length);
    return data;
  }

  string(): string {
    return decoder.decode(this.blob());
  }

  private need(count: number): void {
    if (this.cursor + count > this.bytes.byteLength) {
      throw new TruncatedError(`Need ${count} bytes at offset ${this.cursor}`);
    }
  }
}

/**
 * Serialize a buffer's content.
 */
export function serializeScene(buffer: PrimitiveBuffer): Uint8Array {
  const out = new ByteWriter();

  out.u32(MAGIC_WORD);
  out.u32(SCENE_FORMAT_VERSION);

  const bounds = buffer.sceneBounds;
  out.u32(bounds ? 1 : 0);
  out.f64(bounds?.minX ?? 0);
  out.f64(bounds?.minY ?? 0);
  out.f64(bounds?.maxX ?? 0);
  out.f64(bounds?.maxY ?? 0);
  out.u32(buffer.bgColor);
  out.u32(buffer.flags);

  out.u32(buffer.primCount);
  out.u32(buffer.totalWords);
  for (let i = 0; i < buffer.primCount; i++) {
    for (const word of buffer.primitiveWords(i)) out.u32(word);
  }

  out.u32(buffer.fontBlobs.length);
  for (const font of buffer.fontBlobs) {
    out.string(font.name);
    out.blob(font.data);
  }

  out.u32(buffer.textSpans.length);
  for (const span of buffer.textSpans) {
    out.f64(span.x);
    out.f64(span.y);
    out.f64(span.fontSize);
    out.u32(span.color);
    out.i32(span.layer);
    out.i32(span.fontId);
    out.string(span.text);
  }

  return out.finish();
}

/**
 * Rebuild a PrimitiveBuffer from serializeScene() output.
 */
export function deserializeScene(bytes: Uint8Array): DeserializeResult {
  const input = new ByteReader(bytes);
  try {
    return readScene(input);
  } catch (err) {
    if (err instanceof TruncatedError) {
      return fail("TRUNCATED", `Scene data ends at ${bytes.byteLength} bytes: ${err.message}`);
    }
    throw err;
  }
}

function readScene(input: ByteReader): DeserializeResult {
  if (input.u32() !== MAGIC_WORD) {
    return fail("BAD_MAGIC", `Expected "${SCENE_MAGIC}" header`);
  }
  const version = input.u32();
  if (version !== SCENE_FORMAT_VERSION) {
    return fail("BAD_VERSION", `Unsupported scene format version ${version}`);
  }

  const buffer = new PrimitiveBuffer();

  const hasBounds = input.u32() !== 0;
  const minX = input.f64();
  const minY = input.f64();
  const maxX = input.f64();
  const maxY = input.f64();
  if (hasBounds) {
    if (!(maxX >= minX && maxY >= minY)) {
      return fail("BAD_BOUNDS", `Invalid scene bounds (${minX}, ${minY}) - (${maxX}, ${maxY})`);
    }
    buffer.setSceneBounds(minX, minY, maxX, maxY);
  }
  buffer.setBgColor(input.u32());
  buffer.setFlags(input.u32());

  const primCount = input.u32();
  const wordCount = input.u32();
  if (wordCount * 4 > input.remaining) {
    return fail("TRUNCATED", `Scene data ends before ${wordCount} primitive words`);
  }
  const words = new Uint32Array(wordCount);
  for (let i = 0; i < wordCount; i++) words[i] = input.u32();

  const views = createWordViews(words.buffer);
  let at = 0;
  for (let id = 0; id < primCount; id++) {
    const type = words[at];
    if (type === undefined || !isPrimitiveType(type)) {
      return fail("BAD_PRIMITIVE", `Primitive ${id} has unknown type ${type ?? "(missing)"}`);
    }
    const primitive = decodePrimitive(views, at);
    if (!primitive) {
      return fail("BAD_PRIMITIVE", `Primitive ${id} is cut off at word ${at}`);
    }
    buffer.addPrimitive(id, primitive);
    at += primitiveWordCount(type);
  }
  if (at !== wordCount) {
    return fail("BAD_PRIMITIVE", `${wordCount - at} words left after ${primCount} primitives`);
  }

  const fontCount = input.u32();
  for (let i = 0; i < fontCount; i++) {
    const name = input.string();
    buffer.addFontBlob(input.blob(), name);
  }

  const spanCount = input.u32();
  for (let i = 0; i < spanCount; i++) {
    const x = input.f64();
    const y = input.f64();
    const fontSize = input.f64();
    const color = input.u32();
    const layer = input.i32();
    const fontId = input.i32();
    buffer.addText(x, y, input.string(), fontSize, color, layer, fontId);
  }

  return ok(buffer);
}
