import { describe, it, expect, vi } from "vitest";
import { MemoryAllocator } from "./allocation/MemoryAllocator";
import { MemoryMetadataStore } from "./allocation/MemoryMetadataStore";
import type { AllocResult } from "./allocation/types";
import { PreconditionError } from "./errors";
import { decodeMetadata, SceneFlags } from "./layout/metadata";
import { SceneReader } from "./layout/SceneReader";
import { createWordViews, decodePrimitive } from "./primitives/codec";
import { PrimitiveType } from "./primitives/types";
import { PrimitiveBuffer } from "./PrimitiveBuffer";
import { SceneBuilder, type SceneLayout } from "./SceneBuilder";
import { FontRegistry } from "./text/FontRegistry";
import { createTestFont } from "./text/testFonts";

function setup(options: { fonts?: FontRegistry; allocator?: MemoryAllocator; metadata?: MemoryMetadataStore } = {}) {
  const buffer = new PrimitiveBuffer();
  buffer.setSceneBounds(0, 0, 100, 100);
  const allocator = options.allocator ?? new MemoryAllocator();
  const metadata = options.metadata ?? new MemoryMetadataStore();
  const builder = new SceneBuilder(buffer, allocator, metadata, 0, { fonts: options.fonts });
  return { buffer, allocator, metadata, builder };
}

function build(builder: SceneBuilder, allocator: MemoryAllocator): AllocResult<SceneLayout> {
  builder.calculate();
  builder.declareBufferNeeds();
  const committed = allocator.commitReservations();
  if (!committed.ok) return committed;
  const allocated = builder.allocateBuffers();
  if (!allocated.ok) return allocated;
  return builder.writeBuffers();
}

function unwrap<T>(result: AllocResult<T>): T {
  if (!result.ok) throw new Error(`${result.error.code}: ${result.error.detail}`);
  return result.value;
}

describe("SceneBuilder", () => {
  describe("single circle", () => {
    it("writes the offset table, record, grid and header", () => {
      const { buffer, allocator, metadata, builder } = setup();
      buffer.addCircle(0, 50, 50, 10, 0xff0000ff);

      const layout = unwrap(build(builder, allocator));

      expect(layout.prims).toMatchObject({ offset: 0, size: 40 });
      expect(layout.derived).toMatchObject({ offset: 48, size: 144 });
      expect(layout.metadata).toMatchObject({
        primitiveOffset: 0,
        primitiveCount: 1,
        gridOffset: 12,
        gridWidth: 4,
        gridHeight: 4,
        cellSize: 25,
        glyphOffset: 48,
        glyphCount: 0,
        sceneMaxX: 100,
      });

      const { u32, f32 } = createWordViews(allocator.bytes.buffer);
      expect(u32[0]).toBe(0);
      expect(u32[1]).toBe(PrimitiveType.Circle);
      expect(f32[3]).toBe(50);

      // Cell (1, 1) is bucket 5; its bucket starts 21 words into the grid
      expect(u32[12 + 5]).toBe(21);
      expect(u32[12 + 21]).toBe(1);
      expect(u32[12 + 22]).toBe(0);

      expect(decodeMetadata(metadata.read(layout.metadataHandle))).toEqual(layout.metadata);
    });

    it("marks both regions dirty", () => {
      const { buffer, allocator, builder } = setup();
      buffer.addCircle(0, 50, 50, 10, 0xff0000ff);

      unwrap(build(builder, allocator));

      expect(allocator.dirtyRanges).toEqual([
        { offset: 0, size: 40 },
        { offset: 48, size: 144 },
      ]);
      expect(builder.phase).toBe("written");
    });

    it("answers point queries from the grid", () => {
      const { buffer, allocator, builder } = setup();
      buffer.addCircle(0, 50, 50, 10, 0xff0000ff);
      unwrap(build(builder, allocator));

      const hits = builder.queryPoint(50, 50);
      expect(hits).toHaveLength(1);
      expect(hits[0]).toMatchObject({ kind: "primitive", index: 0, primitive: { type: PrimitiveType.Circle, r: 10 } });
      expect(builder.queryPoint(5, 5)).toEqual([]);
    });
  });

  describe("text", () => {
    function textScene() {
      const ctx = setup({ fonts: new FontRegistry(createTestFont()) });
      ctx.buffer.addText(10, 20, "AV", 10, 0xffffffff);
      return ctx;
    }

    it("writes glyph records after the grid", () => {
      const { allocator, builder } = textScene();

      const layout = unwrap(build(builder, allocator));

      expect(layout.metadata).toMatchObject({
        primitiveCount: 0,
        gridWidth: 5,
        gridHeight: 5,
        cellSize: 20,
        glyphCount: 2,
        glyphOffset: 56,
        flags: 0,
      });

      const { u32, f32 } = createWordViews(allocator.bytes.buffer);
      expect(f32[56]).toBe(11);
      expect(f32[57]).toBe(12);
      expect(u32[59]).toBe(0);
      expect(u32[60]).toBe(0xffffffff);
      expect(f32[61]).toBe(15);
      expect(u32[64]).toBe(1);
    });

    it("finds glyphs by point", () => {
      const { allocator, builder } = textScene();
      unwrap(build(builder, allocator));

      const hits = builder.queryPoint(12, 13);
      expect(hits.map((h) => [h.kind, h.index])).toEqual([
        ["glyph", 0],
        ["glyph", 1],
      ]);
    });

    it("selects glyphs and rewrites their records", () => {
      const { allocator, builder } = textScene();
      const layout = unwrap(build(builder, allocator));
      allocator.flush();

      expect(builder.findNearestGlyph(20, 17)).toBe(1);
      expect(builder.setSelectionRange(0, 1)).toBe(2);
      expect(builder.getSelectedText()).toBe("AV");

      const { u32 } = createWordViews(allocator.bytes.buffer);
      expect(u32[59]).toBe(0x02000000);
      expect(u32[64]).toBe(0x02000001);
      expect(allocator.dirtyRanges).toEqual([{ offset: layout.derived.offset, size: layout.derived.size }]);

      expect(builder.setSelectionRange(-1, -1)).toBe(0);
      expect(builder.getSelectedText()).toBe("");
      expect(u32[59]).toBe(0);
    });

    it("flags glyphs from registered fonts", () => {
      const fonts = new FontRegistry(createTestFont());
      fonts.register("Custom", createTestFont("Custom"));
      const { buffer, allocator, builder } = setup({ fonts });
      const fontId = buffer.addFontBlob(new Uint8Array([1, 2, 3]), "Custom");
      buffer.addText(10, 20, "A", 10, 0xffffffff, 0, fontId);
      buffer.setFlags(SceneFlags.ShowGrid);

      const layout = unwrap(build(builder, allocator));

      expect(layout.metadata.flags).toBe(SceneFlags.ShowGrid | SceneFlags.CustomAtlas);
    });

    it("produces no glyphs without a font service", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const { buffer, allocator, builder } = setup();
      buffer.addText(10, 20, "AV");

      const layout = unwrap(build(builder, allocator));

      expect(layout.metadata.glyphCount).toBe(0);
      expect(warn).toHaveBeenCalledWith("[GlyphShaper] No font for id -1 (no font service), text skipped");
    });

    it("measures text with the scene's fonts", () => {
      const { builder } = setup({ fonts: new FontRegistry(createTestFont()) });

      expect(builder.measureTextWidth("AV", 10)).toBe(12);
      expect(builder.fontAscent(20)).toBe(16);
      expect(builder.fontDescent(20)).toBe(4);
    });
  });

  describe("layout properties", () => {
    it("reaches every primitive from a query at its center", () => {
      const { buffer, allocator, builder } = setup();
      buffer.addCircle(0, 10, 10, 5, 1);
      buffer.addBox(1, 50, 50, 5, 5, 1);
      buffer.addEllipse(2, 90, 90, 5, 3, 1);
      unwrap(build(builder, allocator));

      const centers: [number, number][] = [
        [10, 10],
        [50, 50],
        [90, 90],
      ];
      centers.forEach(([x, y], i) => {
        expect(builder.queryPoint(x, y).some((h) => h.kind === "primitive" && h.index === i)).toBe(true);
      });
    });

    it("points every offset table entry at its record", () => {
      const { buffer, allocator, builder } = setup();
      buffer.addCircle(0, 10, 10, 5, 1);
      buffer.addBox(1, 50, 50, 5, 5, 2);
      buffer.addSegment(2, 0, 0, 100, 100, 3, 0, 2);
      const layout = unwrap(build(builder, allocator));

      const views = createWordViews(allocator.bytes.buffer);
      const base = layout.metadata.primitiveOffset;
      const count = layout.metadata.primitiveCount;
      expect(Array.from(views.u32.subarray(base, base + count))).toEqual([0, 9, 19]);

      for (let i = 0; i < count; i++) {
        const offset = views.u32[base + i]!;
        expect(decodePrimitive(views, base + count + offset)).toEqual(buffer.primitive(i));
      }
    });

    it("finds a primitive centered on the scene maximum", () => {
      const { buffer, allocator, builder } = setup();
      buffer.addCircle(0, 100, 100, 5, 1);
      const layout = unwrap(build(builder, allocator));

      expect(builder.queryPoint(100, 100).map((h) => [h.kind, h.index])).toEqual([["primitive", 0]]);

      const reader = new SceneReader(allocator.bytes.buffer, layout.metadata);
      const hits = reader.queryPoint(100, 100);
      expect(hits).toHaveLength(1);
      expect(hits[0]).toMatchObject({ kind: "primitive", index: 0, primitive: { cx: 100, cy: 100, r: 5 } });
    });

    it("clamps boxes crossing the scene edge into the border cells", () => {
      const { buffer, allocator, builder } = setup();
      buffer.addBox(0, 95, 95, 10, 10, 1);
      unwrap(build(builder, allocator));

      expect(builder.queryPoint(100, 100)).toHaveLength(1);
      expect(builder.queryPoint(150, 150)).toHaveLength(1);
      expect(builder.queryPoint(-5, -5)).toEqual([]);
    });

    it("writes identical bytes after clear and re-adding the same content", () => {
      const { buffer, allocator, metadata, builder } = setup({ fonts: new FontRegistry(createTestFont()) });
      const fill = () => {
        buffer.addCircle(0, 20, 20, 8, 0xff00ff00);
        buffer.addTriangle(1, 40, 40, 60, 40, 50, 60, 0xffff0000, 0xff000000, 1);
        buffer.addText(10, 90, "AVA", 10);
      };

      fill();
      const first = unwrap(build(builder, allocator));
      const storage = allocator.bytes.slice();
      const header = metadata.read(first.metadataHandle);

      buffer.clear();
      fill();
      const second = unwrap(build(builder, allocator));

      expect(allocator.bytes).toEqual(storage);
      expect(metadata.read(second.metadataHandle)).toEqual(header);
    });

    it.each([0, 1, 10000])("writes a 64-byte header for %i primitives", (count) => {
      const buffer = new PrimitiveBuffer();
      buffer.setSceneBounds(0, 0, 1000, 1000);
      const allocator = new MemoryAllocator();
      const metadata = new MemoryMetadataStore();
      const builder = new SceneBuilder(buffer, allocator, metadata, 0);
      for (let i = 0; i < count; i++) {
        buffer.addCircle(i, (i % 100) * 10 + 5, Math.floor(i / 100) * 10 + 5, 1, 0xffffffff);
      }

      const layout = unwrap(build(builder, allocator));
      const header = metadata.read(layout.metadataHandle);

      expect(header.byteLength).toBe(64);
      expect(decodeMetadata(header).primitiveCount).toBe(count);
    });

    it("forgets cleared content on the next build", () => {
      const { buffer, allocator, builder } = setup({ fonts: new FontRegistry(createTestFont()) });
      buffer.setBgColor(0xff202020);
      buffer.addCircle(0, 20, 20, 10, 1);
      buffer.addCircle(1, 80, 80, 10, 1);
      buffer.addText(10, 50, "AV", 10);
      unwrap(build(builder, allocator));

      buffer.clear();
      buffer.addCircle(0, 50, 50, 10, 1);
      const layout = unwrap(build(builder, allocator));

      expect(layout.metadata).toMatchObject({
        primitiveCount: 1,
        glyphCount: 0,
        cellSize: 25,
        sceneMinX: 0,
        sceneMinY: 0,
        sceneMaxX: 100,
        sceneMaxY: 100,
        bgColor: 0xff202020,
      });
      expect(builder.queryPoint(20, 20)).toEqual([]);
      expect(builder.queryPoint(80, 80)).toEqual([]);
      expect(builder.queryPoint(50, 50)).toHaveLength(1);
    });

    it("writes the viewport size into the header", () => {
      const { allocator, builder } = setup();
      builder.setViewport(80, 24);

      const layout = unwrap(build(builder, allocator));

      expect(layout.metadata.widthCells).toBe(80);
      expect(layout.metadata.heightCells).toBe(24);
    });
  });

  describe("shared allocator", () => {
    function sharedScene(slot: number, allocator: MemoryAllocator, metadata: MemoryMetadataStore, at: number) {
      const buffer = new PrimitiveBuffer();
      buffer.setSceneBounds(0, 0, 100, 100);
      buffer.addCircle(0, at, at, 10, 1);
      return new SceneBuilder(buffer, allocator, metadata, slot);
    }

    it("keeps the regions of builders in different slots apart", () => {
      const allocator = new MemoryAllocator();
      const metadata = new MemoryMetadataStore();
      const a = sharedScene(0, allocator, metadata, 10);
      const b = sharedScene(1, allocator, metadata, 90);

      a.calculate();
      b.calculate();
      a.declareBufferNeeds();
      b.declareBufferNeeds();
      unwrap(allocator.commitReservations());
      unwrap(a.allocateBuffers());
      unwrap(b.allocateBuffers());
      const layoutA = unwrap(a.writeBuffers());
      const layoutB = unwrap(b.writeBuffers());

      expect(layoutA.prims.offset).not.toBe(layoutB.prims.offset);
      expect(layoutA.metadataHandle.offset).not.toBe(layoutB.metadataHandle.offset);
      expect(new SceneReader(allocator.bytes.buffer, layoutA.metadata).primitive(0)).toMatchObject({ cx: 10, cy: 10 });
      expect(new SceneReader(allocator.bytes.buffer, layoutB.metadata).primitive(0)).toMatchObject({ cx: 90, cy: 90 });
    });

    it("fails the second builder on a shared slot", () => {
      const allocator = new MemoryAllocator();
      const metadata = new MemoryMetadataStore();
      const a = sharedScene(0, allocator, metadata, 10);
      const b = sharedScene(0, allocator, metadata, 90);

      a.calculate();
      b.calculate();
      a.declareBufferNeeds();
      b.declareBufferNeeds();
      unwrap(allocator.commitReservations());
      unwrap(a.allocateBuffers());

      expect(b.allocateBuffers()).toEqual({
        ok: false,
        error: { code: "ALLOC_BUFFER", detail: "0:prims already allocated since the last commit" },
      });
      expect(b.phase).toBe("uncomputed");
    });
  });

  describe("phases", () => {
    it("requires scene bounds", () => {
      const builder = new SceneBuilder(new PrimitiveBuffer(), new MemoryAllocator(), new MemoryMetadataStore(), 0);

      expect(() => builder.calculate()).toThrow("Scene bounds must be set before calculate()");
      expect(builder.phase).toBe("uncomputed");
    });

    it("rejects phases called out of order", () => {
      const { builder } = setup();

      expect(() => builder.declareBufferNeeds()).toThrow(PreconditionError);
      expect(() => builder.allocateBuffers()).toThrow(
        'allocateBuffers() requires phase "declared", builder is "uncomputed"'
      );

      builder.calculate();
      expect(() => builder.writeBuffers()).toThrow(
        'writeBuffers() requires phase "allocated", builder is "calculated"'
      );
    });

    it("rejects primitives added after calculate()", () => {
      const { buffer, allocator, builder } = setup();
      buffer.addCircle(0, 50, 50, 10, 1);
      builder.calculate();
      builder.declareBufferNeeds();
      unwrap(allocator.commitReservations());
      unwrap(builder.allocateBuffers());

      buffer.addCircle(1, 20, 20, 10, 1);

      expect(() => builder.writeBuffers()).toThrow("Primitives changed after calculate()");
      expect(builder.phase).toBe("uncomputed");
    });

    it("resets when buffer allocation fails", () => {
      const { buffer, builder } = setup();
      buffer.addCircle(0, 50, 50, 10, 1);
      builder.calculate();
      builder.declareBufferNeeds();

      const result = builder.allocateBuffers();

      expect(result).toEqual({
        ok: false,
        error: { code: "ALLOC_BUFFER", detail: "No space for 40 bytes (0:prims): 0 of 0 free" },
      });
      expect(builder.phase).toBe("uncomputed");
      expect(() => builder.writeBuffers()).toThrow(PreconditionError);
    });

    it("resets when the metadata slot cannot be allocated", () => {
      const { builder, allocator } = setup({ metadata: new MemoryMetadataStore(0) });

      const result = build(builder, allocator);

      expect(result.ok).toBe(false);
      expect(result.ok ? undefined : result.error.code).toBe("ALLOC_METADATA");
      expect(builder.phase).toBe("uncomputed");
    });

    it("keeps the last successful build after a failure", () => {
      const { buffer, allocator, builder } = setup();
      buffer.addCircle(0, 50, 50, 10, 1);
      const layout = unwrap(build(builder, allocator));

      // Allocate again without committing: the slot's handles are taken
      for (let i = 1; i < 20; i++) buffer.addCircle(i, 10, 10, 2, 1);
      builder.calculate();
      builder.declareBufferNeeds();
      expect(builder.allocateBuffers().ok).toBe(false);

      expect(builder.lastLayout).toBe(layout);
      expect(builder.queryPoint(50, 50)).toHaveLength(1);
    });
  });
});
