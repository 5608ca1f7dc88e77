import { describe, it, expect } from "vitest";
import { PrimitiveBuffer } from "../PrimitiveBuffer";
import { PrimitiveType } from "../primitives/types";
import { addPolygon } from "./polygon";
import type { Coord } from "./types";

const square: Coord[] = [
  [0, 0],
  [10, 0],
  [10, 10],
  [0, 10],
];

describe("addPolygon", () => {
  it("fills with triangles", () => {
    const buffer = new PrimitiveBuffer();

    const ids = addPolygon(buffer, square, [], { fill: [1, 0, 0, 1] });

    expect(ids).toEqual([0, 1]);
    expect(buffer.primitive(0)).toMatchObject({ type: PrimitiveType.Triangle, fill: 0xff0000ff, layer: 0 });
    expect(buffer.primitive(1)).toMatchObject({ type: PrimitiveType.Triangle, layer: 1 });
  });

  it("outlines every ring with segments", () => {
    const buffer = new PrimitiveBuffer();
    buffer.addCircle(0, 50, 50, 5, 0xffffffff);

    const ids = addPolygon(buffer, [...square, [0, 0]], [], {
      fill: 0xff00ff00,
      stroke: 0xff000000,
      strokeWidth: 2,
      layer: 4,
    });

    expect(ids).toEqual([1, 2, 3, 4, 5, 6]);
    expect(buffer.primitive(3)).toEqual({
      type: PrimitiveType.Segment,
      layer: 4,
      x0: 0,
      y0: 0,
      x1: 10,
      y1: 0,
      fill: 0,
      stroke: 0xff000000,
      strokeWidth: 2,
      round: 0,
    });
    expect(buffer.primitive(6)).toMatchObject({ x0: 0, y0: 10, x1: 0, y1: 0 });
  });

  it("skips the outline without a stroke width", () => {
    const buffer = new PrimitiveBuffer();

    const ids = addPolygon(buffer, square, [], { fill: 0xff00ff00, stroke: 0xff000000 });

    expect(ids).toHaveLength(2);
  });
});
