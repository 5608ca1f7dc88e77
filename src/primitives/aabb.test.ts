import { describe, it, expect } from "vitest";
import { primitiveAABB, unionAABB, aabbArea, aabbOverlap, aabbContains } from "./aabb";
import { PrimitiveType, type PrimitiveStyle } from "./types";

const noStroke: PrimitiveStyle = { fill: 0xffffffff, stroke: 0, strokeWidth: 0, round: 0 };
const stroked: PrimitiveStyle = { fill: 0xffffffff, stroke: 0xff000000, strokeWidth: 4, round: 0 };

describe("primitiveAABB", () => {
  it("bounds a circle by its radius plus half the stroke", () => {
    const box = primitiveAABB({ type: PrimitiveType.Circle, layer: 0, cx: 50, cy: 50, r: 10, ...stroked });

    expect(box).toEqual({ minX: 38, minY: 38, maxX: 62, maxY: 62 });
  });

  it("grows a box by its corner rounding", () => {
    const box = primitiveAABB({
      type: PrimitiveType.Box,
      layer: 0,
      cx: 10,
      cy: 20,
      hw: 5,
      hh: 2,
      ...noStroke,
      round: 1,
    });

    expect(box).toEqual({ minX: 4, minY: 17, maxX: 16, maxY: 23 });
  });

  it("grows a rounded box by its largest radius", () => {
    const box = primitiveAABB({
      type: PrimitiveType.RoundedBox,
      layer: 0,
      cx: 100,
      cy: 200,
      hw: 40,
      hh: 30,
      radii: [5, 6, 7, 8],
      ...noStroke,
      strokeWidth: 2,
    });

    expect(box).toEqual({ minX: 51, minY: 161, maxX: 149, maxY: 239 });
  });

  it("bounds a triangle by its vertices", () => {
    const box = primitiveAABB({
      type: PrimitiveType.Triangle,
      layer: 0,
      ax: 0,
      ay: 10,
      bx: 20,
      by: 0,
      cx: 5,
      cy: 30,
      ...stroked,
    });

    expect(box).toEqual({ minX: -2, minY: -2, maxX: 22, maxY: 32 });
  });

  it("bounds a segment by its endpoints", () => {
    const box = primitiveAABB({
      type: PrimitiveType.Segment,
      layer: 0,
      x0: 30,
      y0: 5,
      x1: 10,
      y1: 15,
      ...noStroke,
    });

    expect(box).toEqual({ minX: 10, minY: 5, maxX: 30, maxY: 15 });
  });

  it("bounds a cubic curve by its control points", () => {
    const box = primitiveAABB({
      type: PrimitiveType.Bezier3,
      layer: 0,
      ax: 0,
      ay: 0,
      bx: 10,
      by: -20,
      cx: 20,
      cy: 20,
      dx: 30,
      dy: 0,
      ...noStroke,
    });

    expect(box).toEqual({ minX: 0, minY: -20, maxX: 30, maxY: 20 });
  });

  it("bounds an ellipse per axis", () => {
    const box = primitiveAABB({
      type: PrimitiveType.Ellipse,
      layer: 0,
      cx: 0,
      cy: 0,
      rx: 8,
      ry: 3,
      ...stroked,
    });

    expect(box).toEqual({ minX: -10, minY: -5, maxX: 10, maxY: 5 });
  });

  it("bounds an arc by the larger of radius and thickness", () => {
    const box = primitiveAABB({
      type: PrimitiveType.Arc,
      layer: 0,
      cx: 10,
      cy: 10,
      sin: 1,
      cos: 0,
      ra: 6,
      rb: 2,
      ...noStroke,
    });

    expect(box).toEqual({ minX: 4, minY: 4, maxX: 16, maxY: 16 });
  });
});

describe("box helpers", () => {
  const a = { minX: 0, minY: 0, maxX: 10, maxY: 10 };
  const b = { minX: 10, minY: 5, maxX: 20, maxY: 8 };

  it("unions boxes", () => {
    expect(unionAABB(a, b)).toEqual({ minX: 0, minY: 0, maxX: 20, maxY: 10 });
  });

  it("computes area", () => {
    expect(aabbArea(b)).toBe(30);
  });

  it("treats touching edges as overlap", () => {
    expect(aabbOverlap(a, b)).toBe(true);
    expect(aabbOverlap(a, { minX: 11, minY: 0, maxX: 12, maxY: 1 })).toBe(false);
  });

  it("contains points on its edge", () => {
    expect(aabbContains(a, 10, 10)).toBe(true);
    expect(aabbContains(a, 10.5, 10)).toBe(false);
  });
});
