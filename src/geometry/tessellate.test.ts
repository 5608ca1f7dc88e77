import { describe, it, expect } from "vitest";
import { openRing, tessellatePolygon } from "./tessellate";
import type { Coord } from "./types";

function triangleArea(v: number[], a: number, b: number, c: number): number {
  const [ax, ay, bx, by, cx, cy] = [v[a * 2]!, v[a * 2 + 1]!, v[b * 2]!, v[b * 2 + 1]!, v[c * 2]!, v[c * 2 + 1]!];
  return Math.abs((bx - ax) * (cy - ay) - (cx - ax) * (by - ay)) / 2;
}

describe("openRing", () => {
  it("drops a repeated closing point", () => {
    const ring: Coord[] = [
      [0, 0],
      [1, 0],
      [1, 1],
      [0, 0],
    ];
    expect(openRing(ring)).toEqual([
      [0, 0],
      [1, 0],
      [1, 1],
    ]);
  });

  it("leaves open rings alone", () => {
    const ring: Coord[] = [
      [0, 0],
      [1, 0],
      [1, 1],
    ];
    expect(openRing(ring)).toBe(ring);
  });
});

describe("tessellatePolygon", () => {
  it("tessellates a closed square into 2 triangles", () => {
    const result = tessellatePolygon([
      [0, 0],
      [10, 0],
      [10, 10],
      [0, 10],
      [0, 0],
    ]);

    expect(result.vertices).toHaveLength(8);
    expect(result.indices).toHaveLength(6);
  });

  it("leaves holes uncovered", () => {
    const outer: Coord[] = [
      [0, 0],
      [10, 0],
      [10, 10],
      [0, 10],
    ];
    const hole: Coord[] = [
      [2, 2],
      [8, 2],
      [8, 8],
      [2, 8],
    ];

    const { vertices, indices } = tessellatePolygon(outer, [hole]);

    expect(vertices).toHaveLength(16);
    expect(indices).toHaveLength(24);
    let area = 0;
    for (let i = 0; i < indices.length; i += 3) {
      area += triangleArea(vertices, indices[i]!, indices[i + 1]!, indices[i + 2]!);
    }
    expect(area).toBeCloseTo(64);
  });

  it("returns no triangles for degenerate rings", () => {
    expect(
      tessellatePolygon([
        [0, 0],
        [1, 1],
      ]).indices
    ).toEqual([]);
  });
});
