/**
 * Text selection over shaped glyphs
 *
 * Selection ranges are expressed in reading order (top to bottom, then left
 * to right) so a drag from one glyph to another selects everything between
 * them regardless of the order spans were added in.
 */

import { GlyphFlags } from "./glyphRecord";
import type { ShapedGlyph } from "./GlyphShaper";

/**
 * Glyph indices sorted into reading order.
 *
 * Glyphs whose vertical centers are within half a glyph height of each other
 * share a line.
 */
export function buildReadingOrder(glyphs: readonly ShapedGlyph[]): number[] {
  const order = glyphs.map((_, i) => i);
  order.sort((a, b) => {
    const ga = glyphs[a]!;
    const gb = glyphs[b]!;
    const ca = ga.y + ga.height * 0.5;
    const cb = gb.y + gb.height * 0.5;
    const tolerance = Math.min(ga.height, gb.height) * 0.5;
    if (Math.abs(ca - cb) > tolerance) return ca - cb;
    if (ga.x !== gb.x) return ga.x - gb.x;
    return a - b;
  });
  return order;
}

/**
 * Find the glyph whose center is nearest to a scene position.
 *
 * @returns Position in `order`, or -1 when there are no glyphs
 */
export function findNearestGlyph(
  glyphs: readonly ShapedGlyph[],
  order: readonly number[],
  x: number,
  y: number
): number {
  let best = -1;
  let bestDist = Infinity;

  order.forEach((glyphIndex, position) => {
    const g = glyphs[glyphIndex]!;
    const dx = g.x + g.width * 0.5 - x;
    const dy = g.y + g.height * 0.5 - y;
    const dist = dx * dx + dy * dy;
    if (dist < bestDist) {
      bestDist = dist;
      best = position;
    }
  });

  return best;
}

/**
 * Flag the glyphs between two reading-order positions (inclusive, either
 * order) as selected and clear the flag everywhere else. A negative position
 * clears the selection.
 *
 * @returns Number of selected glyphs
 */
export function applySelection(
  glyphs: ShapedGlyph[],
  order: readonly number[],
  start: number,
  end: number
): number {
  for (const g of glyphs) {
    g.flags &= ~GlyphFlags.Selected;
  }
  if (start < 0 || end < 0) return 0;

  const from = Math.min(start, end);
  const to = Math.min(Math.max(start, end), order.length - 1);
  for (let i = from; i <= to; i++) {
    glyphs[order[i]!]!.flags |= GlyphFlags.Selected;
  }
  return Math.max(0, to - from + 1);
}

/**
 * Text of the selected glyphs in reading order. Glyphs from different spans
 * on different lines are joined by a newline.
 */
export function selectedText(glyphs: readonly ShapedGlyph[], order: readonly number[]): string {
  let text = "";
  let last: ShapedGlyph | undefined;

  for (const index of order) {
    const g = glyphs[index]!;
    if ((g.flags & GlyphFlags.Selected) === 0) continue;

    if (last && last.span !== g.span && g.y >= last.y + last.height * 0.5) {
      text += "\n";
    }
    text += String.fromCodePoint(g.codepoint);
    last = g;
  }

  return text;
}
