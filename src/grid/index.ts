/**
 * Spatial hash grid
 */

export {
  SpatialGrid,
  chooseCellSize,
  DEFAULT_GRID_OPTIONS,
  type GridOptions,
  type CellRange,
} from "./SpatialGrid";
export {
  GLYPH_BIT,
  ENTRY_INDEX_MASK,
  encodePrimEntry,
  encodeGlyphEntry,
  isGlyphEntry,
  glyphIndexOf,
  primOffsetOf,
} from "./gridEntry";
