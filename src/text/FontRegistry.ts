/**
 * Font Registry
 *
 * In-memory FontService: atlas metadata registered by name, plus a default
 * font used by spans without a font id.
 */

import { createMonospaceFont } from "./createMonospaceFont";
import type { FontAtlasMetadata, FontService } from "./types";

export class FontRegistry implements FontService {
  private readonly fonts = new Map<string, FontAtlasMetadata>();
  private readonly defaultFont: FontAtlasMetadata;

  constructor(defaultFont: FontAtlasMetadata = createMonospaceFont()) {
    this.defaultFont = defaultFont;
  }

  /**
   * Register atlas metadata under a font name, replacing any previous entry.
   */
  register(name: string, metadata: FontAtlasMetadata): void {
    this.fonts.set(name, metadata);
  }

  unregister(name: string): boolean {
    return this.fonts.delete(name);
  }

  has(name: string): boolean {
    return this.fonts.has(name);
  }

  getFont(name: string): FontAtlasMetadata | undefined {
    return this.fonts.get(name);
  }

  getDefaultFont(): FontAtlasMetadata {
    return this.defaultFont;
  }
}
