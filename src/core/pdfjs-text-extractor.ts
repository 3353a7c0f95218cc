import type { SourceOptions } from '../types/config.js';
import type { TextFragment } from '../types/fragment.js';
import { deriveFontWeightAndStyle } from '../fonts/font-style.js';

export type PDFJSTextItem = {
  str: string;
  transform: number[];
  fontName?: string;
  width?: number;
  height?: number;
};

// Marked-content items carry no text and no transform
export type PDFJSMarkedContent = {
  type: string;
  id?: string;
};

export type PDFJSFontStyle = {
  fontFamily: string;
  fontName?: string;
};

export type PDFJSTextContent = {
  items: Array<PDFJSTextItem | PDFJSMarkedContent>;
  styles: Record<string, PDFJSFontStyle>;
};

export type PDFJSObjectStore = {
  has?(id: string): boolean;
  get(id: string): unknown;
};

export type PDFJSPage = {
  getViewport(options: { scale: number }): { width: number; height: number };
  getTextContent(): Promise<PDFJSTextContent>;
  getOperatorList?(): Promise<unknown>;
  commonObjs?: PDFJSObjectStore;
};

type ResolvedFont = {
  name: string;
  bold: boolean;
  italic: boolean;
};

const DEFAULT_FONT_SIZE = 12;

export class PDFJSTextExtractor {
  async extractFragments(
    page: PDFJSPage,
    pageNumber: number,
    pageHeight: number,
    options: SourceOptions = {}
  ): Promise<TextFragment[]> {
    const content = await page.getTextContent();
    const fonts = options.resolveFontNames === false ? new Map<string, ResolvedFont>() : await this.resolveFonts(page, content);

    const fragments: TextFragment[] = [];
    for (const item of content.items) {
      if (!isTextItem(item)) continue;
      const fragment = this.toFragment(item, content.styles, fonts, pageNumber, pageHeight);
      if (fragment) fragments.push(fragment);
    }
    return fragments;
  }

  private toFragment(
    item: PDFJSTextItem,
    styles: Record<string, PDFJSFontStyle>,
    fonts: Map<string, ResolvedFont>,
    pageNumber: number,
    pageHeight: number
  ): TextFragment | null {
    if (!item.str || item.str.trim().length === 0) return null;

    const [, , c = 0, d = 0, e = 0, f = 0] = item.transform;
    const itemHeight = typeof item.height === 'number' && item.height > 0 ? item.height : 0;
    const fontSize = Math.hypot(c, d) || itemHeight || DEFAULT_FONT_SIZE;
    const height = itemHeight || fontSize;
    const width = typeof item.width === 'number' ? item.width : item.str.length * fontSize * 0.5;

    const fontId = item.fontName ?? '';
    const resolved = fonts.get(fontId);
    const style = fontId ? styles[fontId] : undefined;
    const { fontWeight, fontStyle } = deriveFontWeightAndStyle({
      fontName: resolved?.name ?? style?.fontName ?? fontId,
      fontFamily: style?.fontFamily
    });

    const y1 = pageHeight - f;
    return {
      text: item.str,
      fontSize,
      isBold: fontWeight >= 600 || resolved?.bold === true,
      isItalic: fontStyle !== 'normal' || resolved?.italic === true,
      bbox: { x0: e, y0: y1 - height, x1: e + width, y1 },
      pageNumber,
      fontName: resolved?.name ?? (fontId || undefined)
    };
  }

  // Real font names are only available once the operator list has loaded the fonts
  private async resolveFonts(page: PDFJSPage, content: PDFJSTextContent): Promise<Map<string, ResolvedFont>> {
    const fonts = new Map<string, ResolvedFont>();
    const store = page.commonObjs;
    if (!store || typeof page.getOperatorList !== 'function') return fonts;

    try {
      await page.getOperatorList();
    } catch (error) {
      console.debug('Failed to load operator list for font resolution:', error);
      return fonts;
    }

    for (const id of Object.keys(content.styles)) {
      try {
        if (store.has && !store.has(id)) continue;
        const font = toResolvedFont(store.get(id));
        if (font) fonts.set(id, font);
      } catch (error) {
        console.debug(`Failed to resolve font ${id}:`, error);
      }
    }
    return fonts;
  }
}

function isTextItem(item: PDFJSTextItem | PDFJSMarkedContent): item is PDFJSTextItem {
  return 'str' in item && Array.isArray(item.transform);
}

function toResolvedFont(value: unknown): ResolvedFont | null {
  if (typeof value !== 'object' || value === null) return null;
  const name: unknown = Reflect.get(value, 'name');
  if (typeof name !== 'string' || name.length === 0) return null;
  return {
    // Subset fonts are prefixed with a six-letter tag, e.g. "ABCDEF+Helvetica-Bold"
    name: name.replace(/^[A-Z]{6}\+/, ''),
    bold: Reflect.get(value, 'bold') === true || Reflect.get(value, 'black') === true,
    italic: Reflect.get(value, 'italic') === true
  };
}
