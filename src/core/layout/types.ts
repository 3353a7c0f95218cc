import type { TextFragment } from '../../types/fragment.js';

export type TextLine = {
  fragments: readonly TextFragment[];
  text: string;
  fontSize: number;
  isBold: boolean;
  isItalic: boolean;
  allBold: boolean;
  x0: number;
  x1: number;
  y0: number;
  y1: number;
  pageNumber: number;
};

export type PageLines = {
  pageNumber: number;
  height: number;
  lines: TextLine[];
};

export type FontStatistics = {
  bodyFontSize: number;
};

export type DocumentStatistics = {
  fonts: FontStatistics;
};
