export interface BoundingBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/**
 * Positioned run of text as produced by the page parser.
 * Coordinates are top-down: `y0` is the top edge, `y1` the bottom edge.
 */
export interface TextFragment {
  readonly text: string;
  readonly fontSize: number;
  readonly isBold: boolean;
  readonly isItalic: boolean;
  readonly bbox: Readonly<BoundingBox>;
  readonly pageNumber: number;
  readonly fontName?: string;
}

export interface FragmentPage {
  pageNumber: number;
  // 0 when the source cannot tell; the extent is then derived from the fragments
  width: number;
  height: number;
  fragments: TextFragment[];
}

export type FragmentSource = Iterable<FragmentPage> | AsyncIterable<FragmentPage>;
