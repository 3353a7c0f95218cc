export interface OutlineTuning {
  // Line reconstruction
  lineProximity: number;
  wordGapRatio: number;

  // Title detection
  titleSizeTolerance: number;
  titleMaxLines: number;

  // Font hierarchy
  fontClusterTolerance: number;
  fontMatchTolerance: number;

  // Furniture
  marginBandRatio: number;
  repetitionBandTolerance: number;
  repetitionMinPages: number;
  repetitionMinFraction: number;
  repetitionWindow: number;
  repetitionWindowMinPages: number;

  // Classification
  maxHeadingWords: number;
  maxHeadingChars: number;
  numberedMaxWords: number;
  bulletMaxChars: number;
  colonMaxWords: number;
  styleBoostMargin: number;
  boldLinesAsHeadings: boolean;
}

export interface SourceOptions {
  // Load each page's operator list so real font names (and so bold/italic) can be resolved
  resolveFontNames?: boolean;
}

export interface OutlineExtractorConfig {
  tuning?: Partial<OutlineTuning>;
  sourceOptions?: SourceOptions;

  // Batch processing
  maxConcurrentDocuments?: number;
}

export interface OutlineProgress {
  stage:
    | 'parsing'
    | 'lines'
    | 'title'
    | 'fonts'
    | 'furniture'
    | 'classification'
    | 'refinement'
    | 'complete';
  progress: number;
  currentPage?: number;
  totalPages?: number;
  message?: string;
}

export type ProgressCallback = (progress: OutlineProgress) => void;
