export type HeadingLevel = 'H1' | 'H2' | 'H3';

export type LineLevel = 'title' | HeadingLevel | 'body';

export interface OutlineEntry {
  level: HeadingLevel;
  text: string;
  page: number;
}

export interface DocumentOutline {
  title: string;
  outline: OutlineEntry[];
}

export interface OutlineSerializationOptions {
  indent?: number;
}
