import type { Alignment, RgbColor } from './styleAttributes';

export type { Alignment, RgbColor, StyleAttributes, StyleRuleTable } from './styleAttributes';

export interface ParagraphFormat {
  alignment?: Alignment;
  lineSpacing?: number;
  spaceBeforePt?: number;
  spaceAfterPt?: number;
  leftIndentCm?: number;
  firstLineIndentCm?: number; // negative for a hanging indent
  keepWithNext?: boolean;
  keepTogether?: boolean;
  widowControl?: boolean;
}

export interface RunFormat {
  fontName?: string;
  fontSizePt?: number;
  bold?: boolean;
  italic?: boolean;
  color?: RgbColor;
}

export interface StyledRun {
  text: string;
  format: RunFormat;
}

export interface StyledParagraph {
  styleName: string;
  format: ParagraphFormat;
  runs: StyledRun[];
}

export interface ClassifiedLine {
  rawText: string;
  styleName: string;
  text: string;
}

export type UsageReport = Record<string, number>;

export interface StyledDocument {
  paragraphs: StyledParagraph[];
  report: UsageReport;
}

export interface UploadedDraft {
  originalname: string;
  buffer: Buffer;
}
