import {
  AlignmentType,
  Document,
  IParagraphOptions,
  IRunOptions,
  LineRuleType,
  Packer,
  Paragraph,
  TextRun
} from 'docx';
import type { Alignment, ParagraphFormat, RunFormat, StyledParagraph } from '../types';
import { toHex } from './colorResolver';

export const DOCX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

const TWIPS_PER_POINT = 20;
const TWIPS_PER_CM = 1440 / 2.54;
const SINGLE_LINE_TWIPS = 240;

type AlignmentValue = (typeof AlignmentType)[keyof typeof AlignmentType];
type Mutable<T> = { -readonly [K in keyof T]: T[K] };

const ALIGNMENTS: Record<Alignment, AlignmentValue> = {
  left: AlignmentType.LEFT,
  center: AlignmentType.CENTER,
  right: AlignmentType.RIGHT,
  justify: AlignmentType.JUSTIFIED
};

export interface DocxOptions {
  title?: string;
}

export async function generateDocx(paragraphs: readonly StyledParagraph[], options: DocxOptions = {}): Promise<Buffer> {
  const doc = new Document({
    creator: 'Draft Styler',
    title: options.title,
    sections: [{
      properties: {},
      children: paragraphs.map(buildParagraph)
    }]
  });

  return Packer.toBuffer(doc);
}

export function buildParagraph(paragraph: StyledParagraph): Paragraph {
  return new Paragraph({
    ...buildParagraphOptions(paragraph.format),
    children: paragraph.runs.map(run => new TextRun({ text: run.text, ...buildRunOptions(run.format) }))
  });
}

export function pointsToTwips(points: number): number {
  return Math.round(points * TWIPS_PER_POINT);
}

export function centimetersToTwips(cm: number): number {
  return Math.round(cm * TWIPS_PER_CM);
}

/**
 * Paragraph options for the properties the styler set; anything unset is left out
 * so Word falls back to its defaults.
 */
export function buildParagraphOptions(format: ParagraphFormat): Mutable<IParagraphOptions> {
  const options: Mutable<IParagraphOptions> = {};

  if (format.alignment) {
    options.alignment = ALIGNMENTS[format.alignment];
  }

  const spacing: { before?: number; after?: number; line?: number; lineRule?: typeof LineRuleType.AUTO } = {};
  if (format.spaceBeforePt !== undefined) spacing.before = pointsToTwips(format.spaceBeforePt);
  if (format.spaceAfterPt !== undefined) spacing.after = pointsToTwips(format.spaceAfterPt);
  if (format.lineSpacing !== undefined) {
    spacing.line = Math.round(format.lineSpacing * SINGLE_LINE_TWIPS);
    spacing.lineRule = LineRuleType.AUTO;
  }
  if (Object.keys(spacing).length) {
    options.spacing = spacing;
  }

  const indent: { left?: number; firstLine?: number; hanging?: number } = {};
  if (format.leftIndentCm !== undefined) indent.left = centimetersToTwips(format.leftIndentCm);
  if (format.firstLineIndentCm !== undefined) {
    if (format.firstLineIndentCm < 0) {
      indent.hanging = centimetersToTwips(-format.firstLineIndentCm);
    } else {
      indent.firstLine = centimetersToTwips(format.firstLineIndentCm);
    }
  }
  if (Object.keys(indent).length) {
    options.indent = indent;
  }

  if (format.keepWithNext) options.keepNext = true;
  if (format.keepTogether) options.keepLines = true;
  if (format.widowControl) options.widowControl = true;

  return options;
}

export function buildRunOptions(format: RunFormat): Mutable<IRunOptions> {
  const options: Mutable<IRunOptions> = {};

  if (format.fontName !== undefined) options.font = format.fontName;
  // docx sizes are half-points
  if (format.fontSizePt !== undefined) options.size = Math.round(format.fontSizePt * 2);
  if (format.bold !== undefined) options.bold = format.bold;
  if (format.italic !== undefined) options.italics = format.italic;
  if (format.color) options.color = toHex(format.color);

  return options;
}
