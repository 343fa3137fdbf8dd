import type { Alignment, StyleAttributes, StyledParagraph } from '../types';
import { resolveColor } from './colorResolver';

const ALIGNMENT_MAP: Readonly<Record<string, Alignment>> = Object.freeze({
  Left: 'left',
  Center: 'center',
  Right: 'right',
  Justify: 'justify'
});

export function createParagraph(text: string, styleName: string): StyledParagraph {
  return {
    styleName,
    format: {},
    runs: text ? [{ text, format: {} }] : []
  };
}

/**
 * Apply one style record to a paragraph and every run in it.
 * Fields absent from the record leave the paragraph untouched.
 */
export function applyStyle(paragraph: StyledParagraph, attributes: Readonly<StyleAttributes>): void {
  const format = paragraph.format;

  if (attributes.alignment !== undefined && Object.prototype.hasOwnProperty.call(ALIGNMENT_MAP, attributes.alignment)) {
    format.alignment = ALIGNMENT_MAP[attributes.alignment];
  }
  if (attributes.line_spacing !== undefined) format.lineSpacing = attributes.line_spacing;
  if (attributes.spacing_before_pt !== undefined) format.spaceBeforePt = attributes.spacing_before_pt;
  if (attributes.spacing_after_pt !== undefined) format.spaceAfterPt = attributes.spacing_after_pt;
  if (attributes.indent_left_cm !== undefined) format.leftIndentCm = attributes.indent_left_cm;
  if (attributes.indent_hanging_cm !== undefined) format.firstLineIndentCm = -attributes.indent_hanging_cm;
  // Only ever switched on
  if (attributes.keep_with_next) format.keepWithNext = true;
  if (attributes.keep_lines_together) format.keepTogether = true;
  if (attributes.widow_orphan_control) format.widowControl = true;

  if (!paragraph.runs.length) {
    paragraph.runs.push({ text: '', format: {} });
  }

  for (const run of paragraph.runs) {
    if (attributes.font_name !== undefined) run.format.fontName = attributes.font_name;
    if (attributes.font_size_pt !== undefined) run.format.fontSizePt = attributes.font_size_pt;
    if (attributes.bold !== undefined) run.format.bold = attributes.bold;
    if (attributes.italic !== undefined) run.format.italic = attributes.italic;
    if (attributes.color !== undefined) run.format.color = resolveColor(attributes.color);
  }
}
