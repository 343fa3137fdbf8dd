import type { StyledDocument, StyleRuleTable } from '../types';
import { classifyLine } from './lineClassifier';
import { applyStyle, createParagraph } from './paragraphStyler';
import { getStyleAttributes } from './styleRules';

/**
 * Classify and style every line in order, one paragraph per line,
 * counting how many paragraphs each style produced.
 */
export function buildStyledDocument(lines: readonly string[], rules: StyleRuleTable): StyledDocument {
  const document: StyledDocument = { paragraphs: [], report: {} };

  for (const line of lines) {
    const { styleName, text } = classifyLine(line, rules);
    const paragraph = createParagraph(text, styleName);
    applyStyle(paragraph, getStyleAttributes(rules, styleName));
    document.paragraphs.push(paragraph);
    document.report[styleName] = (document.report[styleName] ?? 0) + 1;
  }

  return document;
}
