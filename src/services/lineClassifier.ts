import type { ClassifiedLine, StyleRuleTable } from '../types';
import { hasStyle } from './styleRules';

const BOM = '\uFEFF';
const TRAILING_LINE_BREAKS = /[\r\n]+$/;
const NUMBERED_ITEM = /^(?:\p{Nd}+[.)]\s|[A-Za-z][.)]\s)/u;
const BULLET_MARKERS = ['- ', '* ', '• '];

export const DEFAULT_STYLE = 'Normal';

/**
 * Bullet lines take the first of these styles the rule table defines,
 * or the last one when it defines none of them.
 */
export const BULLET_STYLE_CANDIDATES: readonly string[] = ['Normal Bullet', 'List Paragraph Bullet Points'];

export const HEADING_MARKERS: ReadonlyArray<{ styleName: string; prefixes: readonly string[] }> = [
  { styleName: 'Heading 1', prefixes: ['H1:', '# '] },
  { styleName: 'Heading 2', prefixes: ['H2:', '## '] },
  { styleName: 'Heading 3', prefixes: ['H3:', '### '] },
  { styleName: 'Heading 4', prefixes: ['H4:', '#### '] }
];

export interface ClassificationRule {
  name: string;
  /** Cleaned text when the rule applies to the line, otherwise undefined */
  match(text: string): string | undefined;
  resolveStyle(rules: StyleRuleTable): string;
}

export function selectStyle(candidates: readonly string[], rules: StyleRuleTable): string {
  return candidates.find(candidate => hasStyle(rules, candidate)) ?? candidates[candidates.length - 1];
}

export function normalizeLine(line: string | null | undefined): string {
  const text = (line ?? '').replace(TRAILING_LINE_BREAKS, '');
  return text.startsWith(BOM) ? text.slice(BOM.length) : text;
}

const headingRules: ClassificationRule[] = HEADING_MARKERS.flatMap(({ styleName, prefixes }) =>
  prefixes.map(prefix => ({
    name: `${styleName} (${prefix.trim()})`,
    match: (text: string) => (text.startsWith(prefix) ? text.slice(prefix.length).trim() : undefined),
    resolveStyle: () => styleName
  }))
);

const numberedItemRule: ClassificationRule = {
  name: 'numbered item',
  match: text => {
    const token = NUMBERED_ITEM.exec(text);
    return token ? text.slice(token[0].length).trim() : undefined;
  },
  // Numbering is dropped, not regenerated
  resolveStyle: () => DEFAULT_STYLE
};

const bulletRule: ClassificationRule = {
  name: 'bullet',
  match: text => (BULLET_MARKERS.some(marker => text.startsWith(marker)) ? text.slice(2).trim() : undefined),
  resolveStyle: rules => selectStyle(BULLET_STYLE_CANDIDATES, rules)
};

/**
 * Evaluated in order, first match wins. Lines matching none are Normal.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  ...headingRules,
  numberedItemRule,
  bulletRule
];

export function classifyLine(rawText: string, rules: StyleRuleTable): ClassifiedLine {
  const text = normalizeLine(rawText);

  for (const rule of CLASSIFICATION_RULES) {
    const cleaned = rule.match(text);
    if (cleaned !== undefined) {
      return { rawText, styleName: rule.resolveStyle(rules), text: cleaned };
    }
  }

  return { rawText, styleName: DEFAULT_STYLE, text };
}
