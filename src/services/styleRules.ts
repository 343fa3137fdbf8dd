import { z } from 'zod';
import defaultStyleRules from '../data/defaultStyleRules.json';
import type { StyleAttributes, StyleRuleTable } from '../types';
import { HttpError } from '../utils/httpError';

// JSON null on any field means "not set"
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullish().transform(value => value ?? undefined);

const positive = z.number().finite().positive();
const nonNegative = z.number().finite().nonnegative();

export const styleAttributesSchema = z.object({
  font_name: optional(z.string()),
  font_size_pt: optional(positive),
  bold: optional(z.boolean()),
  italic: optional(z.boolean()),
  color: optional(z.string()),
  alignment: optional(z.string()),
  line_spacing: optional(positive),
  spacing_before_pt: optional(nonNegative),
  spacing_after_pt: optional(nonNegative),
  indent_left_cm: optional(nonNegative),
  indent_hanging_cm: optional(nonNegative),
  keep_with_next: optional(z.boolean()),
  keep_lines_together: optional(z.boolean()),
  widow_orphan_control: optional(z.boolean()),
  based_on: optional(z.string()),
  following_style: optional(z.string()),
  numbering_level: optional(z.number().int().nonnegative()),
  numbering_pattern: optional(z.string()),
  bullet_level: optional(z.number().int().nonnegative())
});

export const styleRuleTableSchema = z.record(z.string(), styleAttributesSchema);

const EMPTY_ATTRIBUTES: Readonly<StyleAttributes> = Object.freeze({});

function freezeTable(table: Record<string, StyleAttributes>): StyleRuleTable {
  for (const attributes of Object.values(table)) {
    // zod keeps keys that were present as null
    for (const [key, value] of Object.entries(attributes)) {
      if (value === undefined) {
        Reflect.deleteProperty(attributes, key);
      }
    }
    Object.freeze(attributes);
  }
  return Object.freeze(table);
}

/**
 * Validate an already-decoded rule table. Unknown fields are dropped,
 * the returned table and its entries are frozen.
 */
export function validateStyleRuleTable(raw: unknown, label = 'style_map_json'): StyleRuleTable {
  const result = styleRuleTableSchema.safeParse(raw);
  if (!result.success) {
    throw new HttpError(400, `Invalid ${label} schema`, result.error.issues);
  }
  const table: Record<string, StyleAttributes> = result.data;
  return freezeTable(table);
}

export function parseStyleRuleTable(json: string): StyleRuleTable {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new HttpError(400, 'Invalid style_map_json JSON', error instanceof Error ? error.message : undefined);
  }
  return validateStyleRuleTable(raw);
}

/**
 * Caller table when a non-blank JSON string was supplied, otherwise the built-in table.
 */
export function resolveStyleRuleTable(styleMapJson?: string | null): StyleRuleTable {
  if (styleMapJson && styleMapJson.trim()) {
    return parseStyleRuleTable(styleMapJson);
  }
  return DEFAULT_STYLE_RULES;
}

export function hasStyle(table: StyleRuleTable, styleName: string): boolean {
  return Object.prototype.hasOwnProperty.call(table, styleName);
}

export function getStyleAttributes(table: StyleRuleTable, styleName: string): Readonly<StyleAttributes> {
  return hasStyle(table, styleName) ? table[styleName] : EMPTY_ATTRIBUTES;
}

export const DEFAULT_STYLE_RULES: StyleRuleTable = validateStyleRuleTable(defaultStyleRules, 'default style rules');
