import { Open } from 'unzipper';
import type { StyleAttributes, StyleRuleTable } from '../types';
import { HttpError } from '../utils/httpError';
import { type XmlNode, attr, child, childValue, children, parseXml } from '../utils/xml';
import { validateStyleRuleTable } from './styleRules';

const STYLES_PART = 'word/styles.xml';
const OFF_VALUES = new Set(['0', 'false', 'off']);
const HEX_COLOR = /^[0-9A-Fa-f]{6}$/;

const JUSTIFICATION_MAP = new Map<string, string>([
  ['left', 'Left'],
  ['start', 'Left'],
  ['center', 'Center'],
  ['right', 'Right'],
  ['end', 'Right'],
  ['both', 'Justify'],
  ['justify', 'Justify']
]);

interface ParagraphStyleEntry {
  id: string;
  name: string;
  basedOn?: string;
  next?: string;
  attributes: StyleAttributes;
}

/**
 * Builds a rule table from the paragraph styles of a reference Word document,
 * keyed by style display name.
 */
export class DocxStyleExtractor {
  async extractRuleTable(buffer: Buffer): Promise<StyleRuleTable> {
    const xml = await this.readStylesPart(buffer);
    const stylesRoot = await parseXml(xml);

    const entries = children(stylesRoot, 'w:style')
      .filter(style => attr(style, 'w:type') === 'paragraph')
      .map(style => this.readParagraphStyle(style))
      .filter((entry): entry is ParagraphStyleEntry => entry !== undefined);

    const namesById = new Map(entries.map(entry => [entry.id, entry.name]));
    const table: Record<string, StyleAttributes> = {};

    for (const entry of entries) {
      if (entry.basedOn) {
        entry.attributes.based_on = namesById.get(entry.basedOn) ?? entry.basedOn;
      }
      if (entry.next) {
        entry.attributes.following_style = namesById.get(entry.next) ?? entry.next;
      }
      table[entry.name] = entry.attributes;
    }

    console.log(`Extracted ${entries.length} paragraph styles from reference document`);
    return validateStyleRuleTable(table, 'reference document styles');
  }

  private async readStylesPart(buffer: Buffer): Promise<string> {
    let files: Array<{ path: string; buffer(): Promise<Buffer> }>;
    try {
      const directory = await Open.buffer(buffer);
      files = directory.files;
    } catch (error) {
      throw new HttpError(422, `Failed to open Word document: ${error instanceof Error ? error.message : error}`);
    }

    const stylesFile = files.find(file => file.path === STYLES_PART);
    if (!stylesFile) {
      throw new HttpError(422, 'Reference document has no styles part');
    }
    return (await stylesFile.buffer()).toString('utf-8');
  }

  private readParagraphStyle(style: XmlNode): ParagraphStyleEntry | undefined {
    const id = attr(style, 'w:styleId');
    const rawName = childValue(style, 'w:name') ?? id;
    if (!id || !rawName) {
      return undefined;
    }

    return {
      id,
      name: this.displayName(rawName),
      basedOn: childValue(style, 'w:basedOn'),
      next: childValue(style, 'w:next'),
      attributes: {
        ...this.readRunProperties(child(style, 'w:rPr')),
        ...this.readParagraphProperties(child(style, 'w:pPr'))
      }
    };
  }

  // Word stores built-in heading names in lower case ("heading 1")
  private displayName(name: string): string {
    const heading = /^heading (\d)$/.exec(name);
    return heading ? `Heading ${heading[1]}` : name;
  }

  private readRunProperties(rPr: XmlNode | undefined): StyleAttributes {
    const attributes: StyleAttributes = {};
    if (!rPr) return attributes;

    const rFonts = child(rPr, 'w:rFonts');
    const font = attr(rFonts, 'w:ascii') ?? attr(rFonts, 'w:hAnsi');
    if (font) attributes.font_name = font;

    const size = this.toNumber(childValue(rPr, 'w:sz'));
    if (size !== undefined && size > 0) attributes.font_size_pt = size / 2;

    const bold = this.toggle(rPr, 'w:b');
    if (bold !== undefined) attributes.bold = bold;
    const italic = this.toggle(rPr, 'w:i');
    if (italic !== undefined) attributes.italic = italic;

    const color = childValue(rPr, 'w:color');
    if (color && HEX_COLOR.test(color)) attributes.color = `#${color.toUpperCase()}`;

    return attributes;
  }

  private readParagraphProperties(pPr: XmlNode | undefined): StyleAttributes {
    const attributes: StyleAttributes = {};
    if (!pPr) return attributes;

    const alignment = JUSTIFICATION_MAP.get(childValue(pPr, 'w:jc') ?? '');
    if (alignment) attributes.alignment = alignment;

    const spacing = child(pPr, 'w:spacing');
    const lineRule = attr(spacing, 'w:lineRule');
    const line = this.toNumber(attr(spacing, 'w:line'));
    if (line !== undefined && (!lineRule || lineRule === 'auto')) {
      const multiplier = this.round(line / 240);
      // Below 0.005 lines rounds to nothing
      if (multiplier > 0) attributes.line_spacing = multiplier;
    }
    const before = this.toNumber(attr(spacing, 'w:before'));
    if (before !== undefined && before >= 0) attributes.spacing_before_pt = before / 20;
    const after = this.toNumber(attr(spacing, 'w:after'));
    if (after !== undefined && after >= 0) attributes.spacing_after_pt = after / 20;

    const ind = child(pPr, 'w:ind');
    const left = this.toNumber(attr(ind, 'w:left') ?? attr(ind, 'w:start'));
    if (left !== undefined && left >= 0) attributes.indent_left_cm = this.twipsToCm(left);
    const hanging = this.toNumber(attr(ind, 'w:hanging'));
    if (hanging !== undefined && hanging >= 0) attributes.indent_hanging_cm = this.twipsToCm(hanging);

    if (this.toggle(pPr, 'w:keepNext')) attributes.keep_with_next = true;
    if (this.toggle(pPr, 'w:keepLines')) attributes.keep_lines_together = true;
    const widowControl = this.toggle(pPr, 'w:widowControl');
    if (widowControl !== undefined) attributes.widow_orphan_control = widowControl;

    return attributes;
  }

  /**
   * On/off element: present means on unless its value says otherwise.
   */
  private toggle(node: XmlNode, name: string): boolean | undefined {
    const element = child(node, name);
    if (!element) return undefined;
    const value = attr(element, 'w:val');
    return value === undefined || !OFF_VALUES.has(value.toLowerCase());
  }

  private toNumber(value?: string): number | undefined {
    if (!value) return undefined;
    const numeric = parseFloat(value);
    return Number.isFinite(numeric) ? numeric : undefined;
  }

  private twipsToCm(twips: number): number {
    return this.round((twips / 1440) * 2.54);
  }

  private round(value: number): number {
    return Math.round(value * 100) / 100;
  }
}
