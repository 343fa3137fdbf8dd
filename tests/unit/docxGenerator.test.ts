import { describe, it, expect } from 'vitest';
import mammoth from 'mammoth';
import {
  buildParagraphOptions,
  buildRunOptions,
  centimetersToTwips,
  generateDocx,
  pointsToTwips
} from '../../src/services/docxGenerator';
import { buildStyledDocument } from '../../src/services/documentBuilder';
import { DEFAULT_STYLE_RULES } from '../../src/services/styleRules';
import { attr, child, childValue, children } from '../../src/utils/xml';
import { readBodyParagraphs } from '../helpers/docx';

describe('unit conversion', () => {
  it('converts points to twips', () => {
    expect(pointsToTwips(12)).toBe(240);
    expect(pointsToTwips(6)).toBe(120);
    expect(pointsToTwips(0)).toBe(0);
  });

  it('converts centimetres to twips', () => {
    expect(centimetersToTwips(1.27)).toBe(720);
    expect(centimetersToTwips(2.54)).toBe(1440);
    expect(centimetersToTwips(1)).toBe(567);
  });
});

describe('buildParagraphOptions', () => {
  it('omits everything for an unstyled paragraph', () => {
    expect(buildParagraphOptions({})).toEqual({});
  });

  it('maps spacing, indents and flags', () => {
    expect(buildParagraphOptions({
      alignment: 'justify',
      lineSpacing: 1.15,
      spaceBeforePt: 12,
      spaceAfterPt: 6,
      leftIndentCm: 1.27,
      firstLineIndentCm: -2.54,
      keepWithNext: true,
      keepTogether: true,
      widowControl: true
    })).toEqual({
      alignment: 'both',
      spacing: { before: 240, after: 120, line: 276, lineRule: 'auto' },
      indent: { left: 720, hanging: 1440 },
      keepNext: true,
      keepLines: true,
      widowControl: true
    });
  });

  it('writes a positive first-line indent as firstLine', () => {
    expect(buildParagraphOptions({ firstLineIndentCm: 1.27 })).toEqual({ indent: { firstLine: 720 } });
  });

  it('writes only the spacing that was set', () => {
    expect(buildParagraphOptions({ spaceAfterPt: 6 })).toEqual({ spacing: { after: 120 } });
  });
});

describe('buildRunOptions', () => {
  it('maps run formatting to docx units', () => {
    expect(buildRunOptions({
      fontName: 'Century Gothic',
      fontSizePt: 10.5,
      bold: false,
      italic: true,
      color: { r: 1, g: 95, b: 95 }
    })).toEqual({
      font: 'Century Gothic',
      size: 21,
      bold: false,
      italics: true,
      color: '015F5F'
    });
  });

  it('omits unset formatting', () => {
    expect(buildRunOptions({})).toEqual({});
  });
});

describe('generateDocx', () => {
  it('writes one paragraph per styled paragraph with its formatting', async () => {
    const { paragraphs } = buildStyledDocument(['# Title', 'Body', '- item'], DEFAULT_STYLE_RULES);
    const buffer = await generateDocx(paragraphs, { title: 'draft.txt' });
    const body = await readBodyParagraphs(buffer);

    expect(body).toHaveLength(3);

    const headingProps = child(body[0], 'w:pPr');
    expect(childValue(headingProps, 'w:jc')).toBe('left');
    expect(child(headingProps, 'w:keepNext')).toBeDefined();
    expect(child(headingProps, 'w:keepLines')).toBeDefined();
    const spacing = child(headingProps, 'w:spacing');
    expect(attr(spacing, 'w:before')).toBe('240');
    expect(attr(spacing, 'w:after')).toBe('120');
    expect(attr(spacing, 'w:line')).toBe('276');
    expect(attr(child(headingProps, 'w:ind'), 'w:hanging')).toBe('567');

    const headingRun = child(child(body[0], 'w:r'), 'w:rPr');
    expect(attr(child(headingRun, 'w:rFonts'), 'w:ascii')).toBe('Century Gothic');
    expect(childValue(headingRun, 'w:sz')).toBe('28');
    expect(childValue(headingRun, 'w:color')).toBe('0052A3');

    const bodyProps = child(body[1], 'w:pPr');
    expect(child(bodyProps, 'w:widowControl')).toBeDefined();
    expect(child(bodyProps, 'w:keepNext')).toBeUndefined();

    const bulletIndent = child(child(body[2], 'w:pPr'), 'w:ind');
    expect(attr(bulletIndent, 'w:left')).toBe('720');
    expect(attr(bulletIndent, 'w:hanging')).toBe('357');
  });

  it('keeps an empty run on blank paragraphs', async () => {
    const { paragraphs } = buildStyledDocument([''], {});
    const body = await readBodyParagraphs(await generateDocx(paragraphs));

    expect(body).toHaveLength(1);
    expect(children(body[0], 'w:r')).toHaveLength(1);
  });

  it('round-trips the text', async () => {
    const { paragraphs } = buildStyledDocument(['H2: Scope', 'a) first', 'Closing'], DEFAULT_STYLE_RULES);
    const buffer = await generateDocx(paragraphs);
    const { value } = await mammoth.extractRawText({ buffer });

    expect(value).toBe('Scope\n\nfirst\n\nClosing\n\n');
  });

  it('produces an empty document for no paragraphs', async () => {
    const buffer = await generateDocx([]);
    expect(await readBodyParagraphs(buffer)).toEqual([]);
  });
});
