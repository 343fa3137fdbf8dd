import { describe, it, expect } from 'vitest';
import { applyStyle, createParagraph } from '../../src/services/paragraphStyler';
import { DEFAULT_STYLE_RULES } from '../../src/services/styleRules';
import type { StyledParagraph } from '../../src/types';

describe('createParagraph', () => {
  it('creates one run for non-empty text', () => {
    expect(createParagraph('Hello', 'Normal')).toEqual({
      styleName: 'Normal',
      format: {},
      runs: [{ text: 'Hello', format: {} }]
    });
  });

  it('creates no runs for empty text', () => {
    expect(createParagraph('', 'Normal').runs).toEqual([]);
  });
});

describe('applyStyle', () => {
  it('applies the default Heading 1 record', () => {
    const paragraph = createParagraph('Title', 'Heading 1');
    applyStyle(paragraph, DEFAULT_STYLE_RULES['Heading 1']);

    expect(paragraph.format).toEqual({
      alignment: 'left',
      lineSpacing: 1.15,
      spaceBeforePt: 12,
      spaceAfterPt: 6,
      leftIndentCm: 0,
      firstLineIndentCm: -1,
      keepWithNext: true,
      keepTogether: true
    });
    expect(paragraph.runs).toEqual([{
      text: 'Title',
      format: {
        fontName: 'Century Gothic',
        fontSizePt: 14,
        bold: true,
        italic: false,
        color: { r: 0, g: 82, b: 163 }
      }
    }]);
  });

  it('adds an empty run when the paragraph has none', () => {
    const paragraph = createParagraph('', 'Normal');
    applyStyle(paragraph, { bold: true });

    expect(paragraph.runs).toEqual([{ text: '', format: { bold: true } }]);
  });

  it('adds an empty run even for an empty record', () => {
    const paragraph = createParagraph('', 'Normal');
    applyStyle(paragraph, {});

    expect(paragraph).toEqual({ styleName: 'Normal', format: {}, runs: [{ text: '', format: {} }] });
  });

  it('leaves everything untouched for an empty record', () => {
    const paragraph = createParagraph('Body', 'Normal');
    applyStyle(paragraph, {});

    expect(paragraph).toEqual({ styleName: 'Normal', format: {}, runs: [{ text: 'Body', format: {} }] });
  });

  it('formats every run', () => {
    const paragraph: StyledParagraph = {
      styleName: 'Normal',
      format: {},
      runs: [
        { text: 'one', format: {} },
        { text: 'two', format: { italic: true } }
      ]
    };
    applyStyle(paragraph, { font_name: 'Arial', color: 'RGB(1,95,95)' });

    expect(paragraph.runs).toEqual([
      { text: 'one', format: { fontName: 'Arial', color: { r: 1, g: 95, b: 95 } } },
      { text: 'two', format: { italic: true, fontName: 'Arial', color: { r: 1, g: 95, b: 95 } } }
    ]);
  });

  it.each([
    ['Left', 'left'],
    ['Center', 'center'],
    ['Right', 'right'],
    ['Justify', 'justify']
  ])('maps alignment %s', (alignment, expected) => {
    const paragraph = createParagraph('x', 'Normal');
    applyStyle(paragraph, { alignment });
    expect(paragraph.format.alignment).toBe(expected);
  });

  it('ignores unrecognized alignment values', () => {
    const paragraph = createParagraph('x', 'Normal');
    paragraph.format.alignment = 'right';
    applyStyle(paragraph, { alignment: 'center' });
    applyStyle(paragraph, { alignment: 'Distributed' });
    applyStyle(paragraph, { alignment: 'toString' });

    expect(paragraph.format.alignment).toBe('right');
  });

  it('stores the hanging indent as a negative first-line indent', () => {
    const paragraph = createParagraph('x', 'Normal Bullet');
    applyStyle(paragraph, { indent_left_cm: 1.27, indent_hanging_cm: 0.63 });

    expect(paragraph.format.leftIndentCm).toBe(1.27);
    expect(paragraph.format.firstLineIndentCm).toBe(-0.63);
  });

  it('never clears keep flags or widow control', () => {
    const paragraph = createParagraph('x', 'Normal');
    applyStyle(paragraph, { keep_with_next: true, keep_lines_together: true, widow_orphan_control: true });
    applyStyle(paragraph, { keep_with_next: false, keep_lines_together: false, widow_orphan_control: false });

    expect(paragraph.format).toEqual({ keepWithNext: true, keepTogether: true, widowControl: true });
  });

  it('does not set keep flags when they are false', () => {
    const paragraph = createParagraph('x', 'Normal');
    applyStyle(paragraph, { keep_with_next: false, keep_lines_together: false });

    expect(paragraph.format).toEqual({});
  });

  it('sets bold and italic to false explicitly', () => {
    const paragraph = createParagraph('x', 'Normal');
    paragraph.runs[0].format.bold = true;
    applyStyle(paragraph, { bold: false, italic: false });

    expect(paragraph.runs[0].format).toEqual({ bold: false, italic: false });
  });

  it('resolves theme colors to black', () => {
    const paragraph = createParagraph('x', 'Normal');
    applyStyle(paragraph, DEFAULT_STYLE_RULES.Normal);

    expect(paragraph.runs[0].format.color).toEqual({ r: 0, g: 0, b: 0 });
    expect(paragraph.format.widowControl).toBe(true);
  });

  it('ignores descriptive metadata', () => {
    const paragraph = createParagraph('x', 'Heading 2');
    applyStyle(paragraph, { based_on: 'Normal', following_style: 'Normal', numbering_level: 2, numbering_pattern: '%1.%2' });

    expect(paragraph).toEqual({ styleName: 'Heading 2', format: {}, runs: [{ text: 'x', format: {} }] });
  });
});
