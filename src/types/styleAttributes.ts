/**
 * Style attributes for one named style of a rule table.
 * Every field is optional: an absent field leaves the paragraph or run
 * attribute at the document default.
 */
export interface StyleAttributes {
  // Run formatting
  font_name?: string;
  font_size_pt?: number;
  bold?: boolean;
  italic?: boolean;
  color?: string; // "#RRGGBB", "RGB(r,g,b)" or a theme name such as "Text 1"

  // Paragraph formatting
  alignment?: string; // Left | Center | Right | Justify, anything else is ignored
  line_spacing?: number; // multiplier (e.g., 1.15)
  spacing_before_pt?: number;
  spacing_after_pt?: number;
  indent_left_cm?: number;
  indent_hanging_cm?: number;
  keep_with_next?: boolean;
  keep_lines_together?: boolean;
  widow_orphan_control?: boolean;

  // Descriptive metadata, carried but not interpreted
  based_on?: string;
  following_style?: string;
  numbering_level?: number;
  numbering_pattern?: string;
  bullet_level?: number;
}

/**
 * Style name → attributes, e.g. "Heading 1", "Normal", "Normal Bullet".
 */
export type StyleRuleTable = Readonly<Record<string, Readonly<StyleAttributes>>>;

export type Alignment = 'left' | 'center' | 'right' | 'justify';

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}
