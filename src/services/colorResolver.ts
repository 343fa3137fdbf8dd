import type { RgbColor } from '../types';

const BLACK: Readonly<RgbColor> = Object.freeze({ r: 0, g: 0, b: 0 });
const HEX_COLOR = /^#[0-9A-Fa-f]{6}$/;
const DECIMAL_COMPONENT = /^[+-]?\d+$/;

/**
 * Resolve a color expression ("#0052A3", "RGB(1,95,95)") to an RGB triple.
 * Theme colors such as "Text 1" are not resolved and fall back to black,
 * as does anything malformed.
 */
export function resolveColor(expression: unknown): RgbColor {
  if (typeof expression !== 'string') {
    return { ...BLACK };
  }

  if (HEX_COLOR.test(expression)) {
    return {
      r: parseInt(expression.slice(1, 3), 16),
      g: parseInt(expression.slice(3, 5), 16),
      b: parseInt(expression.slice(5, 7), 16)
    };
  }

  if (expression.toUpperCase().startsWith('RGB(')) {
    // Everything between the prefix and the last character, whatever it is
    const parts = expression.slice(4, -1).split(',').map(part => part.trim());
    if (parts.length === 3 && parts.every(part => DECIMAL_COMPONENT.test(part))) {
      const [r, g, b] = parts.map(part => parseInt(part, 10));
      if ([r, g, b].every(value => value >= 0 && value <= 255)) {
        return { r, g, b };
      }
    }
  }

  return { ...BLACK };
}

export function toHex(color: RgbColor): string {
  return [color.r, color.g, color.b]
    .map(value => value.toString(16).padStart(2, '0'))
    .join('')
    .toUpperCase();
}
