/**
 * Terminal color and symbol utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars and the
 * `output.showColor` config key. Falls back to plain ASCII when color is
 * not supported.
 */

/** Whether the terminal supports ANSI color escape codes. */
function detectColorSupport(): boolean {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return process.stdout.isTTY === true;
}

/** Whether Unicode symbols are supported. */
const unicodeEnabled: boolean = (() => {
  const lang = process.env['LANG'] ?? '';
  if (lang === 'C' || lang === 'POSIX') return false;
  return lang.includes('UTF') || process.platform === 'darwin';
})();

let colorsEnabled = detectColorSupport();

/**
 * Apply the `output.showColor` setting. Color stays off when the
 * terminal does not support it.
 */
export function configureColors(showColor: boolean): void {
  colorsEnabled = showColor && detectColorSupport();
}

/** Force color on or off (tests). */
export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled;
}

// ---------------------------------------------------------------------------
// ANSI escape helpers
// ---------------------------------------------------------------------------

function paint(code: string, text: string): string {
  return colorsEnabled ? `${code}${text}\x1b[0m` : text;
}

export const bold = (text: string): string => paint('\x1b[1m', text);
export const dim = (text: string): string => paint('\x1b[2m', text);
export const red = (text: string): string => paint('\x1b[0;31m', text);
export const green = (text: string): string => paint('\x1b[0;32m', text);
export const yellow = (text: string): string => paint('\x1b[1;33m', text);
export const cyan = (text: string): string => paint('\x1b[0;36m', text);

// ---------------------------------------------------------------------------
// Symbols
// ---------------------------------------------------------------------------

export const SYMBOLS = unicodeEnabled
  ? { pass: '✓', fail: '✗', warn: '⚠' }
  : { pass: 'OK', fail: 'X', warn: '!' };

/** Create a horizontal rule. */
export function hRule(width: number = 40): string {
  return (unicodeEnabled ? '─' : '-').repeat(width);
}
