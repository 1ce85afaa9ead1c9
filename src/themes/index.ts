/**
 * Built-in themes and theme utilities
 *
 * - `themes.COLORIZED`: aligned text, colored when the destination supports it
 * - `themes.PLAIN`: the same layout without escape sequences
 * - `themes.JSON`: one JSON object per line
 *
 * @example
 * ```typescript
 * import { setTheme, themes } from 'fieldline';
 *
 * setTheme(themes.PLAIN);
 * ```
 */

import type { Theme, ThemeName } from '../logger/types.js';
import { TextTheme } from './text-theme.js';
import { JsonTheme } from './json-theme.js';

export * from './theme-interface.js';
export * from './text-theme.js';
export * from './json-theme.js';
export * from './color-support.js';

export const themes = Object.freeze({
  COLORIZED: new TextTheme({ name: 'colorized', colors: true }),
  PLAIN: new TextTheme({ name: 'plain', colors: false }),
  JSON: new JsonTheme('json')
});

/**
 * Looks up a built-in theme by name
 */
export function themeByName(name: ThemeName): Theme {
  switch (name) {
    case 'colorized':
      return themes.COLORIZED;
    case 'plain':
      return themes.PLAIN;
    case 'json':
      return themes.JSON;
  }
}
