/**
 * Aligned text themes
 *
 * Renders one record per line in fixed column order:
 *
 * ```
 * 03:04:05.678 [err] [app.db]     conn failed                                  retry=3
 * ```
 *
 * timestamp, bracketed level code, bracketed logger name padded to the name
 * column, message padded to the message column when fields follow, then the
 * shadow-resolved fields as `key=value`. With `colors` enabled every column
 * is wrapped in its palette color, but only when the render call reports a
 * color-capable destination.
 *
 * @example
 * ```typescript
 * import { createTextTheme, setTheme } from 'fieldline';
 *
 * setTheme(createTextTheme({
 *   name: 'wide',
 *   layout: { nameWidth: 20, timestamps: 'iso' },
 *   palette: { name: 'magenta' }
 * }));
 * ```
 */

import type { LogRecord, RenderOptions } from '../logger/types.js';
import { levelShortName } from '../logger/logger-config.js';
import { renderFieldKey, renderFieldValue, resolveShadowedFields } from '../logger/field.js';
import {
  BaseTheme,
  DEFAULT_LAYOUT,
  DEFAULT_PALETTE,
  Formatters,
  paint,
  type AnsiColorName,
  type ThemeLayout,
  type ThemePalette
} from './theme-interface.js';

/**
 * Text theme configuration
 */
export interface TextThemeConfig {
  /** Theme name (default: 'colorized' when colors are on, else 'plain') */
  name?: string;

  /** Emit ANSI colors when the destination supports them (default: true) */
  colors?: boolean;

  /** Palette overrides; `levels` may override a subset of levels */
  palette?: Partial<Omit<ThemePalette, 'levels'>> & { levels?: Partial<ThemePalette['levels']> };

  /** Layout overrides */
  layout?: Partial<ThemeLayout>;
}

/**
 * Theme producing aligned, optionally colorized text lines
 */
export class TextTheme extends BaseTheme {
  readonly colors: boolean;
  readonly palette: Readonly<ThemePalette>;
  readonly layout: Readonly<ThemeLayout>;

  constructor(config: TextThemeConfig = {}) {
    const colors = config.colors ?? true;
    super(config.name ?? (colors ? 'colorized' : 'plain'));

    this.colors = colors;
    this.palette = Object.freeze({
      ...DEFAULT_PALETTE,
      ...config.palette,
      levels: Object.freeze({ ...DEFAULT_PALETTE.levels, ...config.palette?.levels })
    });
    this.layout = Object.freeze({ ...DEFAULT_LAYOUT, ...config.layout });
  }

  /**
   * Render a record; colors apply only when both the theme and `options.color`
   * allow them
   */
  render(record: LogRecord, options: RenderOptions = { color: false }): string {
    const colorize = this.colors && options.color;
    const style = (text: string, color: AnsiColorName): string =>
      colorize ? paint(text, color) : text;

    const columns: string[] = [];

    const timestamp = Formatters.timestamp(record.timestamp, this.layout.timestamps);
    if (timestamp) {
      columns.push(style(timestamp, this.palette.timestamp));
    }

    columns.push(style(`[${levelShortName(record.level)}]`, this.palette.levels[record.level]));

    const name = record.name ? `[${Formatters.singleLine(record.name)}]` : '';
    columns.push(Formatters.padVisible(style(name, this.palette.name), name.length, this.layout.nameWidth));

    const message = Formatters.singleLine(record.message);
    const resolved = resolveShadowedFields(record.fields);
    if (resolved.length === 0) {
      columns.push(style(message, this.palette.message));
      return columns.join(' ');
    }

    columns.push(
      Formatters.padVisible(style(message, this.palette.message), message.length, this.layout.messageWidth)
    );
    columns.push(
      resolved
        .map(({ key, value }) =>
          `${style(renderFieldKey(key), this.palette.fieldKey)}=${style(renderFieldValue(value), this.palette.fieldValue)}`
        )
        .join(' ')
    );

    return columns.join(' ');
  }
}

/**
 * Create a text theme
 */
export function createTextTheme(config?: TextThemeConfig): TextTheme {
  return new TextTheme(config);
}
