/**
 * JSON-lines theme for structured logging
 *
 * One compact JSON object per record. Shadowed fields are resolved before
 * serialization, so `fields` keys appear in render order.
 */

import type { LogRecord, RenderOptions } from '../logger/types.js';
import { fieldValueToJSON, resolveShadowedFields } from '../logger/field.js';
import { BaseTheme } from './theme-interface.js';

export class JsonTheme extends BaseTheme {
  constructor(name: string = 'json') {
    super(name);
  }

  /** Color mode is ignored: JSON output never carries escape sequences */
  render(record: LogRecord, _options?: RenderOptions): string {
    const data: Record<string, unknown> = {
      time: new Date(record.timestamp).toISOString(),
      level: record.level,
      logger: record.name,
      msg: record.message
    };

    const resolved = resolveShadowedFields(record.fields);
    if (resolved.length > 0) {
      const fields: Record<string, string | number | boolean | null> = {};
      for (const { key, value } of resolved) {
        // Own property even for keys like __proto__
        Object.defineProperty(fields, key, {
          value: fieldValueToJSON(value),
          enumerable: true,
          writable: true,
          configurable: true
        });
      }
      data.fields = fields;
    }

    return JSON.stringify(data);
  }
}
