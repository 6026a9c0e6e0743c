/**
 * JSON formátter pro CLI výstup.
 */

import type { FormattableData, OutputFormatter } from '../types.js';

/** Mapy (proměnné řešení) jako objekty; Date serializuje JSON.stringify sám */
function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  return value;
}

export class JsonFormatter implements OutputFormatter {
  constructor(private readonly pretty: boolean = false) {}

  format(data: FormattableData): string {
    const output = this.toOutputObject(data);
    return this.pretty ? JSON.stringify(output, replacer, 2) : JSON.stringify(output, replacer);
  }

  private toOutputObject(data: FormattableData): unknown {
    switch (data.type) {
      case 'error':
        return {
          success: false,
          error: data.data,
          ...(data.meta && { meta: data.meta })
        };

      case 'message':
        return {
          success: true,
          message: data.data,
          ...(data.meta && { meta: data.meta })
        };

      case 'validation':
        return {
          success: data.data.valid,
          validation: data.data,
          ...(data.meta && { meta: data.meta })
        };

      default:
        return {
          success: true,
          [data.type]: data.data,
          ...(data.meta && { meta: data.meta })
        };
    }
  }
}
