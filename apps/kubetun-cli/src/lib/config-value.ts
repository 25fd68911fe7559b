/**
 * Conversion of `kubetun config set` values from their command-line form
 */

import type { ConfigScalar } from '@kubetun/core';

/**
 * `true`/`false` become booleans, integers become numbers, anything else stays a string
 *
 * @example
 * parseConfigScalar('5000') // => 5000
 * parseConfigScalar('/usr/bin/ssh') // => '/usr/bin/ssh'
 */
export function parseConfigScalar(raw: string): ConfigScalar {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (/^-?\d+$/.test(raw)) return Number(raw);
  return raw;
}

/**
 * Render a config value for `kubetun config get`
 */
export function formatConfigValue(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value, null, 2);
  }
  return String(value);
}
