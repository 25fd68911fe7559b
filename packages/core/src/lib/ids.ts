/**
 * ID Management Utilities
 *
 * Tunnel records are identified by UUIDv7 strings. Every (re)start of a tunnel
 * process gets a fresh ID, so an unchanged ID across two opens means the
 * existing process was reused.
 *
 * Key concepts:
 * - Full UUIDs stored in the state file (36 chars)
 * - Short IDs displayed to users (8 chars by default)
 */

import { uuidv7 } from 'uuidv7';

/**
 * UUIDv7 identifier (36 characters including hyphens)
 *
 * Format: 01933e4a-7b89-7c35-a8f3-9d2e1c4b5a6f
 */
export type UUID = string & { readonly __brand: 'UUID' };

/**
 * Short ID prefix (no hyphens), used for display
 */
export type ShortID = string;

/**
 * Generate a new UUIDv7 identifier.
 *
 * @example
 * const tunnelId = generateId();
 * // => "01933e4a-7b89-7c35-a8f3-9d2e1c4b5a6f"
 */
export function generateId(): UUID {
  return uuidv7() as UUID;
}

/**
 * Extract a short ID prefix from an ID.
 *
 * Removes hyphens and truncates to the given length (max 32).
 *
 * @example
 * shortId("01933e4a-7b89-7c35-a8f3-9d2e1c4b5a6f") // => "01933e4a"
 * shortId("01933e4a-7b89-7c35-a8f3-9d2e1c4b5a6f", 12) // => "01933e4a7b89"
 */
export function shortId(id: string, length: number = 8): ShortID {
  const clean = id.replace(/-/g, '');
  return clean.slice(0, Math.min(length, 32));
}

/**
 * Format an ID for display in the CLI.
 *
 * Empty IDs (tunnels that never opened) render as "-".
 *
 * @example
 * formatIdForDisplay(id) // => "01933e4a"
 * formatIdForDisplay(id, { verbose: true }) // => full ID
 * formatIdForDisplay("") // => "-"
 */
export function formatIdForDisplay(
  id: string,
  options: { verbose?: boolean; length?: number } = {}
): string {
  if (!id) {
    return '-';
  }
  if (options.verbose) {
    return id;
  }
  return shortId(id, options.length);
}
