/**
 * Run and item ids become file names under the state and log directories,
 * so they are restricted to a single path segment.
 */

const SAFE_ID = /^[A-Za-z0-9._-]+$/;
const RESERVED_IDS = new Set(['.', '..', '__proto__']);

export const SAFE_ID_RULE = 'may contain only letters, digits, ".", "_" and "-"';

export function isSafeId(id: string): boolean {
  return SAFE_ID.test(id) && !RESERVED_IDS.has(id);
}
