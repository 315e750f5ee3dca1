import * as crypto from 'crypto';
import { FINGERPRINT_EXCLUDED_KEYS } from '../config/constants.js';

export type FingerprintValue = string | number | boolean | null | undefined;

/**
 * Deterministic identity of a cacheable call. Positional and keyword
 * arguments are stringified and sorted; transport and identity keywords
 * are left out so reruns with a new client or contact string still hit.
 */
export function computeFingerprint(
  op: string,
  args: readonly FingerprintValue[],
  kwargs: Readonly<Record<string, unknown>> = {},
): string {
  const positional = args.map((arg) => String(arg)).sort().join(',');
  const keyword = Object.entries(kwargs)
    .filter(([key]) => !FINGERPRINT_EXCLUDED_KEYS.has(key))
    .map(([key, value]) => `${key}=${String(value)}`)
    .sort()
    .join(',');

  return md5Hex(`${op}|${positional}|${keyword}`);
}

export function md5Hex(value: string): string {
  return crypto.createHash('md5').update(value, 'utf8').digest('hex');
}
