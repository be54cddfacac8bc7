import { toTitleCase } from '../../../lib/utils/strings';

/** Title-case string input; anything else is left for the validators to reject. */
export function normalizePhoneType(value: unknown): unknown {
  return typeof value === 'string' ? toTitleCase(value.trim()) : value;
}
