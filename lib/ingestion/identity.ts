import { FieldMap } from '../types/ingest';
import { Result, ok, fail } from '../types/result';

export const DEFAULT_IDENTITY_FIELD = 'id_incidence';

const DIGITS = /^\d+$/;

/** Pull the positive integer identity key out of a flattened payload */
export function extractIdentity(fields: FieldMap, identityField: string): Result<number, 'missing_id' | 'invalid_id'> {
  const value = fields[identityField];
  if (value === undefined || value.kind === 'absent') {
    return fail('missing_id', `Upload has no "${identityField}" value`);
  }

  if (value.kind === 'integer' && value.value > 0) {
    return ok(value.value);
  }
  if (value.kind === 'string') {
    const text = value.value.trim();
    const n = Number(text);
    if (DIGITS.test(text) && Number.isSafeInteger(n) && n > 0) {
      return ok(n);
    }
  }
  return fail('invalid_id', `"${identityField}" must be a positive integer, got ${JSON.stringify(value)}`);
}
