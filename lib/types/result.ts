export type ErrorKind =
  | 'file_error'
  | 'conversion_failed'
  | 'missing_id'
  | 'invalid_id'
  | 'schema_not_found'
  | 'schema_invalid'
  | 'compound_field_invalid'
  | 'validation_error'
  | 'database_error'
  | 'malformed_address'
  | 'schema_manifest_missing';

export type Failure<K extends ErrorKind = ErrorKind> = { ok: false; kind: K; message: string };

export type Result<T, K extends ErrorKind = ErrorKind> = { ok: true; value: T } | Failure<K>;

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<K extends ErrorKind>(kind: K, message: string): Failure<K> {
  return { ok: false, kind, message };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
