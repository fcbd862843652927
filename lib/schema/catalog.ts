import { z } from 'zod';
import { FieldSpec, SchemaVersion, VALUE_TYPES, ValueType } from '../types/ingest';
import { Result, ok, fail } from '../types/result';
import { parseCellAddress } from './cellAddress';

/** Schema source as it appears on disk or in a fixture */
export interface SchemaSourceInput {
  name: string;
  fields: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}

export interface ResolvedSchema {
  schema: SchemaVersion;
  aliasedFrom?: string;
}

const sourceEnvelope = z.object({
  name: z.string().min(1, 'schema name must not be empty'),
  fields: z.record(z.unknown()),
  metadata: z.record(z.unknown()).optional(),
});

const rawFieldSpec = z
  .object({
    value_address: z.string(),
    value_type: z.string(),
    label_address: z.string().optional(),
    label: z.string().optional(),
    is_drop_down: z.boolean().optional(),
  })
  .strict();

function isValueType(value: string): value is ValueType {
  return VALUE_TYPES.some(t => t === value);
}

function describeIssues(prefix: string, error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const where = issue.path.length > 0 ? `${prefix}.${issue.path.join('.')}` : prefix;
    return `${where}: ${issue.message}`;
  });
}

function validateField(schemaName: string, fieldName: string, raw: unknown, violations: string[]): FieldSpec | null {
  const where = `${schemaName}.${fieldName}`;
  const parsed = rawFieldSpec.safeParse(raw);
  if (!parsed.success) {
    violations.push(...describeIssues(where, parsed.error));
    return null;
  }

  const spec = parsed.data;
  let valid = true;

  const value = parseCellAddress(spec.value_address);
  if (!value.ok) {
    violations.push(`${where}.value_address: ${value.message}`);
    valid = false;
  }
  if (spec.label_address !== undefined) {
    const label = parseCellAddress(spec.label_address);
    if (!label.ok) {
      violations.push(`${where}.label_address: ${label.message}`);
      valid = false;
    }
  }
  if (!isValueType(spec.value_type)) {
    violations.push(`${where}.value_type: unsupported type "${spec.value_type}" (expected one of ${VALUE_TYPES.join(', ')})`);
    return null;
  }
  if (!valid) return null;

  return Object.freeze({
    fieldName,
    valueAddress: spec.value_address,
    labelAddress: spec.label_address,
    labelText: spec.label,
    valueType: spec.value_type,
    isDropDown: spec.is_drop_down ?? false,
  });
}

/**
 * Versioned cell-to-field schemas plus single-hop aliases from retired names.
 * Instances are immutable; reloading means building a new catalog.
 */
export class SchemaCatalog {
  private constructor(
    private readonly schemas: ReadonlyMap<string, SchemaVersion>,
    private readonly aliasMap: ReadonlyMap<string, string>
  ) {}

  /**
   * Validate every source and field, collecting all violations before
   * deciding. Any violation fails the whole load.
   */
  static load(
    sources: readonly SchemaSourceInput[],
    aliases: Record<string, string> = {}
  ): Result<SchemaCatalog, 'schema_invalid'> {
    const violations: string[] = [];
    const schemas = new Map<string, SchemaVersion>();

    sources.forEach((source, index) => {
      const envelope = sourceEnvelope.safeParse(source);
      if (!envelope.success) {
        violations.push(...describeIssues(`source[${index}]`, envelope.error));
        return;
      }
      const { name, fields, metadata } = envelope.data;
      if (schemas.has(name)) {
        violations.push(`${name}: duplicate schema name`);
        return;
      }

      const specs: FieldSpec[] = [];
      for (const [fieldName, raw] of Object.entries(fields)) {
        const spec = validateField(name, fieldName, raw, violations);
        if (spec) specs.push(spec);
      }

      schemas.set(name, Object.freeze({
        id: name,
        fields: Object.freeze(specs),
        metadata: Object.freeze({ ...(metadata ?? {}) }),
      }));
    });

    const aliasMap = new Map<string, string>();
    for (const [retired, current] of Object.entries(aliases)) {
      if (schemas.has(retired)) {
        violations.push(`alias "${retired}" shadows an existing schema`);
        continue;
      }
      if (current.length === 0) {
        violations.push(`alias "${retired}" has an empty target`);
        continue;
      }
      aliasMap.set(retired, current);
    }

    if (violations.length > 0) {
      return fail('schema_invalid', `Schema catalog has ${violations.length} violation(s):\n  ${violations.join('\n  ')}`);
    }
    return ok(new SchemaCatalog(schemas, aliasMap));
  }

  /** Look up a schema by name, following at most one alias hop */
  resolve(name: string): Result<ResolvedSchema, 'schema_not_found'> {
    const direct = this.schemas.get(name);
    if (direct) {
      return ok({ schema: direct });
    }

    const target = this.aliasMap.get(name);
    if (target === undefined) {
      return fail('schema_not_found', `Schema "${name}" is not in the catalog and has no alias`);
    }

    console.warn(`[schemaCatalog] Schema "${name}" is retired; using alias target "${target}"`);
    const aliased = this.schemas.get(target);
    if (!aliased) {
      return fail('schema_not_found', `Schema "${name}" aliases "${target}", which is not in the catalog`);
    }
    return ok({ schema: aliased, aliasedFrom: name });
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  names(): string[] {
    return [...this.schemas.keys()];
  }

  aliases(): Record<string, string> {
    return Object.fromEntries(this.aliasMap);
  }
}
