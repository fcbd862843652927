import { IANAZone } from 'luxon';
import { z } from 'zod';
import { DATA_ROOT, SCHEMA_DIR } from './paths';
import { DEFAULT_IDENTITY_FIELD } from './ingestion/identity';

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform(value => (value === undefined ? fallback : ['true', '1', 'yes'].includes(value)));

const envSchema = z.object({
  DATA_ROOT: z.string().min(1).default(DATA_ROOT),
  SCHEMA_DIR: z.string().min(1).default(SCHEMA_DIR),
  INGEST_AUTO_CONFIRM: flag(false),
  INGEST_PERSIST_STAGING: flag(true),
  INGEST_FULL_OVERWRITE: flag(false),
  INGEST_ON_EXISTING_ARTIFACT: z.enum(['supersede', 'reject']).default('supersede'),
  INGEST_REFERENCE_ZONE: z
    .string()
    .default('America/Los_Angeles')
    .refine(zone => IANAZone.isValidZone(zone), { message: 'must be an IANA time zone' }),
  INGEST_IDENTITY_FIELD: z.string().min(1).default(DEFAULT_IDENTITY_FIELD),
});

export interface IngestConfig {
  dataRoot: string;
  schemaDir: string;
  autoConfirm: boolean;
  persistStagingArtifact: boolean;
  fullFieldOverwrite: boolean;
  onExistingArtifact: 'supersede' | 'reject';
  referenceZone: string;
  identityField: string;
}

/** Read configuration from environment variables; throws listing every bad value */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): IngestConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  ${problems.join('\n  ')}`);
  }
  const e = parsed.data;
  return {
    dataRoot: e.DATA_ROOT,
    schemaDir: e.SCHEMA_DIR,
    autoConfirm: e.INGEST_AUTO_CONFIRM,
    persistStagingArtifact: e.INGEST_PERSIST_STAGING,
    fullFieldOverwrite: e.INGEST_FULL_OVERWRITE,
    onExistingArtifact: e.INGEST_ON_EXISTING_ARTIFACT,
    referenceZone: e.INGEST_REFERENCE_ZONE,
    identityField: e.INGEST_IDENTITY_FIELD,
  };
}
