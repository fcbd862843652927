import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { Result, fail, errorMessage } from '../types/result';
import { SchemaCatalog, SchemaSourceInput } from './catalog';

export const ALIAS_FILE = 'aliases.json';

const aliasFile = z.record(z.string());

export interface LoadedSchemaSources {
  sources: SchemaSourceInput[];
  aliases: Record<string, string>;
  problems: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read every `*.json` schema in a directory. `aliases.json` holds the alias map.
 * Files that cannot be read or parsed are reported rather than thrown.
 */
export async function loadSchemaSources(dir: string): Promise<LoadedSchemaSources> {
  const problems: string[] = [];
  const sources: SchemaSourceInput[] = [];
  let aliases: Record<string, string> = {};

  let entries: string[];
  try {
    entries = await fs.promises.readdir(dir);
  } catch (error) {
    return { sources, aliases, problems: [`${dir}: cannot read schema directory (${errorMessage(error)})`] };
  }

  for (const file of entries.filter(f => f.endsWith('.json')).sort()) {
    const filePath = path.join(dir, file);
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.promises.readFile(filePath, 'utf-8'));
    } catch (error) {
      problems.push(`${file}: ${errorMessage(error)}`);
      continue;
    }

    if (file === ALIAS_FILE) {
      const result = aliasFile.safeParse(parsed);
      if (result.success) {
        aliases = result.data;
      } else {
        problems.push(`${file}: alias map must be an object of string to string`);
      }
      continue;
    }

    if (!isRecord(parsed)) {
      problems.push(`${file}: schema file must contain a JSON object`);
      continue;
    }
    const fields = parsed.fields;
    if (!isRecord(fields)) {
      problems.push(`${file}: missing "fields" object`);
      continue;
    }
    sources.push({
      name: typeof parsed.name === 'string' ? parsed.name : path.basename(file, '.json'),
      fields,
      metadata: isRecord(parsed.metadata) ? parsed.metadata : undefined,
    });
  }

  return { sources, aliases, problems };
}

/** Build a catalog from a schema directory, folding file problems into `schema_invalid` */
export async function loadSchemaCatalogFromDir(dir: string): Promise<Result<SchemaCatalog, 'schema_invalid'>> {
  const { sources, aliases, problems } = await loadSchemaSources(dir);
  const catalog = SchemaCatalog.load(sources, aliases);

  if (problems.length === 0) {
    return catalog;
  }
  const fileSection = `Schema files with problems:\n  ${problems.join('\n  ')}`;
  return fail('schema_invalid', catalog.ok ? fileSection : `${catalog.message}\n${fileSection}`);
}
