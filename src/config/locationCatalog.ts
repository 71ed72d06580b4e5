import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { ConfigurationError } from '../domains/caseFlow/errors';
import { locationCatalogSchema, type LocationCatalog } from '../schemas/caseFlow.schema';

export function parseLocationCatalog(input: unknown): LocationCatalog {
  const parsed = locationCatalogSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError('CASE_FLOW_CATALOG_INVALID', 'Location catalog failed validation', {
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    });
  }
  return parsed.data;
}

export async function loadLocationCatalog(catalogPath: string, cwd: string = process.cwd()): Promise<LocationCatalog> {
  const resolved = path.resolve(cwd, catalogPath);
  const text = await readFile(resolved, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError('CASE_FLOW_CATALOG_INVALID', 'Location catalog is not valid JSON', {
      path: resolved,
      cause: error instanceof Error ? error.message : String(error)
    });
  }
  return parseLocationCatalog(json);
}
