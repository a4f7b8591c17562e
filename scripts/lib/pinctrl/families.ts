import fs from 'fs-extra';
import { fileURLToPath } from 'node:url';

import { describeSource, isRecord } from '../xml.js';

export type FamilyTable = Map<string, string[]>;

export const DEFAULT_FAMILIES_PATH = fileURLToPath(
  new URL('../../../config/families.json', import.meta.url)
);

export function parseFamilyTable(data: unknown, source: string): FamilyTable {
  const label = describeSource(source);
  if (!isRecord(data)) {
    throw new Error(`${label} must map family names to variant lists`);
  }

  const table: FamilyTable = new Map();
  for (const [family, variants] of Object.entries(data)) {
    if (!Array.isArray(variants) || variants.length === 0) {
      throw new Error(`${label} family '${family}' must list at least one variant`);
    }
    const names: string[] = [];
    for (const variant of variants) {
      if (typeof variant !== 'string' || variant.trim().length === 0) {
        throw new Error(`${label} family '${family}' has an invalid variant entry`);
      }
      names.push(variant.trim());
    }
    table.set(family, names);
  }

  if (table.size === 0) {
    throw new Error(`${label} defines no families`);
  }
  return table;
}

export async function loadFamilyTable(filePath: string = DEFAULT_FAMILIES_PATH): Promise<FamilyTable> {
  if (!(await fs.pathExists(filePath))) {
    throw new Error(`Family configuration not found: ${describeSource(filePath)}`);
  }
  const data: unknown = await fs.readJson(filePath);
  return parseFamilyTable(data, filePath);
}

export function familyVariants(table: FamilyTable, family: string): string[] {
  const variants = table.get(family);
  if (!variants) {
    throw new Error(`Unknown family '${family}'. Expected ${Array.from(table.keys()).join('|')}`);
  }
  return variants;
}
