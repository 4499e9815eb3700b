/**
 * Language Names
 * 
 * English language names, as lookup services report them, mapped to
 * three-letter ISO 639 codes. The table lives in `data/languages.json`.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const TABLE_URL = new URL('../data/languages.json', import.meta.url);

const tableSchema = z.record(z.string().regex(/^[a-z]{3}$/));

let table: ReadonlyMap<string, string> | null = null;

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

export function loadLanguageTable(): ReadonlyMap<string, string> {
  if (!table) {
    const entries = tableSchema.parse(JSON.parse(readFileSync(TABLE_URL, 'utf8')));
    table = new Map(Object.entries(entries).map(([name, code]) => [normalizeName(name), code]));
  }
  return table;
}

/**
 * Three-letter code for a language name, or null when the name is unknown
 */
export function languageCodeForName(name: string): string | null {
  return loadLanguageTable().get(normalizeName(name)) ?? null;
}
