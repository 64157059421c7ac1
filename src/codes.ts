/**
 * Code registry: static LegiScan code tables
 *
 * data/codes.json is the single source of truth for code labels. It is read
 * once when this module loads and never modified afterwards.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { CODES_FILE } from './config.js';

export const CODE_TABLES = [
  'billType',
  'mime',
  'party',
  'reason',
  'role',
  'sast',
  'sponsorType',
  'status',
  'supplement',
  'text',
  'vote',
  'chamber'
] as const;

export type CodeTable = (typeof CODE_TABLES)[number];

export type Code = number | string;

export interface CodeEntry {
  code: string;
  label: string;
}

export const UNKNOWN_CODE_LABEL = 'Unknown';

const codesFileSchema = z.record(z.string(), z.record(z.string(), z.string()));

function loadRegistry(file: string): ReadonlyMap<CodeTable, ReadonlyMap<string, string>> {
  const parsed = codesFileSchema.parse(JSON.parse(readFileSync(file, 'utf-8')));
  const registry = new Map<CodeTable, ReadonlyMap<string, string>>();

  for (const table of CODE_TABLES) {
    const entries = parsed[table];
    if (!entries) {
      throw new Error(`Code table "${table}" is missing from ${file}`);
    }
    registry.set(table, new Map(Object.entries(entries)));
  }

  return registry;
}

const REGISTRY = loadRegistry(CODES_FILE);

function getTable(table: CodeTable): ReadonlyMap<string, string> {
  const entries = REGISTRY.get(table);
  if (!entries) {
    throw new Error(`Unknown code table: ${table}`);
  }
  return entries;
}

/**
 * Type guard for code table names
 */
export function isCodeTable(name: string): name is CodeTable {
  return CODE_TABLES.some(table => table === name);
}

/**
 * Turn a user-supplied table name into a CodeTable, throwing for unknown names
 */
export function resolveCodeTable(name: string): CodeTable {
  if (!isCodeTable(name)) {
    throw new Error(`Unknown code table: ${name} (expected one of ${CODE_TABLES.join(', ')})`);
  }
  return name;
}

/**
 * Label for a code, or undefined when the table has no such code
 */
export function describeCode(table: CodeTable, code: Code): string | undefined {
  return getTable(table).get(String(code).trim());
}

/**
 * Label for a code; unknown codes get UNKNOWN_CODE_LABEL instead of an error
 */
export function lookupCode(table: CodeTable, code: Code): string {
  return describeCode(table, code) ?? UNKNOWN_CODE_LABEL;
}

/**
 * Every entry of a table as { code, label } pairs
 */
export function listCodes(table: CodeTable): CodeEntry[] {
  return Array.from(getTable(table), ([code, label]) => ({ code, label }));
}
