#!/usr/bin/env node
/**
 * CLI for listing LegiScan code tables
 *
 * Usage:
 *   npm run codes                  # All tables
 *   npm run codes -- --table status
 */

import { CODE_TABLES, listCodes, resolveCodeTable } from '../codes.js';
import { parseArgs } from '../utils.js';

const args = parseArgs(process.argv.slice(2));

try {
  const tables = typeof args.table === 'string' ? [resolveCodeTable(args.table)] : CODE_TABLES;

  for (const table of tables) {
    console.log(`\n${table}`);
    for (const { code, label } of listCodes(table)) {
      console.log(`  ${code.padStart(3)}  ${label}`);
    }
  }
} catch (err) {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
}
