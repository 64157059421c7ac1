#!/usr/bin/env node
import 'dotenv/config';

/**
 * CLI for running a single LegiScan operation
 *
 * Usage:
 *   npm run query -- --op getSessionList --state IL
 *   npm run query -- --op getBill --bill_id 1234567
 *   npm run query -- --op getBill --bill_id 1234567 --untranslated
 *   npm run query -- --op search --state CA --query "water rights" --out results.json
 */

import { LegiScanClient } from '../client.js';
import { OPERATION_NAMES, isOperationName, type OperationName } from '../operations.js';
import { parseArgs, writeJson } from '../utils.js';

const { op, out, untranslated, verbose, ...rest } = parseArgs(process.argv.slice(2));

if (typeof op !== 'string' || !isOperationName(op)) {
  console.error('Usage: npm run query -- --op <operation> [--<param> <value> ...] [--untranslated] [--out <file>]');
  console.error('');
  console.error(`Operations: ${OPERATION_NAMES.join(', ')}`);
  process.exit(1);
}

const params: Record<string, string> = {};
for (const [key, value] of Object.entries(rest)) {
  if (typeof value !== 'string') {
    console.error(`Missing value for --${key}`);
    process.exit(1);
  }
  params[key] = value;
}

async function runQuery(operation: OperationName): Promise<void> {
  const client = new LegiScanClient({ verbose: Boolean(verbose) });
  const result = await client.request(operation, params, { translate: !untranslated });

  if (typeof out === 'string') {
    await writeJson(out, result);
    console.log(`Saved ${operation} result to ${out}`);
  } else {
    console.log(JSON.stringify(result, null, 2));
  }
}

runQuery(op).catch((err) => {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
