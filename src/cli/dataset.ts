#!/usr/bin/env node
import 'dotenv/config';

/**
 * CLI for downloading LegiScan session datasets
 *
 * Usage:
 *   npm run dataset -- --state IL                       # List datasets for Illinois
 *   npm run dataset -- --session_id 2011 --access_key <key>
 *   npm run dataset -- --session_id 2011 --access_key <key> --out datasets
 */

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { LegiScanClient } from '../client.js';
import { ensureDir, parseArgs } from '../utils.js';

const args = parseArgs(process.argv.slice(2));

const state = typeof args.state === 'string' ? args.state : undefined;
const year = typeof args.year === 'string' ? args.year : undefined;
const sessionId = typeof args.session_id === 'string' ? args.session_id : undefined;
const accessKey = typeof args.access_key === 'string' ? args.access_key : undefined;
const outDir = typeof args.out === 'string' ? args.out : '.';

async function listDatasets(client: LegiScanClient): Promise<void> {
  const datasets = await client.getDatasetList({ state, year });
  console.log(`Found ${datasets.length} dataset${datasets.length === 1 ? '' : 's'}`);
  for (const dataset of datasets) {
    console.log(
      `  ${dataset.session_id}  ${dataset.session_name ?? ''}  ${dataset.dataset_date ?? ''}  access_key=${dataset.access_key}`
    );
  }
}

async function downloadDataset(client: LegiScanClient, id: string, key: string): Promise<void> {
  console.log(`Fetching dataset for session ${id}...`);
  const dataset = await client.getDataset({ session_id: id, access_key: key });

  const archive = Buffer.from(dataset.zip, 'base64');
  const file = join(outDir, `legiscan-session-${dataset.session_id}.zip`);
  await ensureDir(outDir);
  await writeFile(file, archive);

  console.log(`  Saved ${archive.length} bytes to ${file}`);
}

async function run(): Promise<void> {
  const client = new LegiScanClient({ verbose: Boolean(args.verbose) });

  if (sessionId && accessKey) {
    await downloadDataset(client, sessionId, accessKey);
  } else if (sessionId || accessKey) {
    throw new Error('--session_id and --access_key must be given together');
  } else {
    await listDatasets(client);
  }
}

run().catch((err) => {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
