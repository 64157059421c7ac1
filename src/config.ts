/**
 * Configuration for the LegiScan client
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { ConfigurationError } from './errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Code tables live in data/ at the package root
// __dirname is src/ or dist/, so go up one level
export const DATA_DIR = join(__dirname, '..', 'data');
export const CODES_FILE = join(DATA_DIR, 'codes.json');

// LegiScan API
export const LEGISCAN_BASE_URL = 'https://api.legiscan.com/';
export const API_KEY_ENV = 'LEGISCAN_API_KEY';
export const BASE_URL_ENV = 'LEGISCAN_BASE_URL';

export interface LegiScanClientOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  verbose?: boolean;
}

export interface ClientConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs?: number;
  verbose: boolean;
}

/**
 * Resolve client configuration from explicit options, falling back to the environment
 */
export function resolveClientConfig(
  options: LegiScanClientOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  const apiKey = (options.apiKey ?? env[API_KEY_ENV] ?? '').trim();
  if (!apiKey) {
    throw new ConfigurationError(
      `No LegiScan API key: pass apiKey or set ${API_KEY_ENV}`
    );
  }

  if (options.timeoutMs !== undefined && !(options.timeoutMs > 0)) {
    throw new ConfigurationError(`timeoutMs must be a positive number, got ${options.timeoutMs}`);
  }

  return {
    apiKey,
    baseUrl: options.baseUrl ?? (env[BASE_URL_ENV] || LEGISCAN_BASE_URL),
    timeoutMs: options.timeoutMs,
    verbose: options.verbose ?? false
  };
}
