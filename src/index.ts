/**
 * LegiScan client
 *
 * Typed access to the LegiScan legislative data API, with LegiScan's numeric
 * and lettered codes annotated with readable labels.
 */

export { LegiScanClient } from './client.js';
export type { RequestOptions, SearchRawOptions } from './client.js';
export { resolveClientConfig, LEGISCAN_BASE_URL, API_KEY_ENV, BASE_URL_ENV } from './config.js';
export type { LegiScanClientOptions, ClientConfig } from './config.js';
export {
  CODE_TABLES,
  UNKNOWN_CODE_LABEL,
  lookupCode,
  describeCode,
  listCodes,
  isCodeTable,
  resolveCodeTable
} from './codes.js';
export type { CodeTable, Code, CodeEntry } from './codes.js';
export * from './errors.js';
export { OPERATIONS, OPERATION_NAMES, isOperationName } from './operations.js';
export type { OperationName, OperationSpec, TranslationPlan, CodeField } from './operations.js';
export { buildQuery, buildUrl } from './query.js';
export { fetchRaw } from './transport.js';
export type { FetchOptions } from './transport.js';
export { normalize, translateCodes } from './normalize.js';
export type { NormalizeOptions, UnknownCodeHandler } from './normalize.js';
export * from './types.js';
