/**
 * LegiScan API client
 *
 * One method per API operation. Every call builds the query, performs exactly
 * one GET request and normalizes the response; nothing is cached or retried.
 * The *Untranslated variants skip only the code-label step.
 */

import type { z } from 'zod';
import { resolveClientConfig, type ClientConfig, type LegiScanClientOptions } from './config.js';
import { ParameterError } from './errors.js';
import { normalize, type NormalizeOptions } from './normalize.js';
import { OPERATIONS, type OperationName, type OperationSpec } from './operations.js';
import { buildQuery, buildUrl } from './query.js';
import { fetchRaw } from './transport.js';
import { redactApiKey } from './utils.js';
import type {
  QueryParams,
  SessionListParams,
  MasterListParams,
  BillParams,
  BillTextParams,
  AmendmentParams,
  SupplementParams,
  RollCallParams,
  PersonParams,
  SearchParams,
  SearchRawParams,
  DatasetListParams,
  DatasetParams,
  SessionPeopleParams,
  SponsoredListParams,
  Session,
  MasterList,
  Bill,
  BillText,
  Amendment,
  Supplement,
  RollCall,
  Person,
  SearchResults,
  DatasetSummary,
  Dataset,
  SessionPeople,
  SponsoredList
} from './types.js';

export interface RequestOptions {
  /** Add *_desc labels for code fields (default true) */
  translate?: boolean;
}

export interface SearchRawOptions {
  /** Drop results with relevance below this value (integer 0-100) */
  minRelevance?: number;
}

export class LegiScanClient {
  private readonly config: ClientConfig;

  constructor(options: LegiScanClientOptions = {}) {
    this.config = resolveClientConfig(options);
  }

  /**
   * Run any operation by name. Used by the CLI; typed callers should use the
   * dedicated methods.
   */
  async request(name: OperationName, params: QueryParams, options: RequestOptions = {}): Promise<unknown> {
    const spec: OperationSpec = OPERATIONS[name];
    return this.call(spec, params, options);
  }

  async getSessionList(params: SessionListParams): Promise<Session[]> {
    return this.call(OPERATIONS.getSessionList, params);
  }

  async getMasterList(params: MasterListParams): Promise<MasterList> {
    return this.call(OPERATIONS.getMasterList, params);
  }

  async getMasterListUntranslated(params: MasterListParams): Promise<MasterList> {
    return this.call(OPERATIONS.getMasterList, params, { translate: false });
  }

  /**
   * Master list with change hashes only, for detecting bill changes cheaply
   */
  async getMasterListRaw(params: MasterListParams): Promise<MasterList> {
    return this.call(OPERATIONS.getMasterListRaw, params);
  }

  async getBill(params: BillParams): Promise<Bill> {
    return this.call(OPERATIONS.getBill, params);
  }

  async getBillUntranslated(params: BillParams): Promise<Bill> {
    return this.call(OPERATIONS.getBill, params, { translate: false });
  }

  /**
   * Bill text document; `doc` holds the base64-encoded file
   */
  async getBillText(params: BillTextParams): Promise<BillText> {
    return this.call(OPERATIONS.getBillText, params);
  }

  async getBillTextUntranslated(params: BillTextParams): Promise<BillText> {
    return this.call(OPERATIONS.getBillText, params, { translate: false });
  }

  async getAmendment(params: AmendmentParams): Promise<Amendment> {
    return this.call(OPERATIONS.getAmendment, params);
  }

  async getAmendmentUntranslated(params: AmendmentParams): Promise<Amendment> {
    return this.call(OPERATIONS.getAmendment, params, { translate: false });
  }

  async getSupplement(params: SupplementParams): Promise<Supplement> {
    return this.call(OPERATIONS.getSupplement, params);
  }

  async getSupplementUntranslated(params: SupplementParams): Promise<Supplement> {
    return this.call(OPERATIONS.getSupplement, params, { translate: false });
  }

  async getRollCall(params: RollCallParams): Promise<RollCall> {
    return this.call(OPERATIONS.getRollCall, params);
  }

  async getRollCallUntranslated(params: RollCallParams): Promise<RollCall> {
    return this.call(OPERATIONS.getRollCall, params, { translate: false });
  }

  async getPerson(params: PersonParams): Promise<Person> {
    return this.call(OPERATIONS.getPerson, params);
  }

  async getPersonUntranslated(params: PersonParams): Promise<Person> {
    return this.call(OPERATIONS.getPerson, params, { translate: false });
  }

  /**
   * One page of full-text search results. Needs a bill number or a query;
   * year is 1 (all), 2 (current), 3 (recent), 4 (prior) or an exact year.
   */
  async search(params: SearchParams): Promise<SearchResults> {
    return this.call(OPERATIONS.search, params);
  }

  /**
   * Keyword search returning bare bill ids with relevance scores
   */
  async searchRaw(params: SearchRawParams, options: SearchRawOptions = {}): Promise<SearchResults> {
    const { minRelevance } = options;
    if (
      minRelevance !== undefined &&
      (!Number.isInteger(minRelevance) || minRelevance < 0 || minRelevance > 100)
    ) {
      throw new ParameterError(
        OPERATIONS.searchRaw.op,
        'minRelevance',
        `minRelevance must be an integer from 0 to 100, got ${minRelevance}`
      );
    }

    const data = await this.call(OPERATIONS.searchRaw, params);
    if (minRelevance === undefined) {
      return data;
    }
    return {
      summary: data.summary,
      results: data.results.filter(result => result.relevance >= minRelevance)
    };
  }

  async getDatasetList(params: DatasetListParams = {}): Promise<DatasetSummary[]> {
    return this.call(OPERATIONS.getDatasetList, params);
  }

  /**
   * Session dataset; `zip` holds the base64-encoded ZIP archive
   */
  async getDataset(params: DatasetParams): Promise<Dataset> {
    return this.call(OPERATIONS.getDataset, params);
  }

  async getSessionPeople(params: SessionPeopleParams): Promise<SessionPeople> {
    return this.call(OPERATIONS.getSessionPeople, params);
  }

  async getSessionPeopleUntranslated(params: SessionPeopleParams): Promise<SessionPeople> {
    return this.call(OPERATIONS.getSessionPeople, params, { translate: false });
  }

  async getSponsoredList(params: SponsoredListParams): Promise<SponsoredList> {
    return this.call(OPERATIONS.getSponsoredList, params);
  }

  async getSponsoredListUntranslated(params: SponsoredListParams): Promise<SponsoredList> {
    return this.call(OPERATIONS.getSponsoredList, params, { translate: false });
  }

  toString(): string {
    return `LegiScanClient(${this.config.baseUrl})`;
  }

  private async call<S extends z.ZodTypeAny>(
    spec: OperationSpec<S>,
    params: QueryParams,
    options: RequestOptions = {}
  ): Promise<z.infer<S>> {
    const url = buildUrl(this.config.baseUrl, buildQuery(spec, params, this.config.apiKey));

    if (this.config.verbose) {
      console.log(`[LegiScan] GET ${redactApiKey(url)}`);
    }

    const body = await fetchRaw(url, { operation: spec.op, timeoutMs: this.config.timeoutMs });

    const normalizeOptions: NormalizeOptions = { translate: options.translate ?? true };
    if (this.config.verbose) {
      normalizeOptions.onUnknownCode = (table, code, field) => {
        console.warn(`[LegiScan] ${spec.op}: unknown ${table} code ${code} in "${field}"`);
      };
    }

    return normalize(spec, body, normalizeOptions);
  }
}
