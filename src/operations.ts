/**
 * Operation schema: one entry per LegiScan API call
 *
 * Each operation declares the parameters it accepts (by the names callers use),
 * the wire name of each parameter where it differs, the response payload key,
 * and which payload fields carry codes to translate.
 */

import { z } from 'zod';
import type { CodeTable } from './codes.js';
import { ShapeError } from './errors.js';
import { isRecord } from './utils.js';
import {
  sessionSchema,
  masterListSchema,
  billSchema,
  billTextSchema,
  amendmentSchema,
  supplementSchema,
  rollCallSchema,
  personSchema,
  searchResultsSchema,
  datasetSummarySchema,
  datasetSchema,
  sessionPeopleSchema,
  sponsoredListSchema
} from './types.js';

// =============================================================================
// TRANSLATION PLANS
// =============================================================================

export interface CodeField {
  field: string;
  table: CodeTable;
  as: string;
}

/**
 * Code fields on an object, and plans for the objects (or arrays of objects)
 * nested under named keys
 */
export interface TranslationPlan {
  fields?: readonly CodeField[];
  children?: Readonly<Record<string, TranslationPlan>>;
}

const mimeField: CodeField = { field: 'mime_id', table: 'mime', as: 'mime_desc' };
const chamberField: CodeField = { field: 'chamber', table: 'chamber', as: 'chamber_desc' };

const PERSON_CODES: TranslationPlan = {
  fields: [
    { field: 'party_id', table: 'party', as: 'party_desc' },
    { field: 'role_id', table: 'role', as: 'role_desc' }
  ]
};

const SPONSOR_CODES: TranslationPlan = {
  fields: [
    ...(PERSON_CODES.fields ?? []),
    { field: 'sponsor_type_id', table: 'sponsorType', as: 'sponsor_type_desc' }
  ]
};

const TEXT_CODES: TranslationPlan = {
  fields: [{ field: 'type_id', table: 'text', as: 'type_desc' }, mimeField]
};

const AMENDMENT_CODES: TranslationPlan = {
  fields: [chamberField, mimeField]
};

const SUPPLEMENT_CODES: TranslationPlan = {
  fields: [{ field: 'type_id', table: 'supplement', as: 'type_desc' }, mimeField]
};

const BILL_CODES: TranslationPlan = {
  fields: [
    { field: 'status', table: 'status', as: 'status_desc' },
    { field: 'bill_type_id', table: 'billType', as: 'bill_type_desc' },
    { field: 'body', table: 'chamber', as: 'body_desc' },
    { field: 'current_body', table: 'chamber', as: 'current_body_desc' }
  ],
  children: {
    progress: { fields: [{ field: 'event', table: 'status', as: 'event_desc' }] },
    history: { fields: [chamberField] },
    sponsors: SPONSOR_CODES,
    sasts: { fields: [{ field: 'type_id', table: 'sast', as: 'type_desc' }] },
    texts: TEXT_CODES,
    votes: { fields: [chamberField] },
    amendments: AMENDMENT_CODES,
    supplements: SUPPLEMENT_CODES
  }
};

const ROLL_CALL_CODES: TranslationPlan = {
  fields: [chamberField],
  children: {
    votes: { fields: [{ field: 'vote_id', table: 'vote', as: 'vote_desc' }] }
  }
};

const MASTER_LIST_CODES: TranslationPlan = {
  children: {
    bills: { fields: [{ field: 'status', table: 'status', as: 'status_desc' }] }
  }
};

// =============================================================================
// RESHAPING
// =============================================================================

/**
 * Split an object holding one named header entry plus numbered entries
 * ({ session: {...}, "0": {...}, "1": {...} }) into header and list
 */
function splitNumbered(
  operation: string,
  payload: unknown,
  headKey: string,
  listKey: string
): Record<string, unknown> {
  if (!isRecord(payload)) {
    throw new ShapeError(operation, 'payload is not an object');
  }
  if (!(headKey in payload)) {
    throw new ShapeError(operation, `payload is missing "${headKey}"`);
  }

  const { [headKey]: head, ...rest } = payload;
  const nested = rest[listKey];
  const items = Array.isArray(nested)
    ? nested
    : Object.entries(rest)
        .filter(([key]) => /^\d+$/.test(key))
        .map(([, value]) => value);

  return { [headKey]: head, [listKey]: items };
}

// =============================================================================
// OPERATIONS
// =============================================================================

export interface OperationSpec<S extends z.ZodTypeAny = z.ZodTypeAny> {
  /** Value of the `op` query parameter */
  op: string;
  payloadKey: string;
  required: readonly string[];
  optional: readonly string[];
  /** At least one of these must be supplied */
  oneOf?: readonly string[];
  /** Caller parameter name -> query parameter name, where they differ */
  wireNames?: Readonly<Record<string, string>>;
  reshape?: (payload: unknown) => unknown;
  translations?: TranslationPlan;
  schema: S;
}

function defineOperation<S extends z.ZodTypeAny>(spec: OperationSpec<S>): OperationSpec<S> {
  return spec;
}

export const OPERATIONS = {
  getSessionList: defineOperation({
    op: 'getSessionList',
    payloadKey: 'sessions',
    required: ['state'],
    optional: [],
    schema: z.array(sessionSchema)
  }),
  getMasterList: defineOperation({
    op: 'getMasterList',
    payloadKey: 'masterlist',
    required: [],
    optional: [],
    oneOf: ['state', 'session_id'],
    wireNames: { session_id: 'id' },
    reshape: payload => splitNumbered('getMasterList', payload, 'session', 'bills'),
    translations: MASTER_LIST_CODES,
    schema: masterListSchema
  }),
  getMasterListRaw: defineOperation({
    op: 'getMasterListRaw',
    payloadKey: 'masterlist',
    required: [],
    optional: [],
    oneOf: ['state', 'session_id'],
    wireNames: { session_id: 'id' },
    reshape: payload => splitNumbered('getMasterListRaw', payload, 'session', 'bills'),
    schema: masterListSchema
  }),
  getBill: defineOperation({
    op: 'getBill',
    payloadKey: 'bill',
    required: ['bill_id'],
    optional: [],
    wireNames: { bill_id: 'id' },
    translations: BILL_CODES,
    schema: billSchema
  }),
  getBillText: defineOperation({
    op: 'getBillText',
    payloadKey: 'text',
    required: ['doc_id'],
    optional: [],
    wireNames: { doc_id: 'id' },
    translations: TEXT_CODES,
    schema: billTextSchema
  }),
  getAmendment: defineOperation({
    op: 'getAmendment',
    payloadKey: 'amendment',
    required: ['amendment_id'],
    optional: [],
    wireNames: { amendment_id: 'id' },
    translations: AMENDMENT_CODES,
    schema: amendmentSchema
  }),
  getSupplement: defineOperation({
    op: 'getSupplement',
    payloadKey: 'supplement',
    required: ['supplement_id'],
    optional: [],
    wireNames: { supplement_id: 'id' },
    translations: SUPPLEMENT_CODES,
    schema: supplementSchema
  }),
  getRollCall: defineOperation({
    op: 'getRollcall',
    payloadKey: 'roll_call',
    required: ['roll_call_id'],
    optional: [],
    wireNames: { roll_call_id: 'id' },
    translations: ROLL_CALL_CODES,
    schema: rollCallSchema
  }),
  getPerson: defineOperation({
    op: 'getPerson',
    payloadKey: 'person',
    required: ['people_id'],
    optional: [],
    translations: PERSON_CODES,
    schema: personSchema
  }),
  search: defineOperation({
    op: 'search',
    payloadKey: 'searchresult',
    required: ['state'],
    optional: ['year', 'page'],
    oneOf: ['bill', 'query'],
    reshape: payload => splitNumbered('search', payload, 'summary', 'results'),
    schema: searchResultsSchema
  }),
  searchRaw: defineOperation({
    op: 'searchRaw',
    payloadKey: 'searchresult',
    required: ['state', 'query'],
    optional: ['year', 'page'],
    reshape: payload => splitNumbered('searchRaw', payload, 'summary', 'results'),
    schema: searchResultsSchema
  }),
  getDatasetList: defineOperation({
    op: 'getDatasetList',
    payloadKey: 'datasetlist',
    required: [],
    optional: ['state', 'year'],
    schema: z.array(datasetSummarySchema)
  }),
  getDataset: defineOperation({
    op: 'getDataset',
    payloadKey: 'dataset',
    required: ['session_id', 'access_key'],
    optional: [],
    wireNames: { session_id: 'id' },
    schema: datasetSchema
  }),
  getSessionPeople: defineOperation({
    op: 'getSessionPeople',
    payloadKey: 'sessionpeople',
    required: ['session_id'],
    optional: [],
    translations: { children: { people: PERSON_CODES } },
    schema: sessionPeopleSchema
  }),
  getSponsoredList: defineOperation({
    op: 'getSponsoredList',
    payloadKey: 'sponsoredbills',
    required: ['people_id'],
    optional: [],
    translations: { children: { sponsor: PERSON_CODES } },
    schema: sponsoredListSchema
  })
};

export type OperationName = keyof typeof OPERATIONS;

export const OPERATION_NAMES = Object.keys(OPERATIONS).filter(isOperationName);

export function isOperationName(name: string): name is OperationName {
  return Object.prototype.hasOwnProperty.call(OPERATIONS, name);
}

/**
 * Every parameter name an operation accepts
 */
export function acceptedParameters(spec: OperationSpec): string[] {
  return [...spec.required, ...(spec.oneOf ?? []), ...spec.optional];
}
