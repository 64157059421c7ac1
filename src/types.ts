/**
 * Schemas and types for LegiScan API payloads
 *
 * Each schema names the fields callers rely on and passes every other field
 * through untouched. The *_desc fields are added by code translation and are
 * absent from untranslated results.
 */

import { z } from 'zod';

const code = z.union([z.number(), z.string()]);
const label = z.string().optional();

// =============================================================================
// PARAMETERS
// =============================================================================

export type ParamValue = string | number | boolean | readonly (string | number)[] | null | undefined;

export type QueryParams = Readonly<Record<string, ParamValue>>;

export type StateParams = { state: string };
export type SessionListParams = StateParams;
export type MasterListParams = { state?: string; session_id?: number | string };
export type BillParams = { bill_id: number | string };
export type BillTextParams = { doc_id: number | string };
export type AmendmentParams = { amendment_id: number | string };
export type SupplementParams = { supplement_id: number | string };
export type RollCallParams = { roll_call_id: number | string };
export type PersonParams = { people_id: number | string };
export type SearchParams = {
  state: string;
  bill?: string;
  query?: string;
  year?: number | string;
  page?: number | string;
};
export type SearchRawParams = {
  state: string;
  query: string;
  year?: number | string;
  page?: number | string;
};
export type DatasetListParams = { state?: string; year?: number | string };
export type DatasetParams = { session_id: number | string; access_key: string };
export type SessionPeopleParams = { session_id: number | string };
export type SponsoredListParams = { people_id: number | string };

// =============================================================================
// RESPONSE ENVELOPE
// =============================================================================

export const envelopeSchema = z.object({ status: z.string() }).passthrough();

export type Envelope = z.infer<typeof envelopeSchema>;

// =============================================================================
// SESSIONS AND PEOPLE
// =============================================================================

export const sessionSchema = z
  .object({
    session_id: z.number(),
    state_id: z.number().optional(),
    year_start: z.number().optional(),
    year_end: z.number().optional(),
    special: z.number().optional(),
    session_name: z.string().optional(),
    session_title: z.string().optional()
  })
  .passthrough();

export const personSchema = z
  .object({
    people_id: z.number(),
    name: z.string(),
    party_id: code.optional(),
    party: z.string().optional(),
    party_desc: label,
    role_id: code.optional(),
    role: z.string().optional(),
    role_desc: label,
    district: z.string().optional()
  })
  .passthrough();

export const sponsorSchema = personSchema
  .extend({
    sponsor_type_id: code.optional(),
    sponsor_type_desc: label,
    sponsor_order: z.number().optional()
  })
  .passthrough();

export type Session = z.infer<typeof sessionSchema>;
export type Person = z.infer<typeof personSchema>;
export type Sponsor = z.infer<typeof sponsorSchema>;

// =============================================================================
// BILLS
// =============================================================================

export const progressEventSchema = z
  .object({
    date: z.string(),
    event: code,
    event_desc: label
  })
  .passthrough();

export const historyStepSchema = z
  .object({
    date: z.string(),
    action: z.string(),
    chamber: z.string().optional(),
    chamber_desc: label
  })
  .passthrough();

export const sastSchema = z
  .object({
    type_id: code,
    type_desc: label,
    sast_bill_number: z.string().optional(),
    sast_bill_id: z.number().optional()
  })
  .passthrough();

export const billTextSchema = z
  .object({
    doc_id: z.number(),
    bill_id: z.number().optional(),
    date: z.string().optional(),
    type_id: code.optional(),
    type_desc: label,
    mime_id: code.optional(),
    mime_desc: label,
    doc: z.string().optional()
  })
  .passthrough();

export const amendmentSchema = z
  .object({
    amendment_id: z.number(),
    bill_id: z.number().optional(),
    chamber: z.string().optional(),
    chamber_desc: label,
    adopted: z.number().optional(),
    title: z.string().optional(),
    mime_id: code.optional(),
    mime_desc: label,
    doc: z.string().optional()
  })
  .passthrough();

export const supplementSchema = z
  .object({
    supplement_id: z.number(),
    bill_id: z.number().optional(),
    type_id: code.optional(),
    type_desc: label,
    title: z.string().optional(),
    mime_id: code.optional(),
    mime_desc: label,
    doc: z.string().optional()
  })
  .passthrough();

export const voteSummarySchema = z
  .object({
    roll_call_id: z.number(),
    chamber: z.string().optional(),
    chamber_desc: label,
    passed: z.number().optional()
  })
  .passthrough();

export const billSchema = z
  .object({
    bill_id: z.number(),
    bill_number: z.string(),
    state: z.string().optional(),
    session_id: z.number().optional(),
    title: z.string().optional(),
    status: code.optional(),
    status_desc: label,
    bill_type_id: code.optional(),
    bill_type_desc: label,
    body: z.string().optional(),
    body_desc: label,
    current_body: z.string().optional(),
    current_body_desc: label,
    progress: z.array(progressEventSchema).optional(),
    history: z.array(historyStepSchema).optional(),
    sponsors: z.array(sponsorSchema).optional(),
    sasts: z.array(sastSchema).optional(),
    texts: z.array(billTextSchema).optional(),
    votes: z.array(voteSummarySchema).optional(),
    amendments: z.array(amendmentSchema).optional(),
    supplements: z.array(supplementSchema).optional()
  })
  .passthrough();

export type ProgressEvent = z.infer<typeof progressEventSchema>;
export type HistoryStep = z.infer<typeof historyStepSchema>;
export type Sast = z.infer<typeof sastSchema>;
export type BillText = z.infer<typeof billTextSchema>;
export type Amendment = z.infer<typeof amendmentSchema>;
export type Supplement = z.infer<typeof supplementSchema>;
export type VoteSummary = z.infer<typeof voteSummarySchema>;
export type Bill = z.infer<typeof billSchema>;

// =============================================================================
// MASTER LIST
// =============================================================================

export const masterListBillSchema = z
  .object({
    bill_id: z.number(),
    number: z.string(),
    change_hash: z.string().optional(),
    status: code.optional(),
    status_desc: label,
    last_action: z.string().optional(),
    title: z.string().optional()
  })
  .passthrough();

export const masterListSchema = z.object({
  session: sessionSchema,
  bills: z.array(masterListBillSchema)
});

export type MasterListBill = z.infer<typeof masterListBillSchema>;
export type MasterList = z.infer<typeof masterListSchema>;

// =============================================================================
// ROLL CALLS
// =============================================================================

export const legislatorVoteSchema = z
  .object({
    people_id: z.number(),
    vote_id: code,
    vote_text: z.string().optional(),
    vote_desc: label
  })
  .passthrough();

export const rollCallSchema = z
  .object({
    roll_call_id: z.number(),
    bill_id: z.number(),
    date: z.string().optional(),
    desc: z.string().optional(),
    yea: z.number().optional(),
    nay: z.number().optional(),
    nv: z.number().optional(),
    absent: z.number().optional(),
    total: z.number().optional(),
    passed: z.number().optional(),
    chamber: z.string().optional(),
    chamber_desc: label,
    votes: z.array(legislatorVoteSchema).optional()
  })
  .passthrough();

export type LegislatorVote = z.infer<typeof legislatorVoteSchema>;
export type RollCall = z.infer<typeof rollCallSchema>;

// =============================================================================
// SEARCH
// =============================================================================

export const searchSummarySchema = z
  .object({
    page: z.string().optional(),
    range: z.string().optional(),
    relevancy: z.string().optional(),
    count: z.number(),
    page_current: z.number().optional(),
    page_total: z.number().optional()
  })
  .passthrough();

export const searchResultSchema = z
  .object({
    relevance: z.number(),
    bill_id: z.number(),
    state: z.string().optional(),
    bill_number: z.string().optional(),
    change_hash: z.string().optional(),
    title: z.string().optional(),
    last_action: z.string().optional()
  })
  .passthrough();

export const searchResultsSchema = z.object({
  summary: searchSummarySchema,
  results: z.array(searchResultSchema)
});

export type SearchSummary = z.infer<typeof searchSummarySchema>;
export type SearchResult = z.infer<typeof searchResultSchema>;
export type SearchResults = z.infer<typeof searchResultsSchema>;

// =============================================================================
// DATASETS
// =============================================================================

export const datasetSummarySchema = z
  .object({
    state_id: z.number().optional(),
    session_id: z.number(),
    session_name: z.string().optional(),
    dataset_hash: z.string(),
    dataset_date: z.string().optional(),
    dataset_size: z.number().optional(),
    access_key: z.string()
  })
  .passthrough();

export const datasetSchema = z
  .object({
    session_id: z.number(),
    session_name: z.string().optional(),
    dataset_hash: z.string().optional(),
    mime: z.string().optional(),
    zip: z.string()
  })
  .passthrough();

export type DatasetSummary = z.infer<typeof datasetSummarySchema>;
export type Dataset = z.infer<typeof datasetSchema>;

// =============================================================================
// SESSION PEOPLE AND SPONSORED BILLS
// =============================================================================

export const sessionPeopleSchema = z.object({
  session: sessionSchema,
  people: z.array(personSchema)
});

export const sponsoredBillSchema = z
  .object({
    bill_id: z.number(),
    number: z.string().optional(),
    session_id: z.number().optional()
  })
  .passthrough();

export const sponsoredListSchema = z
  .object({
    sponsor: personSchema,
    sessions: z.array(sessionSchema),
    bills: z.array(sponsoredBillSchema)
  })
  .passthrough();

export type SessionPeople = z.infer<typeof sessionPeopleSchema>;
export type SponsoredBill = z.infer<typeof sponsoredBillSchema>;
export type SponsoredList = z.infer<typeof sponsoredListSchema>;
