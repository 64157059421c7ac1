/**
 * Turn LegiScan response bodies into checked, code-annotated results
 */

import type { z } from 'zod';
import { describeCode, UNKNOWN_CODE_LABEL, type Code, type CodeTable } from './codes.js';
import { ApiError, DecodeError, ShapeError } from './errors.js';
import type { OperationSpec, TranslationPlan } from './operations.js';
import { envelopeSchema } from './types.js';
import { isRecord } from './utils.js';

export type UnknownCodeHandler = (table: CodeTable, code: Code, field: string) => void;

export interface NormalizeOptions {
  /** Add *_desc labels for code fields (default true) */
  translate?: boolean;
  onUnknownCode?: UnknownCodeHandler;
}

/**
 * Walk a payload and add the label of every code field the plan names.
 * Returns new objects; the input is left as it was.
 */
export function translateCodes(
  value: unknown,
  plan: TranslationPlan,
  onUnknownCode?: UnknownCodeHandler
): unknown {
  if (Array.isArray(value)) {
    return value.map(item => translateCodes(item, plan, onUnknownCode));
  }
  if (!isRecord(value)) {
    return value;
  }

  const result: Record<string, unknown> = { ...value };

  for (const { field, table, as } of plan.fields ?? []) {
    const code = result[field];
    if (typeof code !== 'number' && typeof code !== 'string') continue;

    const label = describeCode(table, code);
    if (label === undefined) {
      onUnknownCode?.(table, code, field);
    }
    result[as] = label ?? UNKNOWN_CODE_LABEL;
  }

  for (const [key, childPlan] of Object.entries(plan.children ?? {})) {
    if (key in result) {
      result[key] = translateCodes(result[key], childPlan, onUnknownCode);
    }
  }

  return result;
}

/**
 * Text of the API's alert, when it sent one as { alert: { message: "..." } }
 */
function alertMessage(document: Record<string, unknown>): string | undefined {
  const { alert } = document;
  return isRecord(alert) && typeof alert.message === 'string' ? alert.message : undefined;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Decode a response body for an operation: check the API status, unwrap the
 * payload, reshape it, translate codes and validate the result.
 */
export function normalize<S extends z.ZodTypeAny>(
  spec: OperationSpec<S>,
  body: string,
  options: NormalizeOptions = {}
): z.infer<S> {
  const { translate = true, onUnknownCode } = options;

  let document: unknown;
  try {
    document = JSON.parse(body);
  } catch (err) {
    throw new DecodeError(spec.op, { cause: err });
  }

  const envelope = envelopeSchema.safeParse(document);
  if (!envelope.success || !isRecord(document)) {
    throw new ShapeError(spec.op, 'response has no status field');
  }

  if (envelope.data.status !== 'OK') {
    throw new ApiError(
      spec.op,
      alertMessage(document) ?? `API returned status ${envelope.data.status}`
    );
  }

  if (!(spec.payloadKey in document)) {
    throw new ShapeError(spec.op, `response is missing "${spec.payloadKey}"`);
  }

  let payload = document[spec.payloadKey];
  if (spec.reshape) {
    payload = spec.reshape(payload);
  }
  if (translate && spec.translations) {
    payload = translateCodes(payload, spec.translations, onUnknownCode);
  }

  const result = spec.schema.safeParse(payload);
  if (!result.success) {
    throw new ShapeError(spec.op, `unexpected "${spec.payloadKey}" payload: ${formatIssues(result.error)}`);
  }
  return result.data;
}
