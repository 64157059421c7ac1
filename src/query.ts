/**
 * Build LegiScan query strings from operation parameters
 */

import { ParameterError } from './errors.js';
import { acceptedParameters, type OperationSpec } from './operations.js';
import type { ParamValue, QueryParams } from './types.js';

/**
 * Unset values, including empty lists, are never sent
 */
function isSet(value: ParamValue): boolean {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return value !== undefined && value !== null;
}

function serialize(value: ParamValue): string {
  if (Array.isArray(value)) {
    return value.map(String).join(',');
  }
  return String(value);
}

/**
 * Check parameters against the operation and serialize them, after `key` and
 * `op`, in the order the operation declares them. Unset values are left out.
 */
export function buildQuery(spec: OperationSpec, params: QueryParams, apiKey: string): string {
  const accepted = acceptedParameters(spec);

  for (const name of Object.keys(params)) {
    if (!accepted.includes(name)) {
      throw new ParameterError(spec.op, name, `unexpected parameter "${name}"`);
    }
  }

  for (const name of spec.required) {
    if (!isSet(params[name])) {
      throw new ParameterError(spec.op, name, `missing required parameter "${name}"`);
    }
  }

  if (spec.oneOf && !spec.oneOf.some(name => isSet(params[name]))) {
    const group = spec.oneOf.join(' or ');
    throw new ParameterError(spec.op, group, `one of ${group} is required`);
  }

  const query = new URLSearchParams();
  query.set('key', apiKey);
  query.set('op', spec.op);

  for (const name of accepted) {
    const value = params[name];
    if (isSet(value)) {
      query.set(spec.wireNames?.[name] ?? name, serialize(value));
    }
  }

  return query.toString();
}

/**
 * Full request URL for a query string
 */
export function buildUrl(baseUrl: string, query: string): string {
  return `${baseUrl}?${query}`;
}
