/**
 * Request parser: splits a raw ad-request string into its base URL and
 * query parameters.
 */

import { unescape as unescapeQueryValue } from 'node:querystring';
import type { ParsedRequest } from '../../types/validation.js';
import { RequestParseError } from '../errors.js';
import { getLogger } from '../logger.js';

export interface ParseRequestOptions {
  /** URL-decode values (`+` as space, then percent-escapes). */
  decode: boolean;
  /** Reject a request without a `?` query part. */
  requireQuery: boolean;
}

/**
 * Decode a form-encoded value. Malformed percent-escapes are kept as received.
 */
export function decodeValue(value: string): string {
  return unescapeQueryValue(value.replace(/\+/g, ' '));
}

/**
 * Split a query string into parameters. The last occurrence of a key wins;
 * a pair without `=` is a key with an empty value.
 */
export function parseQuery(query: string, decode: boolean): Map<string, string> {
  const params = new Map<string, string>();
  for (const pair of query.split('&')) {
    if (pair === '') continue;
    const eq = pair.indexOf('=');
    const key = eq === -1 ? pair : pair.slice(0, eq);
    const raw = eq === -1 ? '' : pair.slice(eq + 1);
    if (key === '') continue;
    params.set(key, decode ? decodeValue(raw) : raw);
  }
  return params;
}

/**
 * Parse a raw request string.
 *
 * @throws RequestParseError when the input is empty, or has no query part
 *   while `requireQuery` is set
 */
export function parseRequest(raw: string, options: ParseRequestOptions): ParsedRequest {
  const input = raw.trim();
  if (input === '') {
    throw new RequestParseError('EmptyRequest', 'VAST request is empty', {
      fix: 'Pass the full ad-request URL as the first argument',
    });
  }

  const queryStart = input.indexOf('?');
  if (queryStart === -1) {
    if (options.requireQuery) {
      throw new RequestParseError('MissingQuery', `VAST request has no query string: ${input}`, {
        fix: 'Quote the URL so the shell keeps everything after "?"',
      });
    }
    return { baseUrl: input, params: new Map() };
  }

  const baseUrl = input.slice(0, queryStart);
  // '#' stays part of the query.
  const params = parseQuery(input.slice(queryStart + 1), options.decode);
  getLogger('request').debug({ baseUrl, parameterCount: params.size, decode: options.decode }, 'Parsed VAST request');
  return { baseUrl, params };
}
