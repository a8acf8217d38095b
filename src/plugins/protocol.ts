/**
 * Plugin Calling Convention
 *
 * Every capability takes a single JSON-encoded request and answers with a
 * single JSON-encoded response. A response carries either its success fields
 * or an `error` message, never both.
 *
 * @module plugins/protocol
 */

import { hasProperty, isRecord } from '../utils/type-guards.js';

// ─── Discovery Metadata ──────────────────────────────────────────────────────

export interface QualifierDescriptor {
  name: string;
  inputTypes: string[];
  description: string;
}

export interface PluginInfo {
  name: string;
  version: string;
  actions: string[];
  qualifiers: QualifierDescriptor[];
}

export interface TextPlugin {
  info(): PluginInfo;
  /** Run a named action; the answer is always a JSON document. */
  execute(action: string, inputJson: string): string;
  /** Apply a named qualifier; the answer is always a JSON document. */
  qualifier(name: string, inputJson: string): string;
}

// ─── Responses ───────────────────────────────────────────────────────────────

export interface ErrorResponse {
  error: string;
}

export function errorResponse(message: string): string {
  const response: ErrorResponse = { error: message };
  return JSON.stringify(response);
}

export function isErrorResponse(value: unknown): value is ErrorResponse {
  return isRecord(value) && hasProperty(value, 'error') && typeof value.error === 'string';
}

// ─── Requests ────────────────────────────────────────────────────────────────

export type PluginRequest = Record<string, unknown>;

export type DecodedRequest =
  | { ok: true; request: PluginRequest }
  | { ok: false; error: string };

/** Parse a request document; malformed input is reported, not thrown. */
export function decodeRequest(inputJson: string): DecodedRequest {
  let parsed: unknown;
  try {
    parsed = JSON.parse(inputJson);
  } catch {
    return { ok: false, error: 'Invalid JSON input' };
  }
  if (!isRecord(parsed)) {
    return { ok: false, error: 'Request must be a JSON object' };
  }
  return { ok: true, request: parsed };
}

/** Subject text of a request: `data`, falling back to `object`. */
export function requestText(request: PluginRequest): string | undefined {
  const subject = request.data ?? request.object;
  return typeof subject === 'string' ? subject : undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
