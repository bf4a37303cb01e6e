/**
 * Response decoders. JSON bodies are validated against the schemas in
 * `schema.ts`; a missing or mistyped required field fails the whole decode.
 */

import type { ZodError, ZodTypeAny, output } from 'zod';
import {
  ApiErrorBodySchema,
  MediaInfoSchema,
  UploadResponseSchema,
  type MediaInfo,
  type UploadResponse,
} from './schema.js';
import { ok, err, type DecodeError, type Result } from './result.js';

// Keys whose values are unsigned 64-bit integers
const UINT64_KEYS = ['size', 'duration'];

/**
 * Rewrite the integer literals of 64-bit keys as JSON strings so that
 * `JSON.parse` keeps every digit. Only object keys match: a key inside a
 * string value has its quotes escaped.
 */
export function preserveIntegers(text: string, keys: readonly string[] = UINT64_KEYS): string {
  const pattern = new RegExp(`"(${keys.join('|')})"(\\s*:\\s*)(-?(?:0|[1-9]\\d*))(?=\\s*[,}\\]])`, 'g');
  return text.replace(pattern, '"$1"$2"$3"');
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

function malformed(message: string, issues: string[] = []): DecodeError {
  return { kind: 'malformed-response', message, issues };
}

function parseJson(text: string): Result<unknown, DecodeError> {
  try {
    return ok(JSON.parse(preserveIntegers(text)));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(malformed(`Response body is not valid JSON (${reason})`));
  }
}

function decodeWith<S extends ZodTypeAny>(
  schema: S,
  json: unknown,
  what: string,
): Result<output<S>, DecodeError> {
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return err(malformed(`Malformed ${what}`, formatIssues(parsed.error)));
  }
  return ok(parsed.data);
}

export function textOf(body: string | Uint8Array): string {
  return typeof body === 'string' ? body : new TextDecoder().decode(body);
}

/**
 * Decode the metadata `files/upload` returns.
 */
export function decodeUploadResponse(body: string | Uint8Array): Result<UploadResponse, DecodeError> {
  const json = parseJson(textOf(body));
  if (!json.ok) {
    return json;
  }
  return decodeWith(UploadResponseSchema, json.value, 'upload response');
}

/**
 * Decode a `media_info` value from its JSON text, so a video `duration`
 * keeps all 64 bits.
 */
export function decodeMediaInfo(body: string | Uint8Array): Result<MediaInfo, DecodeError> {
  const json = parseJson(textOf(body));
  if (!json.ok) {
    return json;
  }
  return decodeWith(MediaInfoSchema, json.value, 'media info');
}

/**
 * `files/download` returns the file content as the raw body.
 */
export function decodeDownload(body: Uint8Array): Uint8Array {
  return body;
}

/**
 * `auth/token/revoke` returns `null`; the body carries nothing.
 */
export function decodeRevoke(): void {
  return undefined;
}

/**
 * Pull `error_summary` out of a Dropbox error body, falling back to the
 * raw text when the body is not the usual JSON shape.
 */
export function describeApiErrorBody(text: string): string {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return text.trim();
  }
  const parsed = ApiErrorBodySchema.safeParse(json);
  return parsed.success ? parsed.data.error_summary : text.trim();
}
