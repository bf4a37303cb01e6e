/**
 * Request builders for the Dropbox endpoints the binding wraps.
 *
 * Every builder is pure: it returns a descriptor, and an `HttpTransport`
 * executes it.
 */

import { authorizationHeader, type UserAuth } from './authorize.js';

export const DROPBOX_API_URL = 'https://api.dropboxapi.com/2';
export const DROPBOX_CONTENT_URL = 'https://content.dropboxapi.com/2';

export interface HttpRequest {
  method: 'POST';
  url: string;
  headers: Record<string, string>;
  body: Uint8Array | null;
}

export type WriteMode =
  | { tag: 'add' }
  | { tag: 'overwrite' }
  | { tag: 'update'; rev: string };

export const WriteMode: {
  readonly add: WriteMode;
  readonly overwrite: WriteMode;
  update(rev: string): WriteMode;
} = {
  add: { tag: 'add' },
  overwrite: { tag: 'overwrite' },
  update: (rev) => ({ tag: 'update', rev }),
};

export interface DownloadArg {
  path: string;
}

export interface UploadRequest {
  path: string;
  mode: WriteMode;
  autorename: boolean;
  clientModified?: Date;
  mute: boolean;
  content: Uint8Array;
}

type EncodedWriteMode =
  | { '.tag': 'add' }
  | { '.tag': 'overwrite' }
  | { '.tag': 'update'; update: string };

export function encodeWriteMode(mode: WriteMode): EncodedWriteMode {
  switch (mode.tag) {
    case 'add':
      return { '.tag': 'add' };
    case 'overwrite':
      return { '.tag': 'overwrite' };
    case 'update':
      return { '.tag': 'update', update: mode.rev };
  }
}

/**
 * Dropbox timestamp format: ISO 8601 in UTC, whole seconds.
 */
export function formatDropboxTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Compact JSON for the `Dropbox-API-Arg` header. HTTP header values must
 * be ASCII, so anything above U+007E is written as a `\uXXXX` escape.
 */
export function encodeApiArg(arg: object): string {
  return JSON.stringify(arg).replace(
    /[\u007f-\uffff]/g,
    (char) => '\\u' + char.charCodeAt(0).toString(16).padStart(4, '0'),
  );
}

export function encodeUploadArg(upload: UploadRequest): string {
  return encodeApiArg({
    path: upload.path,
    mode: encodeWriteMode(upload.mode),
    autorename: upload.autorename,
    ...(upload.clientModified
      ? { client_modified: formatDropboxTimestamp(upload.clientModified) }
      : {}),
    mute: upload.mute,
  });
}

export function revokeRequest(auth: UserAuth): HttpRequest {
  return {
    method: 'POST',
    url: `${DROPBOX_API_URL}/auth/token/revoke`,
    headers: {
      'Authorization': authorizationHeader(auth),
    },
    body: null,
  };
}

export function downloadRequest(auth: UserAuth, arg: DownloadArg): HttpRequest {
  return {
    method: 'POST',
    url: `${DROPBOX_CONTENT_URL}/files/download`,
    headers: {
      'Authorization': authorizationHeader(auth),
      'Dropbox-API-Arg': encodeApiArg({ path: arg.path }),
    },
    body: null,
  };
}

export function uploadRequest(auth: UserAuth, upload: UploadRequest): HttpRequest {
  return {
    method: 'POST',
    url: `${DROPBOX_CONTENT_URL}/files/upload`,
    headers: {
      'Authorization': authorizationHeader(auth),
      'Content-Type': 'application/octet-stream',
      'Dropbox-API-Arg': encodeUploadArg(upload),
    },
    body: upload.content,
  };
}
