/**
 * Endpoint calls: request builder, transport, decoder.
 */

import type { UserAuth } from './authorize.js';
import {
  downloadRequest,
  revokeRequest,
  uploadRequest,
  type DownloadArg,
  type UploadRequest,
} from './requests.js';
import { decodeDownload, decodeRevoke, decodeUploadResponse } from './responses.js';
import { ok, type DropboxError, type Result } from './result.js';
import type { UploadResponse } from './schema.js';
import { fetchTransport, type HttpTransport } from './transport.js';

/**
 * Revoke the access token. Any successful response counts; its body is
 * ignored.
 */
export async function revokeToken(
  auth: UserAuth,
  transport: HttpTransport = fetchTransport(),
): Promise<Result<void, DropboxError>> {
  const response = await transport(revokeRequest(auth));
  if (!response.ok) {
    return response;
  }
  return ok(decodeRevoke());
}

export async function downloadFile(
  auth: UserAuth,
  arg: DownloadArg,
  transport: HttpTransport = fetchTransport(),
): Promise<Result<Uint8Array, DropboxError>> {
  const response = await transport(downloadRequest(auth, arg));
  if (!response.ok) {
    return response;
  }
  return ok(decodeDownload(response.value.body));
}

export async function uploadFile(
  auth: UserAuth,
  upload: UploadRequest,
  transport: HttpTransport = fetchTransport(),
): Promise<Result<UploadResponse, DropboxError>> {
  const response = await transport(uploadRequest(auth, upload));
  if (!response.ok) {
    return response;
  }
  return decodeUploadResponse(response.value.body);
}

export interface DropboxClient {
  revokeToken(): Promise<Result<void, DropboxError>>;
  downloadFile(arg: DownloadArg): Promise<Result<Uint8Array, DropboxError>>;
  uploadFile(upload: UploadRequest): Promise<Result<UploadResponse, DropboxError>>;
}

export interface DropboxClientOptions {
  auth: UserAuth;
  transport?: HttpTransport;
}

export function createDropboxClient(options: DropboxClientOptions): DropboxClient {
  const transport = options.transport ?? fetchTransport();
  return {
    revokeToken: () => revokeToken(options.auth, transport),
    downloadFile: (arg) => downloadFile(options.auth, arg, transport),
    uploadFile: (upload) => uploadFile(options.auth, upload, transport),
  };
}
