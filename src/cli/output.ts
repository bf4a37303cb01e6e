import chalk from 'chalk';
import type { Ora } from 'ora';
import {
  describeError,
  fetchTransport,
  userAuthFromToken,
  type DropboxError,
  type HttpRequest,
  type HttpTransport,
  type UploadResponse,
  type UserAuth,
} from '../dropbox/index.js';
import { maskToken } from './appKeySetup.js';
import { loadConfig } from './config.js';

export interface TokenOptions {
  token?: string;
  verbose?: boolean;
}

/**
 * Resolve the bearer credential from `--token` or `DBXKIT_ACCESS_TOKEN`.
 * Prints the reason and returns null when neither is set.
 */
export function resolveAuth(options: TokenOptions): UserAuth | null {
  const token = options.token?.trim() || loadConfig().accessToken;
  if (!token) {
    console.log(chalk.red('  No access token. Pass --token or set DBXKIT_ACCESS_TOKEN.'));
    console.log(chalk.gray('  Run "dbxkit login" to obtain one.\n'));
    process.exitCode = 1;
    return null;
  }
  return userAuthFromToken(token);
}

export function formatRequest(request: HttpRequest): string[] {
  const lines = [`${request.method} ${request.url}`];
  for (const [name, value] of Object.entries(request.headers)) {
    const shown = name === 'Authorization'
      ? value.replace(/^(\S+) (.+)$/, (_match, scheme: string, token: string) => `${scheme} ${maskToken(token)}`)
      : value;
    lines.push(`${name}: ${shown}`);
  }
  if (request.body) {
    lines.push(`(${request.body.byteLength} byte body)`);
  }
  return lines;
}

/**
 * Transport for the CLI commands; with `verbose` it echoes each request,
 * token masked, to stderr.
 */
export function cliTransport(options: TokenOptions): HttpTransport {
  const transport = fetchTransport();
  if (!options.verbose) {
    return transport;
  }
  return (request) => {
    for (const line of formatRequest(request)) {
      console.error(chalk.gray(`  > ${line}`));
    }
    return transport(request);
  };
}

export function reportFailure(spinner: Ora, title: string, error: DropboxError): void {
  spinner.fail(title);
  console.log(chalk.red(`  ${describeError(error)}\n`));
  process.exitCode = 1;
}

export function formatUploadResponse(metadata: UploadResponse): string[] {
  const lines = [
    `Name:            ${metadata.name}`,
    `Path:            ${metadata.pathDisplay ?? '(not returned)'}`,
    `Id:              ${metadata.id}`,
    `Revision:        ${metadata.rev}`,
    `Size:            ${metadata.size.toString()} bytes`,
    `Client modified: ${metadata.clientModified}`,
    `Server modified: ${metadata.serverModified}`,
  ];
  if (metadata.contentHash) {
    lines.push(`Content hash:    ${metadata.contentHash}`);
  }
  if (metadata.sharingInfo) {
    lines.push(`Shared folder:   ${metadata.sharingInfo.parentSharedFolderId}${metadata.sharingInfo.readOnly ? ' (read-only)' : ''}`);
  }
  if (metadata.mediaInfo) {
    lines.push(`Media:           ${metadata.mediaInfo.tag === 'pending' ? 'pending' : metadata.mediaInfo.metadata.tag}`);
  }
  return lines;
}
