/**
 * CLI Command Tests
 *
 * Option parsing, output formatting and the command handlers. `fetch` is
 * stubbed for the API commands; login talks to its own loopback server.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { parseUploadOptions, uploadCommand } from '../src/cli/commands/upload.js';
import { downloadCommand } from '../src/cli/commands/download.js';
import {
  authUrlCommand,
  loginCommand,
  resolveLoginRedirectUri,
  revokeCommand,
} from '../src/cli/commands/auth.js';
import type { FetchLike } from '../src/dropbox/index.js';
import { formatRequest, formatUploadResponse } from '../src/cli/output.js';
import { maskToken, validateAppKey } from '../src/cli/appKeySetup.js';
import { decodeUploadResponse, uploadRequest, userAuthFromToken, WriteMode } from '../src/dropbox/index.js';
import { bytes, uploadMetadata } from './setup.js';

describe('parseUploadOptions', () => {
  const content = bytes('data');

  it('defaults to add without autorename or mute', () => {
    expect(parseUploadOptions('/a.txt', content, {})).toEqual({
      ok: true,
      upload: {
        path: '/a.txt',
        mode: { tag: 'add' },
        autorename: false,
        clientModified: undefined,
        mute: false,
        content,
      },
    });
  });

  it('builds an update mode from --rev', () => {
    const parsed = parseUploadOptions('/a.txt', content, { mode: 'update', rev: 'rev123' });
    expect(parsed.ok && parsed.upload.mode).toEqual(WriteMode.update('rev123'));
  });

  it('requires --rev for update', () => {
    expect(parseUploadOptions('/a.txt', content, { mode: 'update' })).toEqual({
      ok: false,
      message: 'rev: Mode "update" needs --rev <revision>',
    });
  });

  it('rejects an unknown mode', () => {
    const parsed = parseUploadOptions('/a.txt', content, { mode: 'replace' });
    expect(parsed.ok).toBe(false);
  });

  it('parses --client-modified', () => {
    const parsed = parseUploadOptions('/a.txt', content, { clientModified: '2017-01-02T03:04:05Z' });
    expect(parsed.ok && parsed.upload.clientModified?.toISOString()).toBe('2017-01-02T03:04:05.000Z');
  });

  it('rejects an unparseable timestamp', () => {
    expect(parseUploadOptions('/a.txt', content, { clientModified: 'yesterday' })).toEqual({
      ok: false,
      message: 'clientModified: Expected an ISO 8601 timestamp',
    });
  });
});

describe('formatRequest', () => {
  it('masks the bearer token', () => {
    const request = uploadRequest(userAuthFromToken('sl.test-placeholder-token'), {
      path: '/a.txt',
      mode: WriteMode.overwrite,
      autorename: false,
      mute: false,
      content: bytes('abc'),
    });

    expect(formatRequest(request)).toEqual([
      'POST https://content.dropboxapi.com/2/files/upload',
      'Authorization: Bearer sl.t...oken',
      'Content-Type: application/octet-stream',
      'Dropbox-API-Arg: {"path":"/a.txt","mode":{".tag":"overwrite"},"autorename":false,"mute":false}',
      '(3 byte body)',
    ]);
  });
});

describe('formatUploadResponse', () => {
  it('lists the metadata fields', () => {
    const decoded = decodeUploadResponse(JSON.stringify(uploadMetadata({
      path_display: '/Docs/notes.txt',
      content_hash: 'abc',
      media_info: { '.tag': 'pending' },
    })));
    if (!decoded.ok) {
      throw new Error('fixture should decode');
    }

    expect(formatUploadResponse(decoded.value)).toEqual([
      'Name:            notes.txt',
      'Path:            /Docs/notes.txt',
      'Id:              id:a4ayc_80_OEAAAAAAAAAXw',
      'Revision:        a1c10ce0dd78',
      'Size:            7212 bytes',
      'Client modified: 2017-01-02T03:04:05Z',
      'Server modified: 2017-01-02T03:04:06Z',
      'Content hash:    abc',
      'Media:           pending',
    ]);
  });
});

describe('appKeySetup', () => {
  it('validates app keys', () => {
    expect(validateAppKey('abc123')).toBe(true);
    expect(validateAppKey('  ')).toBe('App key is required.');
    expect(validateAppKey('abc-123')).toBe('App key should only contain letters and digits.');
  });

  it('masks tokens', () => {
    expect(maskToken('short')).toBe('*****');
    expect(maskToken('sl.test-placeholder-token')).toBe('sl.t...oken');
  });
});

describe('command handlers', () => {
  let logs: string[];

  function logged(): string {
    return logs.join('\n');
  }

  function stubFetch(body: string, status = 200) {
    const fetchMock = vi.fn<FetchLike>(async () => new Response(body, { status }));
    vi.stubGlobal('fetch', fetchMock);
    return fetchMock;
  }

  beforeEach(() => {
    logs = [];
    process.exitCode = undefined;
    vi.stubEnv('DBXKIT_CLIENT_ID', '');
    vi.stubEnv('DBXKIT_REDIRECT_URI', '');
    vi.stubEnv('DBXKIT_ACCESS_TOKEN', '');
    vi.stubEnv('DBXKIT_CALLBACK_PORT', '');
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logs.push(args.map(String).join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.exitCode = undefined;
    vi.unstubAllEnvs();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe('authUrlCommand', () => {
    it('prints the authorization URL', async () => {
      await authUrlCommand({ clientId: 'abc123', redirectUri: 'http://localhost/cb' });

      expect(logs).toEqual([
        'https://www.dropbox.com/oauth2/authorize?response_type=token&client_id=abc123&redirect_uri=http://localhost/cb',
      ]);
      expect(process.exitCode).toBeUndefined();
    });

    it('fails without a client id', async () => {
      await authUrlCommand({});

      expect(logged()).toContain('No app key. Pass --client-id or set DBXKIT_CLIENT_ID.');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('resolveLoginRedirectUri', () => {
    const config = { redirectUri: 'http://127.0.0.1:54999/callback', callbackPort: 53682 };

    it('prefers --redirect-uri', () => {
      expect(resolveLoginRedirectUri({ redirectUri: 'http://localhost:8080/cb', port: 55001 }, config))
        .toBe('http://localhost:8080/cb');
    });

    it('lets an explicit --port override the configured redirect URI', () => {
      expect(resolveLoginRedirectUri({ port: 55001 }, config)).toBe('http://127.0.0.1:55001/callback');
    });

    it('falls back to the configured redirect URI', () => {
      expect(resolveLoginRedirectUri({}, config)).toBe('http://127.0.0.1:54999/callback');
    });

    it('uses the configured port without a redirect URI', () => {
      expect(resolveLoginRedirectUri({}, { callbackPort: 53682 })).toBe('http://127.0.0.1:53682/callback');
    });
  });

  describe('loginCommand', () => {
    it('captures the token through the callback server on the --port URI', async () => {
      vi.stubEnv('DBXKIT_REDIRECT_URI', 'http://127.0.0.1:54999/callback');
      const opened: string[] = [];
      const opener = vi.fn(async (url: string) => {
        opened.push(url);
        const redirectUri = new URL(url).searchParams.get('redirect_uri');
        await fetch(`${redirectUri}/fragment`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ hash: '#access_token=test-token&token_type=bearer&uid=12345&account_id=dbid:test' }),
        });
      });

      await loginCommand({ clientId: 'abc123', port: '0', timeout: '5' }, opener);

      expect(opened).toHaveLength(1);
      expect(opened[0]).toMatch(
        /^https:\/\/www\.dropbox\.com\/oauth2\/authorize\?response_type=token&client_id=abc123&redirect_uri=http:\/\/127\.0\.0\.1:\d+\/callback$/,
      );
      expect(opened[0]).not.toContain(':54999/');
      expect(logs).toContain('  Access token: test-token');
      expect(process.exitCode).toBeUndefined();
    });

    it('masks the token with --mask-token', async () => {
      const opener = vi.fn(async (url: string) => {
        const redirectUri = new URL(url).searchParams.get('redirect_uri');
        await fetch(`${redirectUri}/fragment`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ hash: '#access_token=test-placeholder-token&token_type=bearer&uid=1&account_id=a1' }),
        });
      });

      await loginCommand({ clientId: 'abc123', port: '0', timeout: '5', maskToken: true }, opener);

      expect(logs).toContain('  Access token: test...oken');
    });

    it('times out with the redirect-mismatch hint', async () => {
      const opener = vi.fn(async () => undefined);

      await loginCommand({ clientId: 'abc123', port: '0', timeout: '0' }, opener);

      expect(opener).toHaveBeenCalledTimes(1);
      expect(logged()).toContain('The Dropbox redirect did not complete.');
      expect(logged()).toMatch(/Check that http:\/\/127\.0\.0\.1:\d+\/callback is registered as a redirect URI for the app\./);
      expect(logged()).toContain('Timed out waiting for the Dropbox redirect.');
      expect(process.exitCode).toBe(1);
    });

    it('rejects a port that is not a number', async () => {
      const opener = vi.fn(async () => undefined);

      await loginCommand({ clientId: 'abc123', port: 'eighty' }, opener);

      expect(logged()).toContain('Port must be a non-negative integer.');
      expect(opener).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(1);
    });
  });

  describe('revokeCommand', () => {
    it('exits with an error when no token is available', async () => {
      const fetchMock = stubFetch('null');

      await revokeCommand({});

      expect(logged()).toContain('No access token. Pass --token or set DBXKIT_ACCESS_TOKEN.');
      expect(fetchMock).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(1);
    });

    it('revokes the token from the environment', async () => {
      vi.stubEnv('DBXKIT_ACCESS_TOKEN', 'test-token');
      const fetchMock = stubFetch('null');

      await revokeCommand({});

      expect(fetchMock).toHaveBeenCalledWith(
        'https://api.dropboxapi.com/2/auth/token/revoke',
        expect.objectContaining({ method: 'POST', headers: { Authorization: 'Bearer test-token' } }),
      );
      expect(process.exitCode).toBeUndefined();
    });

    it('reports an HTTP error', async () => {
      stubFetch('{"error_summary":"invalid_access_token/.."}', 401);

      await revokeCommand({ token: 'test-token' });

      expect(logged()).toContain('Dropbox API error 401: invalid_access_token/..');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('downloadCommand', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dbxkit-test-'));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('writes the file, creating missing directories', async () => {
      const fetchMock = stubFetch('file contents');
      const output = path.join(tempDir, 'nested', 'dir', 'notes.txt');

      await downloadCommand('/notes.txt', { token: 'test-token', output });

      expect(await fs.readFile(output, 'utf8')).toBe('file contents');
      expect(fetchMock).toHaveBeenCalledWith(
        'https://content.dropboxapi.com/2/files/download',
        expect.objectContaining({
          headers: { Authorization: 'Bearer test-token', 'Dropbox-API-Arg': '{"path":"/notes.txt"}' },
        }),
      );
      expect(process.exitCode).toBeUndefined();
    });

    it('writes to stdout without --output', async () => {
      stubFetch('file contents');
      const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

      await downloadCommand('/notes.txt', { token: 'test-token' });

      expect(write).toHaveBeenCalledTimes(1);
      expect(write.mock.calls[0][0]).toEqual(bytes('file contents'));
    });

    it('reports a missing path', async () => {
      stubFetch('{"error_summary":"path/not_found/.."}', 409);
      const output = path.join(tempDir, 'missing.txt');

      await downloadCommand('/missing.txt', { token: 'test-token', output });

      expect(logged()).toContain('Dropbox API error 409: path/not_found/..');
      await expect(fs.access(output)).rejects.toThrow();
      expect(process.exitCode).toBe(1);
    });

    it('exits with an error when no token is available', async () => {
      const fetchMock = stubFetch('file contents');

      await downloadCommand('/notes.txt', {});

      expect(fetchMock).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(1);
    });
  });

  describe('uploadCommand', () => {
    let tempDir: string;
    let localFile: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dbxkit-test-'));
      localFile = path.join(tempDir, 'notes.txt');
      await fs.writeFile(localFile, 'hello');
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('uploads the file and prints the metadata', async () => {
      const fetchMock = stubFetch(JSON.stringify(uploadMetadata()));

      await uploadCommand(localFile, '/notes.txt', { token: 'test-token', mode: 'overwrite' });

      expect(fetchMock).toHaveBeenCalledWith(
        'https://content.dropboxapi.com/2/files/upload',
        expect.objectContaining({
          headers: {
            Authorization: 'Bearer test-token',
            'Content-Type': 'application/octet-stream',
            'Dropbox-API-Arg': '{"path":"/notes.txt","mode":{".tag":"overwrite"},"autorename":false,"mute":false}',
          },
        }),
      );
      expect(logged()).toContain('Name:            notes.txt');
      expect(logged()).toContain('Size:            7212 bytes');
      expect(process.exitCode).toBeUndefined();
    });

    it('stops before sending when update mode has no revision', async () => {
      const fetchMock = stubFetch('{}');

      await uploadCommand(localFile, '/notes.txt', { token: 'test-token', mode: 'update' });

      expect(logged()).toContain('rev: Mode "update" needs --rev <revision>');
      expect(fetchMock).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(1);
    });

    it('reports a local file that cannot be read', async () => {
      const fetchMock = stubFetch('{}');
      const missing = path.join(tempDir, 'absent.txt');

      await uploadCommand(missing, '/absent.txt', { token: 'test-token' });

      expect(logged()).toContain(`Could not read ${missing}`);
      expect(fetchMock).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(1);
    });
  });
});
