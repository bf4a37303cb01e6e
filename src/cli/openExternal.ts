import { spawn } from 'child_process';
import { parseHttpUrl } from '../security/urlValidation.js';

const DROPBOX_AUTH_HOSTS = new Set([
  'www.dropbox.com',
  'dropbox.com',
]);

export type BrowserOpener = (url: string) => Promise<void>;

async function spawnDetached(command: string, args: string[]): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const child = spawn(command, args, {
      detached: true,
      stdio: 'ignore',
      windowsHide: true,
    });

    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}

/**
 * Refuse anything but an HTTPS Dropbox authorization page. The URL is
 * returned untouched: the redirect URI in its query is deliberately not
 * re-encoded.
 */
export function assertDropboxAuthUrl(rawUrl: string): string {
  const parsed = parseHttpUrl(rawUrl);
  if (parsed.protocol !== 'https:') {
    throw new Error('Invalid Dropbox authorization URL protocol.');
  }
  if (!DROPBOX_AUTH_HOSTS.has(parsed.hostname.toLowerCase())) {
    throw new Error('Unexpected Dropbox authorization host.');
  }
  return rawUrl;
}

/**
 * Open the Dropbox authorization page in the user's default browser.
 */
export const openAuthorizationUrl: BrowserOpener = async (rawUrl) => {
  const url = assertDropboxAuthUrl(rawUrl);

  if (process.platform === 'win32') {
    await spawnDetached('rundll32.exe', ['url.dll,FileProtocolHandler', url]);
    return;
  }

  if (process.platform === 'darwin') {
    await spawnDetached('open', [url]);
    return;
  }

  await spawnDetached('xdg-open', [url]);
};
