import chalk from 'chalk';
import ora from 'ora';
import {
  authorizationUrl,
  authorize,
  revokeToken,
  type AuthorizeRequest,
} from '../../dropbox/index.js';
import {
  startCallbackServer,
  DEFAULT_CALLBACK_TIMEOUT_MS,
  type CallbackServer,
} from '../callbackServer.js';
import { loadConfig, type CliConfig } from '../config.js';
import { openAuthorizationUrl, type BrowserOpener } from '../openExternal.js';
import { maskToken, promptAppKey } from '../appKeySetup.js';
import { cliTransport, reportFailure, resolveAuth, type TokenOptions } from '../output.js';

export interface AuthUrlOptions {
  clientId?: string;
  redirectUri?: string;
}

export interface LoginOptions {
  clientId?: string;
  redirectUri?: string;
  port?: string;
  open?: boolean;
  timeout?: string;
  maskToken?: boolean;
}

/**
 * Detect a callback that never arrived, most often a redirect URI that is
 * not registered for the app.
 */
function isLikelyRedirectMismatch(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const msg = error.message.toLowerCase();
  return msg.includes('timed out') || msg.includes('redirect_uri');
}

function defaultRedirectUri(port: number): string {
  return `http://127.0.0.1:${port}/callback`;
}

function parsePositiveInt(value: string | undefined, label: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${label} must be a non-negative integer.`);
  }
  return parsed;
}

/**
 * Pick the login redirect URI. `--redirect-uri` wins, then an explicit
 * `--port` on the default loopback URI, then `DBXKIT_REDIRECT_URI`, then
 * the default URI on the configured port.
 */
export function resolveLoginRedirectUri(
  options: { redirectUri?: string; port?: number },
  config: CliConfig,
): string {
  if (options.redirectUri) {
    return options.redirectUri;
  }
  if (options.port !== undefined) {
    return defaultRedirectUri(options.port);
  }
  return config.redirectUri ?? defaultRedirectUri(config.callbackPort);
}

/**
 * Open URL in default browser
 */
async function openBrowser(url: string, opener: BrowserOpener): Promise<void> {
  try {
    await opener(url);
  } catch {
    console.log(chalk.yellow(`\n  Please open this URL in your browser:`));
    console.log(chalk.cyan(`  ${url}\n`));
  }
}

export async function authUrlCommand(options: AuthUrlOptions = {}): Promise<void> {
  const config = loadConfig();
  const clientId = options.clientId ?? config.clientId;
  if (!clientId) {
    console.log(chalk.red('  No app key. Pass --client-id or set DBXKIT_CLIENT_ID.\n'));
    process.exitCode = 1;
    return;
  }

  const redirectUri = options.redirectUri ?? config.redirectUri ?? defaultRedirectUri(config.callbackPort);
  console.log(authorizationUrl({ clientId, redirectUri }));
}

export async function loginCommand(
  options: LoginOptions = {},
  opener: BrowserOpener = openAuthorizationUrl,
): Promise<void> {
  console.log(chalk.bold('\n  Dropbox Authorization\n'));

  let port: number | undefined;
  let timeoutSeconds: number | undefined;
  const config = loadConfig();
  try {
    port = parsePositiveInt(options.port, 'Port');
    timeoutSeconds = parsePositiveInt(options.timeout, 'Timeout');
  } catch (error) {
    if (error instanceof Error) {
      console.log(chalk.red(`  ${error.message}\n`));
    }
    process.exitCode = 1;
    return;
  }

  const redirectUri = resolveLoginRedirectUri({ redirectUri: options.redirectUri, port }, config);
  console.log(chalk.gray(`  Redirect URI: ${redirectUri}`));

  const clientId = options.clientId ?? config.clientId ?? await promptAppKey();

  const spinner = ora('Starting local callback server...').start();
  let server: CallbackServer;
  try {
    server = await startCallbackServer({
      redirectUri,
      timeoutMs: timeoutSeconds !== undefined ? timeoutSeconds * 1000 : DEFAULT_CALLBACK_TIMEOUT_MS,
    });
    spinner.succeed(`Listening on ${server.redirectUri}`);
  } catch (error) {
    spinner.fail('Could not start the callback server');
    if (error instanceof Error) {
      console.log(chalk.red(`  ${error.message}\n`));
    }
    process.exitCode = 1;
    return;
  }

  const request: AuthorizeRequest = { clientId, redirectUri: server.redirectUri };

  if (options.open === false) {
    console.log(chalk.yellow(`\n  Open this URL in your browser:`));
    console.log(chalk.cyan(`  ${authorizationUrl(request)}\n`));
  } else {
    console.log(chalk.gray('  Opening browser for Dropbox authorization...\n'));
    await authorize(request, (url) => openBrowser(url, opener));
  }

  const waiting = ora('Waiting for authorization...').start();
  try {
    const { auth, response } = await server.waitForAuthorization();
    waiting.succeed('Dropbox connected');

    console.log(chalk.green('\n  Authorization complete.'));
    console.log(chalk.gray(`  Account: ${response.accountId}`));
    console.log(chalk.gray(`  User id: ${response.uid}`));
    console.log(`  Access token: ${options.maskToken ? maskToken(auth.accessToken) : auth.accessToken}`);
    console.log(chalk.gray('\n  The token is not stored. Export it as DBXKIT_ACCESS_TOKEN to use it.\n'));
  } catch (error) {
    waiting.fail('Authorization failed');

    if (isLikelyRedirectMismatch(error)) {
      console.log(chalk.yellow('\n  The Dropbox redirect did not complete.'));
      console.log(chalk.gray(`  Check that ${server.redirectUri} is registered as a redirect URI for the app.`));
    }

    if (error instanceof Error) {
      console.log(chalk.red(`\n  ${error.message}\n`));
    }
    process.exitCode = 1;
  } finally {
    await server.close();
  }
}

export async function revokeCommand(options: TokenOptions = {}): Promise<void> {
  const auth = resolveAuth(options);
  if (!auth) {
    return;
  }

  const spinner = ora('Revoking access token...').start();
  const result = await revokeToken(auth, cliTransport(options));
  if (!result.ok) {
    reportFailure(spinner, 'Revoke failed', result.error);
    return;
  }

  spinner.succeed('Access token revoked');
}
