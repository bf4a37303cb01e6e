/**
 * Dropbox OAuth 2.0 implicit grant.
 *
 * Builds the authorization URL, and turns the redirect fragment Dropbox
 * sends back into a bearer credential.
 */

import { fragmentFromLocation, type FragmentMap, type LocationLike } from './fragment.js';
import { ok, err, type AuthError, type Result } from './result.js';

export const DROPBOX_AUTHORIZE_URL = 'https://www.dropbox.com/oauth2/authorize';

export interface AuthorizeRequest {
  readonly clientId: string;
  readonly redirectUri: string;
}

export interface AuthorizeResponse {
  readonly accessToken: string;
  readonly tokenType: string;
  readonly uid: string;
  readonly accountId: string;
}

/**
 * Validated bearer credential. Obtain one through `toUserAuth` or
 * `userAuthFromToken`; read it back only as a header value.
 */
export interface UserAuth {
  readonly scheme: 'Bearer';
  readonly accessToken: string;
}

export type AuthorizationRedirect =
  | { type: 'none' }
  | { type: 'authorized'; auth: UserAuth; response: AuthorizeResponse }
  | { type: 'error'; error: AuthError };

/**
 * Build the implicit-grant authorization URL.
 *
 * `clientId` and `redirectUri` are concatenated as given; pass them
 * pre-encoded if they contain reserved characters.
 */
export function authorizationUrl(request: AuthorizeRequest): string {
  return `${DROPBOX_AUTHORIZE_URL}?response_type=token`
    + `&client_id=${request.clientId}`
    + `&redirect_uri=${request.redirectUri}`;
}

/**
 * Send the user to Dropbox. `navigate` is the host's "go to URL" command:
 * `location.replace` in a browser, the system browser in a terminal.
 */
export function authorize<T>(request: AuthorizeRequest, navigate: (url: string) => T): T {
  return navigate(authorizationUrl(request));
}

/**
 * Redirect URI for the page the app is currently served from: origin and
 * path, without query or fragment.
 */
export function redirectUriFromLocation(location: LocationLike): string {
  return `${location.protocol}//${location.host}${location.pathname}`;
}

/**
 * Map a parsed fragment onto an authorization response. Returns `null`
 * when any of the four keys is missing, meaning the page was not loaded
 * as an OAuth redirect.
 */
export function parseAuthorizeResponse(fragment: FragmentMap): AuthorizeResponse | null {
  const accessToken = fragment.get('access_token');
  const tokenType = fragment.get('token_type');
  const uid = fragment.get('uid');
  const accountId = fragment.get('account_id');

  if (accessToken === undefined || tokenType === undefined || uid === undefined || accountId === undefined) {
    return null;
  }

  return { accessToken, tokenType, uid, accountId };
}

export function toUserAuth(response: AuthorizeResponse): Result<UserAuth, AuthError> {
  if (response.tokenType !== 'bearer') {
    return err({
      kind: 'unsupported-token-type',
      tokenType: response.tokenType,
      message: `Unknown token_type: ${response.tokenType}`,
    });
  }
  return ok(userAuthFromToken(response.accessToken));
}

export function userAuthFromToken(accessToken: string): UserAuth {
  return { scheme: 'Bearer', accessToken };
}

/**
 * Value of the `Authorization` header.
 */
export function authorizationHeader(auth: UserAuth): string {
  return `${auth.scheme} ${auth.accessToken}`;
}

/**
 * Full header line, e.g. `Authorization: Bearer <token>`.
 */
export function formatAuthorizationHeader(auth: UserAuth): string {
  return `Authorization: ${authorizationHeader(auth)}`;
}

export function parseAuthorizationRedirect(location: LocationLike | string): AuthorizationRedirect {
  const fragment = fragmentFromLocation(location);
  if (!fragment) {
    return { type: 'none' };
  }

  const response = parseAuthorizeResponse(fragment);
  if (!response) {
    return { type: 'none' };
  }

  const auth = toUserAuth(response);
  if (!auth.ok) {
    return { type: 'error', error: auth.error };
  }

  return { type: 'authorized', auth: auth.value, response };
}
