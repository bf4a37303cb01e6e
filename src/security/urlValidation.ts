const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '::1']);

/**
 * Check if a hostname points to local loopback.
 */
export function isLoopbackHost(hostname: string): boolean {
  const normalized = hostname.toLowerCase().replace(/^\[|\]$/g, '');
  if (LOOPBACK_HOSTS.has(normalized)) {
    return true;
  }

  return normalized.startsWith('127.');
}

/**
 * Parse a URL and ensure it uses http(s) without embedded credentials.
 */
export function parseHttpUrl(rawUrl: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(rawUrl);
  } catch {
    throw new Error('Invalid URL format.');
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error('Only http:// or https:// URLs are allowed.');
  }

  if (parsed.username || parsed.password) {
    throw new Error('URLs with embedded credentials are not allowed.');
  }

  return parsed;
}

/**
 * Validate the redirect URI the local callback server answers on.
 * Dropbox only accepts plain HTTP redirects for loopback hosts, and the
 * callback server only ever binds to one.
 */
export function assertLoopbackRedirectUri(rawUrl: string): URL {
  const parsed = parseHttpUrl(rawUrl);
  if (!isLoopbackHost(parsed.hostname)) {
    throw new Error('Redirect URI must point to localhost for the local callback server.');
  }
  if (parsed.search || parsed.hash) {
    throw new Error('Redirect URI must not contain a query string or fragment.');
  }
  return parsed;
}
