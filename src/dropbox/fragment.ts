/**
 * Parsing of the `#key=value&key=value` fragment Dropbox appends to the
 * redirect URI after an implicit-grant authorization.
 */

export type FragmentMap = ReadonlyMap<string, string>;

/**
 * The parts of a browser location the binding reads. A WHATWG `URL`
 * satisfies it, as does `window.location`.
 */
export interface LocationLike {
  protocol: string;
  host: string;
  pathname: string;
  hash: string;
}

/**
 * Parse a fragment into a key/value map.
 *
 * Entries that do not contain exactly one `=` are dropped. When a key
 * repeats, the last value wins. Values are kept verbatim.
 */
export function parseFragment(fragment: string): FragmentMap {
  const body = fragment.startsWith('#') ? fragment.slice(1) : fragment;
  const entries = new Map<string, string>();

  if (body.length === 0) {
    return entries;
  }

  for (const candidate of body.split('&')) {
    const parts = candidate.split('=');
    if (parts.length !== 2) {
      continue;
    }
    const [key, value] = parts;
    entries.set(key, value);
  }

  return entries;
}

/**
 * Extract and parse the fragment of a full location.
 *
 * Returns `null` when the location has no fragment at all, so callers can
 * tell "nothing to parse" apart from an empty map.
 */
export function fragmentFromLocation(location: LocationLike | string): FragmentMap | null {
  if (typeof location === 'string') {
    const index = location.indexOf('#');
    if (index === -1) {
      return null;
    }
    return parseFragment(location.slice(index + 1));
  }

  if (!location.hash) {
    return null;
  }

  return parseFragment(location.hash);
}
