/** A `name=value` pair from a `Cookie` request header */
export interface RequestCookie {
  name: string;
  value: string;
}

/**
 * Splits a `Cookie` request header into its pairs, in order. Pairs without `=` are
 * skipped and a double-quoted value is unquoted.
 */
export function parseCookieHeader(header: string | null): RequestCookie[] {
  if (!header) {
    return [];
  }
  const cookies: RequestCookie[] = [];
  for (const part of header.split(';')) {
    const separator = part.indexOf('=');
    if (separator === -1) {
      continue;
    }
    const name = part.slice(0, separator).trim();
    let value = part.slice(separator + 1).trim();
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    if (name !== '') {
      cookies.push({ name, value });
    }
  }
  return cookies;
}

/** Serializes pairs back into a `Cookie` request header value. */
export function serializeCookieHeader(cookies: readonly RequestCookie[]): string {
  return cookies.map(({ name, value }) => `${name}=${value}`).join('; ');
}
