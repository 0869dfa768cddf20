const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

function stripWww(host: string): string {
  return host.startsWith('www.') ? host.slice(4) : host;
}

/**
 * True when `url` is an http(s) URL on the same host as `companyUrl`.
 * A leading `www.` is ignored on both sides and the port is part of the host.
 * Never throws; unparseable input is treated as a mismatch.
 */
export function isSameDomain(url: string, companyUrl: string): boolean {
  try {
    const parsedUrl = new URL(url);
    const parsedCompany = new URL(companyUrl);

    if (!ALLOWED_PROTOCOLS.has(parsedUrl.protocol)) {
      return false;
    }

    // URL.host is already lower-cased and keeps a non-default port
    return stripWww(parsedUrl.host) === stripWww(parsedCompany.host);
  } catch {
    return false;
  }
}
