const PROBE_USER_AGENT = 'Mozilla/5.0 (compatible; CompanyProfileEnricher/1.0)';

// Public suffixes that take two labels, so the registrable part needs three.
const TWO_PART_TLDS = ['co.uk', 'com.au', 'co.nz', 'co.za', 'com.br'];

/**
 * Clean and normalize a URL/domain to a canonical form.
 * This ensures different URL formats are treated as the same:
 * - https://example.com/
 * - example.com
 * - www.example.com
 * - http://www.example.com/
 * All become: example.com
 *
 * @param input - URL or domain string to clean
 * @returns Cleaned string (lowercase, no protocol, no www, no trailing slash)
 */
export function cleanUrl(input: string): string {
  let cleaned = input.trim().toLowerCase();

  // Remove protocol (http://, https://, etc.)
  cleaned = cleaned.replace(/^[a-zA-Z][a-zA-Z\d+\-.]*:\/\//, '');

  if (cleaned.startsWith('www.')) {
    cleaned = cleaned.substring(4);
  }

  cleaned = cleaned.replace(/\/+$/, '');

  return cleaned;
}

/**
 * Extract just the domain from a URL/domain string (no path, query, or fragment).
 * This is the key used by the company directory for lookups.
 */
export function extractDomainFromInput(input: string): string {
  const cleaned = cleanUrl(input);

  const match = cleaned.match(/^([^\/\?#]+)/);
  return match ? match[1] : cleaned;
}

/**
 * Strip subdomains, keeping known two-part TLDs intact.
 *
 * www.example.com -> example.com
 * api.app.example.com -> example.com
 * shop.example.co.uk -> example.co.uk
 */
export function getRootDomain(domain: string): string {
  const host = domain
    .trim()
    .replace(/^https?:\/\//i, '')
    .split('/')[0]
    .toLowerCase();

  const parts = host.split('.');

  if (parts.length >= 3) {
    const potentialTld = parts.slice(-2).join('.');
    if (TWO_PART_TLDS.includes(potentialTld)) {
      return parts.slice(-3).join('.');
    }
  }

  return parts.length > 1 ? parts.slice(-2).join('.') : host;
}

/**
 * Derive a display name from a domain's first label.
 * "acme-labs.com" -> "Acme-Labs", "www.foo.io" -> "Foo"
 */
export function companyNameFromDomain(domain: string): string {
  const label = domain.trim().replace(/^www\./i, '').split('.')[0];
  if (!label) {
    return 'Unknown Company';
  }

  return label
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

/**
 * Check that a URL answers 200 to a HEAD request within the timeout.
 * Never throws: timeouts, connection errors and other statuses all report false.
 */
export async function probeUrl(url: string, timeoutMs: number): Promise<boolean> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      method: 'HEAD',
      signal: controller.signal,
      redirect: 'follow',
      headers: {
        'User-Agent': PROBE_USER_AGENT,
      },
    });

    return response.status === 200;
  } catch {
    return false;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * True when the string parses as an absolute http(s) URL with a host.
 */
export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (url.protocol === 'http:' || url.protocol === 'https:') && url.hostname.length > 0;
  } catch {
    return false;
  }
}
