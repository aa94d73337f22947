/**
 * LogoResolver - multi-tier logo lookup that always yields a usable URL
 *
 * Tiers, first success wins:
 * 1. <link rel> icon variants in the archived HTML, then og:image
 * 2. Conventional favicon paths on the site (HEAD probe)
 * 3. Logo-by-domain service for the root domain (HEAD probe)
 * 4. Favicon-by-domain service URL, built without any network check
 */

import * as cheerio from 'cheerio';
import { getRootDomain, isHttpUrl, probeUrl } from '../utils';
import type { LogoResolution, UrlProbe } from './schemas';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_PROBE_TIMEOUT_MS = 3000;

const IMAGE_EXTENSIONS = ['.ico', '.png', '.jpg', '.jpeg', '.svg', '.gif', '.webp'];

// Highest resolution first
const ICON_LINK_SELECTORS = [
  'link[rel~="apple-touch-icon" i]',
  'link[rel~="icon" i][sizes="192x192"]',
  'link[rel~="icon" i][type="image/png" i]',
  'link[rel="shortcut icon" i]',
  'link[rel~="icon" i]',
];

const COMMON_FAVICON_PATHS = [
  '/favicon.ico',
  '/favicon.png',
  '/apple-touch-icon.png',
  '/assets/favicon.ico',
  '/static/favicon.ico',
];

const LOGO_SERVICE_BASE = 'https://logo.clearbit.com/';
const FAVICON_SERVICE_BASE = 'https://www.google.com/s2/favicons';
const FAVICON_SERVICE_SIZE = 128;

export interface LogoResolverOptions {
  probe?: UrlProbe;
  timeoutMs?: number;
  // false skips tiers 2 and 3 (no network access at all)
  networkProbes?: boolean;
}

// =============================================================================
// URL Helpers
// =============================================================================

function siteHost(domain: string): string {
  return domain
    .trim()
    .replace(/^https?:\/\//i, '')
    .split('/')[0];
}

/**
 * Resolve an href found in the document against https://<domain>/.
 * Returns null for anything that does not end up as an absolute http(s) URL.
 */
export function resolveHref(href: string, domain: string): string | null {
  const trimmed = href.trim();
  if (!trimmed) return null;

  let resolved: string;
  try {
    if (trimmed.startsWith('//')) {
      resolved = new URL(`https:${trimmed}`).href;
    } else {
      resolved = new URL(trimmed, `https://${siteHost(domain)}/`).href;
    }
  } catch {
    return null;
  }

  return isHttpUrl(resolved) ? resolved : null;
}

export function looksLikeImage(url: string): boolean {
  const lower = url.toLowerCase();
  return IMAGE_EXTENSIONS.some((extension) => lower.includes(extension));
}

export function buildFaviconServiceUrl(domain: string): string {
  const params = new URLSearchParams({
    sz: String(FAVICON_SERVICE_SIZE),
    domain: getRootDomain(domain),
  });
  return `${FAVICON_SERVICE_BASE}?${params.toString()}`;
}

// =============================================================================
// Tier 1: Document Scan
// =============================================================================

export function findLogoInDocument(html: string, domain: string): LogoResolution | null {
  if (!html) return null;

  let $: cheerio.CheerioAPI;
  try {
    $ = cheerio.load(html);
  } catch (error) {
    console.warn(
      `[LogoResolver] HTML parsing error for ${domain}: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
    return null;
  }

  // Only the first element per selector is considered, in priority order
  for (const selector of ICON_LINK_SELECTORS) {
    const href = $(selector).first().attr('href');
    if (!href) continue;

    const resolved = resolveHref(href, domain);
    if (resolved && looksLikeImage(resolved)) {
      return { url: resolved, tier: 'html_link' };
    }
  }

  const ogImage = $('meta[property="og:image"]').first().attr('content');
  if (ogImage) {
    const resolved = resolveHref(ogImage, domain);
    if (resolved) {
      return { url: resolved, tier: 'og_image' };
    }
  }

  return null;
}

// =============================================================================
// Tiers 2 & 3: Network Probes
// =============================================================================

async function tryCommonPaths(domain: string, probe: UrlProbe, timeoutMs: number): Promise<string | null> {
  const host = siteHost(domain);
  if (!host) return null;

  for (const path of COMMON_FAVICON_PATHS) {
    const url = `https://${host}${path}`;
    if (await probe(url, timeoutMs)) {
      return url;
    }
  }

  return null;
}

async function tryLogoService(domain: string, probe: UrlProbe, timeoutMs: number): Promise<string | null> {
  const rootDomain = getRootDomain(domain);
  if (!rootDomain) return null;

  const url = `${LOGO_SERVICE_BASE}${rootDomain}`;
  return (await probe(url, timeoutMs)) ? url : null;
}

async function safeProbe(probe: UrlProbe, url: string, timeoutMs: number): Promise<boolean> {
  try {
    return await probe(url, timeoutMs);
  } catch {
    // A probe that rejects counts as a failed tier
    return false;
  }
}

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Resolve a logo URL for a domain. Never throws and never returns an empty URL.
 */
export async function resolveLogo(
  domain: string,
  html: string,
  options: LogoResolverOptions = {}
): Promise<LogoResolution> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  const rawProbe = options.probe ?? probeUrl;
  const probe: UrlProbe = (url, ms) => safeProbe(rawProbe, url, ms);

  const fromDocument = findLogoInDocument(html, domain);
  if (fromDocument) {
    return fromDocument;
  }

  if (options.networkProbes !== false) {
    const commonPath = await tryCommonPaths(domain, probe, timeoutMs);
    if (commonPath) {
      return { url: commonPath, tier: 'common_path' };
    }

    const serviceLogo = await tryLogoService(domain, probe, timeoutMs);
    if (serviceLogo) {
      return { url: serviceLogo, tier: 'logo_service' };
    }
  }

  return { url: buildFaviconServiceUrl(domain), tier: 'favicon_service' };
}
