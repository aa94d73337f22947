import * as cheerio from 'cheerio';
import type { CompanyContacts } from './schemas';

// =============================================================================
// Constants
// =============================================================================

const EMAIL_REGEX = /\b[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}\b/g;
const PLACEHOLDER_EMAIL_FRAGMENTS = ['example.com', 'yoursite', 'domain.com', 'test', 'sample'];

const PHONE_PATTERNS = [
  /\+?\d{1,3}[-.\s]?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/, // +1-555-123-4567
  /\(\d{3}\)\s*\d{3}[-.\s]?\d{4}/, // (555) 123-4567
];

const US_POSTAL_CODE = /\b\d{5}(?:-\d{4})?\b/;
const FOOTER_ADDRESS_MAX_LENGTH = 200;

const TECH_SIGNATURES: Array<{ name: string; signatures: string[] }> = [
  { name: 'React', signatures: ['react.js', 'react.min.js', '_react', 'reactdom'] },
  { name: 'Vue', signatures: ['vue.js', 'vue.min.js', 'vuejs'] },
  { name: 'Angular', signatures: ['angular.js', 'angular.min.js', '@angular'] },
  { name: 'WordPress', signatures: ['wp-content', 'wp-includes', 'wordpress'] },
  { name: 'Shopify', signatures: ['shopify.com', 'cdn.shopify'] },
  { name: 'Wix', signatures: ['wix.com', 'parastorage'] },
  { name: 'Squarespace', signatures: ['squarespace.com', 'sqsp.net'] },
  { name: 'jQuery', signatures: ['jquery.js', 'jquery.min.js'] },
  { name: 'Bootstrap', signatures: ['bootstrap.css', 'bootstrap.min.css'] },
  { name: 'Tailwind', signatures: ['tailwindcss', 'tailwind.min.css'] },
  { name: 'Google Analytics', signatures: ['google-analytics.com', 'googletagmanager'] },
  { name: 'Stripe', signatures: ['stripe.com/v3', 'js.stripe.com'] },
  { name: 'Cloudflare', signatures: ['cloudflare.com', 'cf-ray'] },
];

export function emptyContacts(): CompanyContacts {
  return {
    email: null,
    phone: null,
    address: { full: null, city: null, country: null },
    social_links: { linkedin: null, twitter: null, github: null, facebook: null },
    technologies: [],
  };
}

// =============================================================================
// Field Extractors
// =============================================================================

function extractEmail($: cheerio.CheerioAPI, text: string): string | null {
  const mailto = $('a[href^="mailto:" i]').first().attr('href');
  if (mailto) {
    const email = mailto.replace(/^mailto:/i, '').split('?')[0].trim();
    if (email) return email;
  }

  const candidates = text.match(EMAIL_REGEX) ?? [];
  return (
    candidates.find(
      (email) => !PLACEHOLDER_EMAIL_FRAGMENTS.some((fragment) => email.toLowerCase().includes(fragment))
    ) ?? null
  );
}

function extractPhone($: cheerio.CheerioAPI, text: string): string | null {
  const tel = $('a[href^="tel:" i]').first().attr('href');
  if (tel) {
    const phone = tel.replace(/^tel:/i, '').trim();
    if (phone) return phone;
  }

  for (const pattern of PHONE_PATTERNS) {
    const match = text.match(pattern);
    if (match) return match[0].trim();
  }

  return null;
}

function extractSocialLinks($: cheerio.CheerioAPI): CompanyContacts['social_links'] {
  const links = emptyContacts().social_links;

  $('a[href]').each((_, element) => {
    const href = $(element).attr('href') || '';
    const lower = href.toLowerCase();

    if (lower.includes('linkedin.com/company')) {
      if (!links.linkedin) links.linkedin = href;
    } else if (lower.includes('twitter.com')) {
      if (!links.twitter) links.twitter = href;
    } else if (lower.includes('github.com')) {
      if (!links.github) links.github = href;
    } else if (lower.includes('facebook.com')) {
      if (!links.facebook) links.facebook = href;
    }
  });

  return links;
}

function extractAddress($: cheerio.CheerioAPI): CompanyContacts['address'] {
  const address = emptyContacts().address;
  const schemaAddress = $('[itemprop="address"]').first();

  if (schemaAddress.length > 0) {
    const read = (prop: string): string | null => {
      const value = schemaAddress.find(`[itemprop="${prop}"]`).first().text().trim();
      return value || null;
    };
    address.full = read('streetAddress');
    address.city = read('addressLocality');
    address.country = read('addressCountry');
    return address;
  }

  const footerText = $('footer').first().text().replace(/\s+/g, ' ').trim();
  if (footerText && US_POSTAL_CODE.test(footerText)) {
    address.full = footerText.substring(0, FOOTER_ADDRESS_MAX_LENGTH);
  }

  return address;
}

export function detectTechnologies(html: string): string[] {
  const lower = html.toLowerCase();
  return TECH_SIGNATURES.filter(({ signatures }) => signatures.some((signature) => lower.includes(signature))).map(
    ({ name }) => name
  );
}

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Pull contact details and detected technologies out of the raw document.
 * Reads the unstripped HTML since footers and headers hold most contact data.
 */
export function extractContacts(html: string): CompanyContacts {
  if (!html) return emptyContacts();

  try {
    const $ = cheerio.load(html);
    $('script, style, noscript').remove();
    const text = $('body').text().replace(/\s+/g, ' ').trim();

    return {
      email: extractEmail($, text),
      phone: extractPhone($, text),
      address: extractAddress($),
      social_links: extractSocialLinks($),
      technologies: detectTechnologies(html),
    };
  } catch (error) {
    console.warn(
      `[ContactExtractor] HTML parsing error: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
    return emptyContacts();
  }
}
