import { describe, expect, it } from 'vitest';
import { detectTechnologies, emptyContacts, extractContacts } from './contactExtractor';

const HOMEPAGE = `<html>
<body>
  <p>Email us at hello@acme.com or call (555) 123-4567.</p>
  <a href="https://www.linkedin.com/company/acme">LinkedIn</a>
  <a href="https://twitter.com/acme">Twitter</a>
  <a href="https://twitter.com/other">Other</a>
  <a href="https://github.com/acme">GitHub</a>
  <footer>Acme Inc, 1 Main St, Springfield, IL 62701</footer>
  <script src="/wp-content/themes/app.js"></script>
  <script src="https://js.stripe.com/v3"></script>
</body>
</html>`;

describe('extractContacts', () => {
  it('reads contacts from page text, links and footer', () => {
    expect(extractContacts(HOMEPAGE)).toEqual({
      email: 'hello@acme.com',
      phone: '(555) 123-4567',
      address: { full: 'Acme Inc, 1 Main St, Springfield, IL 62701', city: null, country: null },
      social_links: {
        linkedin: 'https://www.linkedin.com/company/acme',
        twitter: 'https://twitter.com/acme',
        github: 'https://github.com/acme',
        facebook: null,
      },
      technologies: ['WordPress', 'Stripe'],
    });
  });

  it('prefers mailto and tel links', () => {
    const html = `<body>
      <a href="mailto:Sales@Acme.com?subject=Hi">Mail</a>
      <a href="tel:+1-555-000-1111">Call</a>
      <p>other@acme.com</p>
    </body>`;

    const contacts = extractContacts(html);
    expect(contacts.email).toBe('Sales@Acme.com');
    expect(contacts.phone).toBe('+1-555-000-1111');
  });

  it('skips placeholder addresses', () => {
    expect(extractContacts('<p>Write to you@example.com or team@acme.io</p>').email).toBe('team@acme.io');
  });

  it('reads a schema.org postal address', () => {
    const html = `<div itemprop="address">
      <span itemprop="streetAddress">1 Main St</span>
      <span itemprop="addressLocality">Springfield</span>
      <span itemprop="addressCountry">US</span>
    </div>`;

    expect(extractContacts(html).address).toEqual({ full: '1 Main St', city: 'Springfield', country: 'US' });
  });

  it('returns empty contacts for an empty document', () => {
    expect(extractContacts('')).toEqual(emptyContacts());
  });
});

describe('detectTechnologies', () => {
  it('matches script signatures case-insensitively', () => {
    expect(detectTechnologies('<script src="https://CDN.SHOPIFY.com/s.js"></script>')).toEqual(['Shopify']);
    expect(detectTechnologies('<p>plain page</p>')).toEqual([]);
  });
});
