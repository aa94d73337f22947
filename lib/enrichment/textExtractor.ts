import * as cheerio from 'cheerio';
import { readFile } from 'fs/promises';
import { hasChildren, isText, type AnyNode } from 'domhandler';
import type { ExtractedText } from './schemas';

// =============================================================================
// Constants
// =============================================================================

export const MAX_TEXT_LENGTH = 3000;

// Elements that never carry business prose
const JUNK_TAGS = ['script', 'style', 'nav', 'footer', 'header', 'aside', 'iframe', 'noscript'];

// Matched as substrings of the lowercased class attribute
const NOISE_CLASS_FRAGMENTS = ['cookie', 'banner', 'popup', 'modal', 'navigation', 'menu', 'sidebar'];

const TITLE_HOME_PREFIX = /^home\s+[-|–]\s+/i;

// Site-name separators, applied in order; the title is cut at the first hit of each
const TITLE_SEPARATORS = [' | Home', ' - Home', ' | ', ' - ', ' – ', ' — '];

const EMPTY_EXTRACTION: ExtractedText = { text: '', title: '' };

// =============================================================================
// Document Reading
// =============================================================================

export type ReadDocumentResult =
  | { ok: true; html: string }
  | { ok: false; reason: 'missing_index' | 'unreadable_file'; detail: string };

/**
 * Read one archived HTML document. Decoding is lenient (invalid UTF-8 is replaced).
 */
export async function readDocument(htmlPath: string): Promise<ReadDocumentResult> {
  try {
    const html = await readFile(htmlPath, 'utf-8');
    return { ok: true, html };
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : null;
    const detail = error instanceof Error ? error.message : 'Unknown error';
    return { ok: false, reason: code === 'ENOENT' ? 'missing_index' : 'unreadable_file', detail };
  }
}

// =============================================================================
// Title
// =============================================================================

export function cleanTitle(rawTitle: string): string {
  let title = rawTitle.replace(/\s+/g, ' ').trim().replace(TITLE_HOME_PREFIX, '');

  for (const separator of TITLE_SEPARATORS) {
    const index = title.indexOf(separator);
    if (index !== -1) {
      title = title.substring(0, index);
    }
  }

  return title.trim();
}

function extractTitle($: cheerio.CheerioAPI): string {
  const title = cleanTitle($('title').first().text());
  if (title) {
    return title;
  }

  return $('h1').first().text().replace(/\s+/g, ' ').trim();
}

// =============================================================================
// Text
// =============================================================================

function collectText(nodes: AnyNode[], parts: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      const value = node.data.trim();
      if (value) parts.push(value);
    } else if (hasChildren(node)) {
      collectText(node.children, parts);
    }
  }
}

/**
 * Cut to maxLength UTF-16 units without leaving half of a surrogate pair at the end.
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;

  const cut = text.substring(0, maxLength);
  const last = cut.charCodeAt(cut.length - 1);
  return last >= 0xd800 && last <= 0xdbff ? cut.substring(0, cut.length - 1) : cut;
}

function removeNoise($: cheerio.CheerioAPI): void {
  $(JUNK_TAGS.join(',')).remove();

  $('[class]').each((_, element) => {
    const className = ($(element).attr('class') || '').toLowerCase();
    if (NOISE_CLASS_FRAGMENTS.some((fragment) => className.includes(fragment))) {
      $(element).remove();
    }
  });
}

/**
 * Turn one HTML document into whitespace-normalized prose and a title.
 *
 * Fails soft: anything that goes wrong while parsing yields { text: '', title: '' },
 * which callers treat as insufficient input.
 */
export function extractText(html: string): ExtractedText {
  try {
    const $ = cheerio.load(html);

    // Title first: the first <h1> often sits inside a <header> that gets stripped below.
    const title = extractTitle($);

    removeNoise($);

    const body = $('body');
    const roots = body.length > 0 ? body.toArray() : $.root().toArray();

    const parts: string[] = [];
    collectText(roots, parts);

    const text = truncateText(parts.join(' ').replace(/\s+/g, ' ').trim(), MAX_TEXT_LENGTH);

    return { text, title };
  } catch (error) {
    console.warn(
      `[TextExtractor] HTML parsing error: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
    return { ...EMPTY_EXTRACTION };
  }
}
