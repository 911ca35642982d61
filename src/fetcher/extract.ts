/**
 * HTML reduction: visible text plus title, meta description and headings.
 */

import * as cheerio from 'cheerio';
import { collapseWhitespace } from '../normalizer/index.js';
import type { PageMetadata } from '../types/index.js';

export const DEFAULT_HEADINGS_LIMIT = 10;

/** Elements that never carry visible page content */
export const NON_CONTENT_SELECTOR = 'script, style, noscript, template, nav, footer';

export interface ExtractedPage extends PageMetadata {
  content: string;
}

function textOrNull(value: string | undefined): string | null {
  if (value === undefined) {
    return null;
  }
  const collapsed = collapseWhitespace(value);
  return collapsed.length > 0 ? collapsed : null;
}

/**
 * Parse markup and reduce it to visible text and structural metadata
 */
export function extractPage(html: string, headingsLimit: number = DEFAULT_HEADINGS_LIMIT): ExtractedPage {
  const $ = cheerio.load(html);

  const title = textOrNull($('title').first().text());
  const description =
    textOrNull($('meta[name="description" i]').attr('content')) ??
    textOrNull($('meta[property="og:description"]').attr('content'));

  $(NON_CONTENT_SELECTOR).remove();

  const headings: string[] = [];
  $('h1, h2, h3').each((_, element) => {
    if (headings.length >= headingsLimit) {
      return false;
    }
    const heading = textOrNull($(element).text());
    if (heading) {
      headings.push(heading);
    }
    return undefined;
  });

  // Pad every element so adjacent blocks do not run their words together
  const body = $('body');
  body.find('*').each((_, element) => {
    $(element).prepend(' ').append(' ');
  });

  return {
    content: collapseWhitespace(body.text()),
    title,
    description,
    headings,
  };
}
