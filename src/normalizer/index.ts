/**
 * Normalizer Module
 *
 * Responsibilities:
 * - Canonicalize the inbound URL (trim, default the scheme to https)
 * - Collapse page text whitespace and drop empty fragments
 * - Truncate text to a bounded length for prompting, appending a fixed marker
 *
 * Usage:
 * const { normalizeContent } = await import('site-marketing-analyzer/normalizer');
 * const { text, fullLength } = normalizeContent(fetchResult.content, 4000);
 */

import { z } from 'zod';
import type { ModuleResult } from '../types/index.js';

/** Default truncation bound in characters */
export const DEFAULT_CONTENT_LIMIT = 4000;

/** Appended to truncated content */
export const TRUNCATION_MARKER = '... [content truncated]';

const SCHEME_PATTERN = /^https?:\/\//i;

/**
 * Outcome of content normalization
 */
export interface NormalizedContent {
  /** Text to send downstream, never longer than limit + marker */
  text: string;
  /** Length of the collapsed text before truncation */
  fullLength: number;
  truncated: boolean;
}

/**
 * Trim whitespace from string value, mapping blank strings to null
 */
function trimString(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Prefix https:// when the URL carries no http(s) scheme.
 * The rest of the URL is left exactly as given.
 */
function ensureScheme(url: string): string {
  return SCHEME_PATTERN.test(url) ? url : `https://${url}`;
}

const UrlInputSchema = z
  .string({ required_error: 'url is required', invalid_type_error: 'url must be a string' })
  .transform((value) => trimString(value))
  .refine((value): value is string => value !== null, { message: 'url must not be empty' })
  .transform((value) => ensureScheme(value))
  .refine(
    (value) => {
      try {
        const parsed = new URL(value);
        return parsed.hostname.length > 0;
      } catch {
        return false;
      }
    },
    { message: 'url must be a valid http(s) URL' }
  );

/**
 * Canonicalize a URL typed by a user
 *
 * @returns the URL with a scheme, or null when it is blank or unparseable
 */
export function canonicalizeUrl(raw: string | null | undefined): string | null {
  const parsed = UrlInputSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Validate and canonicalize the pipeline's inbound URL
 */
export function validateUrlInput(raw: unknown): ModuleResult<string> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  const parseResult = UrlInputSchema.safeParse(raw);

  if (!parseResult.success) {
    const errors = parseResult.error.errors.map((e) => e.message);
    return {
      success: false,
      error: {
        code: 'INVALID_URL',
        message: errors[0] ?? 'url is invalid',
        details: errors,
      },
      metadata: {
        module: 'normalizer',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  return {
    success: true,
    data: parseResult.data,
    metadata: {
      module: 'normalizer',
      timestamp,
      duration: Date.now() - startTime,
    },
  };
}

/**
 * Collapse every whitespace run to one space and drop empty fragments
 */
export function collapseWhitespace(text: string): string {
  return text
    .split(/\s+/)
    .filter((fragment) => fragment.length > 0)
    .join(' ');
}

/**
 * Whether text already has the exact shape of a truncated output for this limit
 */
function isTruncatedOutput(text: string, limit: number): boolean {
  const kept = text.length - TRUNCATION_MARKER.length;
  return (kept === limit || kept === limit - 1) && text.endsWith(TRUNCATION_MARKER);
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Cut point at or below limit that does not split a surrogate pair
 */
function truncationPoint(text: string, limit: number): number {
  return isHighSurrogate(text.charCodeAt(limit - 1)) ? limit - 1 : limit;
}

/**
 * Normalize content and report its pre-truncation length
 *
 * @param content - Raw visible text
 * @param limit - Maximum characters kept before the marker
 */
export function normalizeContent(content: string, limit: number = DEFAULT_CONTENT_LIMIT): NormalizedContent {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`limit must be a positive integer, got ${limit}`);
  }

  const collapsed = collapseWhitespace(content);

  if (collapsed.length <= limit) {
    return { text: collapsed, fullLength: collapsed.length, truncated: false };
  }

  // Re-normalizing an already truncated text must not truncate it again
  if (isTruncatedOutput(collapsed, limit)) {
    return { text: collapsed, fullLength: collapsed.length, truncated: true };
  }

  return {
    text: collapsed.slice(0, truncationPoint(collapsed, limit)) + TRUNCATION_MARKER,
    fullLength: collapsed.length,
    truncated: true,
  };
}

/**
 * Normalize content for prompting. Pure and idempotent for a fixed limit.
 */
export function normalize(content: string, limit: number = DEFAULT_CONTENT_LIMIT): string {
  return normalizeContent(content, limit).text;
}

export { trimString, ensureScheme };
