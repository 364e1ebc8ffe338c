/**
 * Utility functions for text formatting and escaping
 */

import { decode } from 'html-entities';

/**
 * Escape text for XML element content and attribute values
 * @example
 * escapeXml('a < b & "c"') // returns 'a &lt; b &amp; &quot;c&quot;'
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Escape text for HTML content. Same rules as XML minus the apostrophe.
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Drop tags and decode entities, collapsing whitespace
 * @example
 * stripHtmlTags('<p>Fish &amp; <b>chips</b></p>') // returns 'Fish & chips'
 */
export function stripHtmlTags(html: string): string {
  return normalizeWhitespace(decode(html.replace(/<br\s*\/?>/gi, ' ').replace(/<[^>]*>/g, ' ')));
}

/** Collapse runs of whitespace into single spaces and trim */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Make a title safe for use as a file or folder name while keeping it readable
 * @example
 * sanitizeFilename('Week 1: Intro/Setup?') // returns 'week-1-introsetup'
 */
export function sanitizeFilename(name: string, maxLength = 50): string {
  const cleaned = name
    .replace(/[<>:"/\\|?*\x00-\x1f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, maxLength)
    .replace(/-+$/, '');
  return cleaned || 'untitled';
}

/**
 * Split a leading numeric prefix such as `02-` off a file or folder name
 * @example
 * splitNumericPrefix('02-Intro') // returns { prefix: 2, rest: 'Intro' }
 * splitNumericPrefix('Intro') // returns { prefix: undefined, rest: 'Intro' }
 */
export function splitNumericPrefix(name: string): { prefix: number | undefined; rest: string } {
  const match = /^(\d+)[-_ .]+(.*)$/.exec(name);
  if (!match) {
    return { prefix: undefined, rest: name };
  }
  return { prefix: Number(match[1]), rest: match[2] };
}

/** Zero-padded two digit position prefix used when writing author folders */
export function positionPrefix(position: number): string {
  return String(position).padStart(2, '0');
}
