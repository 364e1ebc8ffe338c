/**
 * Utility functions for generating and normalizing IDs
 */

import { createHash } from 'crypto';

/**
 * Normalizes an array of strings into a kebab-case ID
 * @param parts - Array of string parts to normalize
 * @returns A normalized kebab-case ID
 * @example
 * normalizeId(['Week', '1', 'Intro']) // returns 'week-1-intro'
 * normalizeId(['lab_report', 'DRAFT']) // returns 'lab-report-draft'
 */
export function normalizeId(parts: string[]): string {
  return parts
    .map(p => p.toLowerCase().replace(/[^a-z0-9]/g, '-'))
    .join('-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');
}

/**
 * File-system and URL safe slug for a title. Falls back to `untitled`.
 * @example
 * slugify('Week 1: Intro & Setup') // returns 'week-1-intro-setup'
 */
export function slugify(title: string, maxLength = 60): string {
  const slug = normalizeId([title]).slice(0, maxLength).replace(/-$/, '');
  return slug || 'untitled';
}

/**
 * Hands out slugs that are unique within one scope by appending -2, -3 ...
 */
export class SlugAllocator {
  private readonly used = new Set<string>();

  allocate(title: string): string {
    const base = slugify(title);
    let candidate = base;
    let counter = 2;
    while (this.used.has(candidate)) {
      candidate = `${base}-${counter}`;
      counter++;
    }
    this.used.add(candidate);
    return candidate;
  }
}

/** First `length` hex chars of the md5 digest of `input` */
export function shortHash(input: string | Buffer, length = 12): string {
  return createHash('md5').update(input).digest('hex').slice(0, length);
}

/**
 * Stable package identifier for an item, derived from its course-relative
 * folder path. Identifiers must be valid XML IDs so they start with a letter.
 * @example
 * deriveItemId('content/01-Week 1.module/intro.page') // returns 'i' + 12 hex chars
 */
export function deriveItemId(relativeFolder: string, prefix = 'i'): string {
  return `${prefix}${shortHash(relativeFolder.split('\\').join('/'))}`;
}

/** Valid XML NCName-ish identifier check used for author-supplied identifiers */
export function isValidIdentifier(value: string): boolean {
  return /^[A-Za-z_][A-Za-z0-9_.-]*$/.test(value);
}
