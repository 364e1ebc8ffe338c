/**
 * Include Suggestions Service
 *
 * Read-only report of paragraph blocks repeated verbatim across page and
 * assignment bodies. Each candidate could move to `includes/<slug>.md` and
 * be replaced with `{{include:<slug>}}`. Nothing is written.
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';

import { ValidationError } from '../errors/errors';
import { splitFrontmatter } from '../parsers/frontmatter-parser';
import { ContentAddressableStore } from '../registry/content-store';
import { SlugAllocator } from '../utils/id-generator';
import { Logger, createLogger } from '../utils/logger';

import { CONTENT_DIR, ITEM_FILE } from './course-loader.service';

/** A block is suggested when it meets either threshold */
export const INCLUDE_THRESHOLDS = [
  { minChars: 200, minFiles: 3 },
  { minChars: 400, minFiles: 2 },
] as const;

export interface IncludeCandidate {
  slug: string;
  text: string;
  chars: number;
  /** Course-relative paths of the files the block appears in, sorted */
  files: string[];
}

export interface IncludeSuggestionOptions {
  logger?: Logger;
}

interface BlockRecord {
  text: string;
  files: Set<string>;
}

/**
 * Split a markdown body into paragraph blocks, trailing spaces removed.
 * Single-line headings and short include placeholders are skipped.
 */
export function extractProseBlocks(body: string): string[] {
  return body
    .replace(/\r\n/g, '\n')
    .split(/\n\s*\n/)
    .map(block => block.trim())
    .filter(block => block !== '')
    .filter(block => !(/^#{1,6}\s/.test(block) && !block.includes('\n')))
    .filter(block => !(block.includes('{{include:') && block.length < 80))
    .map(block =>
      block
        .split('\n')
        .map(line => line.trimEnd())
        .join('\n')
    );
}

function qualifies(chars: number, files: number): boolean {
  return INCLUDE_THRESHOLDS.some(threshold => chars >= threshold.minChars && files >= threshold.minFiles);
}

/** Slug from the block's first line with markdown punctuation removed */
function slugSource(text: string): string {
  const [firstLine] = text.split('\n');
  return firstLine.replace(/[*_`#>[\]()]/g, '').trim().slice(0, 40) || 'shared block';
}

/**
 * Find paragraph blocks repeated across pages and assignments under
 * `courseRoot`, most widely repeated first.
 */
export async function suggestIncludes(
  courseRoot: string,
  options: IncludeSuggestionOptions = {}
): Promise<IncludeCandidate[]> {
  const logger = options.logger ?? createLogger('include-suggestions');
  const blocks = new ContentAddressableStore<string, BlockRecord>({
    prefix: 'block-',
    normalize: text => text,
    hashLength: 16,
  });

  const files = await glob(`${CONTENT_DIR}/**/*.{page,assignment}/${ITEM_FILE}`, {
    cwd: courseRoot,
    posix: true,
    nodir: true,
  });
  for (const file of files.sort()) {
    let body: string;
    try {
      body = splitFrontmatter(fs.readFileSync(path.join(courseRoot, file), 'utf-8'), file).body;
    } catch (err) {
      if (!(err instanceof ValidationError)) {
        throw err;
      }
      logger.warn(`Skipping ${file}: ${err.message}`);
      continue;
    }
    for (const text of extractProseBlocks(body)) {
      blocks.putIfAbsent(text, () => ({ text, files: new Set() })).record.files.add(file);
    }
  }

  const slugs = new SlugAllocator();
  const candidates = blocks
    .entries()
    .map(([, block]) => block)
    .filter(block => qualifies(block.text.length, block.files.size))
    .map(block => ({
      slug: slugs.allocate(slugSource(block.text)),
      text: block.text,
      chars: block.text.length,
      files: [...block.files].sort(),
    }))
    .sort((a, b) => b.files.length - a.files.length || b.chars - a.chars);

  logger.info(`Found ${candidates.length} include candidates`, { files: files.length });
  return candidates;
}
