/**
 * Frontmatter Parser
 *
 * Splits author markdown into its YAML frontmatter and body, and writes
 * them back out for import mode.
 */

import * as yaml from 'js-yaml';

import { ValidationError, toError } from '../errors/errors';

export interface FrontmatterDocument {
  frontmatter: Record<string, unknown>;
  body: string;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Parse a YAML document that must be a mapping.
 * @throws ValidationError when the YAML is malformed or not a mapping
 */
export function parseYamlMapping(text: string, sourcePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = yaml.load(text);
  } catch (e) {
    const err = toError(e);
    throw new ValidationError(`Invalid YAML in ${sourcePath}: ${err.message}`, sourcePath, [err.message], err);
  }
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ValidationError(`Expected a YAML mapping in ${sourcePath}`, sourcePath);
  }
  return parsed;
}

/**
 * Extract YAML frontmatter from markdown. Text without a leading `---` line
 * has empty frontmatter; an unclosed block is an error.
 */
export function splitFrontmatter(text: string, sourcePath: string): FrontmatterDocument {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);
  if (lines[0]?.trim() !== '---') {
    return { frontmatter: {}, body: lines.join('\n') };
  }

  // Find closing ---
  let endIndex = -1;
  for (let i = 1; i < lines.length; i++) {
    if (lines[i].trim() === '---') {
      endIndex = i;
      break;
    }
  }

  if (endIndex === -1) {
    throw new ValidationError(`Unclosed frontmatter block in ${sourcePath}`, sourcePath);
  }

  return {
    frontmatter: parseYamlMapping(lines.slice(1, endIndex).join('\n'), sourcePath),
    body: lines
      .slice(endIndex + 1)
      .join('\n')
      .replace(/^\n+/, ''),
  };
}

/**
 * Serialize frontmatter and body back into a markdown document.
 * Undefined values are dropped.
 */
export function serializeFrontmatter(frontmatter: Record<string, unknown>, body: string): string {
  const defined = Object.fromEntries(Object.entries(frontmatter).filter(([, v]) => v !== undefined));
  const header = yaml.dump(defined, { lineWidth: -1, noRefs: true, sortKeys: false });
  const trimmedBody = body.replace(/\s+$/, '');
  return `---\n${header}---\n${trimmedBody ? `\n${trimmedBody}\n` : ''}`;
}
