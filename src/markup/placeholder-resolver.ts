/**
 * Placeholder Resolver
 *
 * Expands `{{include:name}}`, `{{var:name}}` and `{{video:"file"}}`
 * placeholders and rewrites local asset references in markdown bodies.
 * Fenced code blocks are left untouched.
 */

import * as fs from 'fs';
import * as path from 'path';

import { isRemoteReference } from '../registry/asset-registry';
import { escapeHtml } from '../utils/text-formatters';

/** Looks up reusable markdown fragments by name */
export interface IncludeResolver {
  resolve(name: string): string | undefined;
}

/** Looks up variable values by name */
export interface VariableResolver {
  resolve(name: string): string | undefined;
}

export type AssetUsage = 'image' | 'link' | 'video' | 'source';

/**
 * Maps a local asset reference to the URL to emit, or undefined to leave
 * the reference as written.
 */
export type AssetRewriter = (reference: string, usage: AssetUsage) => Promise<string | undefined>;

export type VideoRenderer = (url: string, reference: string) => string;

export type WarningSink = (message: string, context?: Record<string, unknown>) => void;

export interface PlaceholderContext {
  includes?: IncludeResolver;
  variables?: VariableResolver;
  rewriteAsset?: AssetRewriter;
  renderVideo?: VideoRenderer;
  warn: WarningSink;
}

const INCLUDE_PLACEHOLDER = /\{\{\s*include:\s*([^}\s]+)\s*\}\}/g;
const VARIABLE_PLACEHOLDER = /\{\{\s*var:\s*([^}\s]+)\s*\}\}/g;
const VIDEO_PLACEHOLDER = /\{\{\s*video:\s*"?([^"}]+?)"?\s*\}\}/g;
const MARKDOWN_LINK = /(!?)\[([^\]]*)\]\(\s*<?([^()\s<>]+)>?((?:\s+"[^"]*")?)\s*\)/g;
const HTML_URL_ATTRIBUTE = /\b(src|href)(\s*=\s*)(["'])(.*?)\3/gi;
const FENCE_BLOCK = /(^|\n)(```|~~~)[^\n]*\n[\s\S]*?\n\2[^\n]*(?=\n|$)/g;

const MAX_INCLUDE_DEPTH = 5;

export function createMapResolver(values: Record<string, string>): IncludeResolver & VariableResolver {
  return { resolve: name => (Object.prototype.hasOwnProperty.call(values, name) ? values[name] : undefined) };
}

/**
 * Resolves `{{include:name}}` to `<dir>/<name>.md`.
 */
export function createFileIncludeResolver(dir: string): IncludeResolver {
  return {
    resolve: name => {
      const file = path.join(dir, `${name}.md`);
      return fs.existsSync(file) ? fs.readFileSync(file, 'utf-8').trim() : undefined;
    },
  };
}

/** Try each resolver in turn */
export function chainResolvers(...resolvers: Array<VariableResolver | undefined>): VariableResolver {
  return {
    resolve: name => {
      for (const resolver of resolvers) {
        const value = resolver?.resolve(name);
        if (value !== undefined) {
          return value;
        }
      }
      return undefined;
    },
  };
}

export const defaultVideoRenderer: VideoRenderer = url =>
  `<video controls src="${escapeHtml(url)}"></video>`;

/**
 * Split markdown into prose and fenced-code segments.
 */
export function splitFencedSegments(markdown: string): Array<{ code: boolean; text: string }> {
  const segments: Array<{ code: boolean; text: string }> = [];
  let last = 0;
  for (const match of markdown.matchAll(FENCE_BLOCK)) {
    const start = (match.index ?? 0) + match[1].length;
    segments.push({ code: false, text: markdown.slice(last, start) });
    segments.push({ code: true, text: markdown.slice(start, (match.index ?? 0) + match[0].length) });
    last = (match.index ?? 0) + match[0].length;
  }
  segments.push({ code: false, text: markdown.slice(last) });
  return segments.filter(s => s.text !== '');
}

async function replaceAsync(
  text: string,
  pattern: RegExp,
  replacer: (match: RegExpMatchArray) => Promise<string>
): Promise<string> {
  const matches = Array.from(text.matchAll(pattern));
  const replacements = await Promise.all(matches.map(replacer));
  let result = '';
  let last = 0;
  matches.forEach((match, i) => {
    const index = match.index ?? 0;
    result += text.slice(last, index) + replacements[i];
    last = index + match[0].length;
  });
  return result + text.slice(last);
}

/**
 * Expand include and variable placeholders. Unknown names are warned about
 * and left in place.
 */
export function expandTextPlaceholders(markdown: string, context: PlaceholderContext): string {
  const expandProse = (text: string, depth: number): string => {
    let expanded = text.replace(INCLUDE_PLACEHOLDER, (whole, name: string) => {
      if (depth >= MAX_INCLUDE_DEPTH) {
        context.warn(`Include nesting too deep at "${name}"`, { include: name });
        return whole;
      }
      const fragment = context.includes?.resolve(name);
      if (fragment === undefined) {
        context.warn(`Unknown include "${name}"`, { include: name });
        return whole;
      }
      return expandProse(fragment, depth + 1);
    });
    expanded = expanded.replace(VARIABLE_PLACEHOLDER, (whole, name: string) => {
      const value = context.variables?.resolve(name);
      if (value === undefined) {
        context.warn(`Unknown variable "${name}"`, { variable: name });
        return whole;
      }
      return value;
    });
    return expanded;
  };

  return splitFencedSegments(markdown)
    .map(segment => (segment.code ? segment.text : expandProse(segment.text, 0)))
    .join('');
}

/**
 * Rewrite local asset references (markdown links and images, HTML src/href,
 * video placeholders) through `context.rewriteAsset`.
 */
export async function rewriteAssetReferences(markdown: string, context: PlaceholderContext): Promise<string> {
  const rewrite = context.rewriteAsset;
  const renderVideo = context.renderVideo ?? defaultVideoRenderer;
  if (!rewrite) {
    return markdown;
  }

  const rewriteProse = async (text: string): Promise<string> => {
    let result = await replaceAsync(text, MARKDOWN_LINK, async match => {
      const [whole, bang, label, reference, title] = match;
      if (isRemoteReference(reference)) {
        return whole;
      }
      const url = await rewrite(reference, bang ? 'image' : 'link');
      return url === undefined ? whole : `${bang}[${label}](${url}${title})`;
    });

    result = await replaceAsync(result, HTML_URL_ATTRIBUTE, async match => {
      const [whole, attribute, equals, quote, reference] = match;
      if (isRemoteReference(reference)) {
        return whole;
      }
      const url = await rewrite(reference, attribute.toLowerCase() === 'src' ? 'source' : 'link');
      return url === undefined ? whole : `${attribute}${equals}${quote}${url}${quote}`;
    });

    // Last, so the markup it emits is not rewritten a second time
    return replaceAsync(result, VIDEO_PLACEHOLDER, async match => {
      const reference = match[1].trim();
      const url = isRemoteReference(reference) ? reference : await rewrite(reference, 'video');
      return url === undefined ? match[0] : renderVideo(url, reference);
    });
  };

  const parts = await Promise.all(
    splitFencedSegments(markdown).map(segment => (segment.code ? segment.text : rewriteProse(segment.text)))
  );
  return parts.join('');
}
