/**
 * HTML to Markdown (reverse direction of the Markup Normalizer)
 *
 * Platform HTML -> author markdown:
 * 1. take the content wrapper out of a full page
 * 2. strip template header/footer
 * 3. map platform file URLs back to local asset paths
 * 4. convert with turndown, then normalize lists and whitespace
 */

import { HTMLElement, parse } from 'node-html-parser';
import TurndownService from 'turndown';

import { escapeHtml } from '../utils/text-formatters';

import { normalizeListIndentFromConverter } from './list-indentation';
import { TemplateFragments, markdownToHtml } from './markdown-renderer';
import { DEFAULT_STRIP_STRATEGIES, TemplateStripStrategy, stripTemplate } from './template-strippers';

/** Maps a platform URL to a local asset path, or undefined when unknown */
export type AssetPathResolver = (url: string) => string | undefined;

export interface ReverseOptions {
  template?: TemplateFragments;
  resolveAssetPath?: AssetPathResolver;
  strategies?: readonly TemplateStripStrategy[];
}

export interface ReverseResult {
  markdown: string;
  /** Strip strategy that matched the header, `none` or `absent` */
  header: string;
  footer: string;
}

export interface MediaReference {
  tag: string;
  url: string;
  fileId?: string;
  alt?: string;
}

export const CONTENT_SELECTORS = [
  '.user_content',
  '.show-content',
  '#wiki_page_show',
  '.page-content',
  'article',
  '.content',
  'body',
];

const URL_ATTRIBUTES: Array<[string, string]> = [
  ['img', 'src'],
  ['video', 'src'],
  ['audio', 'src'],
  ['source', 'src'],
  ['iframe', 'src'],
  ['a', 'href'],
];

const FILE_ID = /\/files\/(\d+)/;
const FILEBASE_PREFIX = '$IMS-CC-FILEBASE$/';
// Keep <pre> parsed as elements so highlighted code can be read as text
const PARSE_OPTIONS = { blockTextElements: { script: true, noscript: true, style: true } };
const CODE_SENTINEL = /\[code(?:=([\w+#-]+))?\][ \t]*\n?([\s\S]*?)\n?[ \t]*\[\/code\]/g;

/** Platform file id embedded in a URL such as `/courses/1/files/101/preview` */
export function platformFileId(url: string): string | undefined {
  return FILE_ID.exec(url)?.[1];
}

/** Package-relative path from a `$IMS-CC-FILEBASE$/...` reference */
export function fileBasePath(url: string): string | undefined {
  if (!url.startsWith(FILEBASE_PREFIX)) {
    return undefined;
  }
  const rest = url.slice(FILEBASE_PREFIX.length).split(/[?#]/)[0];
  try {
    return decodeURIComponent(rest);
  } catch {
    return rest;
  }
}

function createTurndown(): TurndownService {
  const service = new TurndownService({
    headingStyle: 'atx',
    bulletListMarker: '-',
    codeBlockStyle: 'fenced',
    emDelimiter: '*',
    strongDelimiter: '**',
    hr: '---',
  });
  // Author markdown is written unescaped
  service.escape = (text: string): string => text;
  service.remove(['script', 'style']);
  return service;
}

const turndown = createTurndown();

/**
 * Inner HTML of the first content wrapper found, or the input unchanged.
 */
export function extractPlatformContent(html: string): string {
  const root = parse(html);
  for (const selector of CONTENT_SELECTORS) {
    const found = root.querySelector(selector);
    if (found) {
      return found.innerHTML.trim();
    }
  }
  return html.trim();
}

function unwrapHighlightedCode(root: HTMLElement): void {
  for (const block of root.querySelectorAll('div.codehilite, div.highlight')) {
    const pre = block.querySelector('pre');
    if (!pre) {
      continue;
    }
    const language = /\blanguage-(\S+)/.exec(block.getAttribute('class') ?? '')?.[1];
    const attr = language ? ` class="language-${language}"` : '';
    block.replaceWith(`<pre><code${attr}>${escapeHtml(pre.text)}</code></pre>`);
  }
}

function rewriteAssetUrls(root: HTMLElement, resolve: AssetPathResolver): void {
  for (const [tag, attribute] of URL_ATTRIBUTES) {
    for (const element of root.querySelectorAll(tag)) {
      const url = element.getAttribute(attribute);
      if (!url) {
        continue;
      }
      const local = resolve(url);
      if (local !== undefined) {
        element.setAttribute(attribute, local);
      }
    }
  }
}

/**
 * Turndown plus post-processing, without wrapper or template handling.
 */
export function htmlToMarkdown(html: string, resolveAssetPath?: AssetPathResolver): string {
  const root = parse(html, PARSE_OPTIONS);
  unwrapHighlightedCode(root);
  if (resolveAssetPath) {
    rewriteAssetUrls(root, resolveAssetPath);
  }

  const converted = turndown
    .turndown(root.toString())
    .replace(CODE_SENTINEL, (_whole, language: string | undefined, code: string) =>
      `\`\`\`${language ?? ''}\n${code.replace(/^\n+|\n+$/g, '')}\n\`\`\``
    );

  return normalizeListIndentFromConverter(converted)
    .split('\n')
    .map(line => line.replace(/[ \t]+$/, ''))
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Full reverse conversion of a platform page body.
 */
export function convertPlatformHtmlToMarkdown(html: string, options: ReverseOptions = {}): ReverseResult {
  const content = extractPlatformContent(html);
  const template = options.template ?? {};
  const rendered = (source?: string): string | undefined =>
    source && source.trim() ? markdownToHtml(source) : undefined;

  const stripped = stripTemplate(
    content,
    {
      header: [template.headerHtml, rendered(template.headerMarkdown)].filter(
        (part): part is string => part !== undefined
      ),
      footer: [template.footerHtml, rendered(template.footerMarkdown)].filter(
        (part): part is string => part !== undefined
      ),
    },
    options.strategies ?? DEFAULT_STRIP_STRATEGIES
  );

  return {
    markdown: htmlToMarkdown(stripped.html, options.resolveAssetPath),
    header: stripped.header,
    footer: stripped.footer,
  };
}

/**
 * Media and file references in a page, for asset bookkeeping on import.
 */
export function extractMediaReferences(html: string): MediaReference[] {
  const root = parse(html);
  const references: MediaReference[] = [];
  for (const [tag, attribute] of URL_ATTRIBUTES) {
    for (const element of root.querySelectorAll(tag)) {
      const url = element.getAttribute(attribute);
      if (!url) {
        continue;
      }
      const fileId = platformFileId(url);
      if (tag === 'a' && fileId === undefined && fileBasePath(url) === undefined) {
        continue;
      }
      references.push({ tag, url, fileId, alt: element.getAttribute('alt') });
    }
  }
  return references;
}
