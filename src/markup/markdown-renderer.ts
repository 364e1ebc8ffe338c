/**
 * Markdown Renderer (forward direction of the Markup Normalizer)
 *
 * Author markdown -> platform HTML:
 * 1. expand include/variable placeholders
 * 2. rewrite local asset references and video placeholders
 * 3. normalize list indentation to the 4-space convention
 * 4. one markdown pass over header + body + footer markdown together,
 *    so a tag opened in the header can wrap the body
 * 5. wrap with the raw header/footer HTML
 */

import * as fs from 'fs';
import * as path from 'path';

import { Marked } from 'marked';

import { createLogger } from '../utils/logger';

import { normalizeListIndentForRender } from './list-indentation';
import {
  AssetRewriter,
  IncludeResolver,
  VariableResolver,
  VideoRenderer,
  WarningSink,
  expandTextPlaceholders,
  rewriteAssetReferences,
} from './placeholder-resolver';

/**
 * Template pieces from `templates/<name>/`
 */
export interface TemplateFragments {
  headerMarkdown?: string;
  footerMarkdown?: string;
  headerHtml?: string;
  footerHtml?: string;
}

export interface RenderOptions {
  template?: TemplateFragments;
  includes?: IncludeResolver;
  variables?: VariableResolver;
  rewriteAsset?: AssetRewriter;
  renderVideo?: VideoRenderer;
  warn?: WarningSink;
}

const TEMPLATE_FILES: Array<[keyof TemplateFragments, string]> = [
  ['headerMarkdown', 'header.md'],
  ['footerMarkdown', 'footer.md'],
  ['headerHtml', 'header.html'],
  ['footerHtml', 'footer.html'],
];

const markdown = new Marked({ gfm: true, breaks: false });

const logger = createLogger('markdown-renderer');

/**
 * Plain markdown -> HTML, no placeholders or templates.
 */
export function markdownToHtml(source: string): string {
  const html = markdown.parse(source, { async: false });
  if (typeof html !== 'string') {
    throw new Error('markdown parser returned a promise for a synchronous parse');
  }
  return html.trim();
}

/**
 * Read whichever of header.md, footer.md, header.html, footer.html exist in
 * `templateDir`. A missing folder yields no fragments.
 */
export function loadTemplateFragments(templateDir: string): TemplateFragments {
  const fragments: TemplateFragments = {};
  if (!fs.existsSync(templateDir)) {
    return fragments;
  }
  for (const [key, file] of TEMPLATE_FILES) {
    const filePath = path.join(templateDir, file);
    if (fs.existsSync(filePath)) {
      const content = fs.readFileSync(filePath, 'utf-8').trim();
      if (content) {
        fragments[key] = content;
      }
    }
  }
  return fragments;
}

/**
 * Render an item body for the platform.
 */
export async function renderMarkdownForPlatform(body: string, options: RenderOptions = {}): Promise<string> {
  const template = options.template ?? {};
  const context = {
    includes: options.includes,
    variables: options.variables,
    rewriteAsset: options.rewriteAsset,
    renderVideo: options.renderVideo,
    warn: options.warn ?? ((message: string, ctx?: Record<string, unknown>) => logger.warn(message, ctx)),
  };

  const combined = [template.headerMarkdown, body, template.footerMarkdown]
    .filter((part): part is string => !!part && part.trim() !== '')
    .join('\n\n');

  const expanded = expandTextPlaceholders(combined, context);
  const rewritten = await rewriteAssetReferences(expanded, context);
  const html = markdownToHtml(normalizeListIndentForRender(rewritten));

  return [template.headerHtml, html, template.footerHtml].filter((part): part is string => !!part).join('\n');
}
