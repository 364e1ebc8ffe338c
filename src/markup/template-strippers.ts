/**
 * Template stripping strategies
 *
 * Platform HTML carries the course template's header and footer. Before
 * converting back to markdown they are removed by trying an ordered list of
 * strategies; the list ends with a strategy that always "matches" by
 * leaving the HTML as it is, so every outcome is reported by name.
 */

import { HTMLElement, Node as HtmlNode, NodeType, parse } from 'node-html-parser';

import { normalizeWhitespace } from '../utils/text-formatters';

export type TemplatePosition = 'header' | 'footer';

export interface TemplateStripStrategy {
  readonly name: string;
  /** Stripped HTML, or undefined when this strategy does not match */
  strip(html: string, template: string, position: TemplatePosition): string | undefined;
}

export interface StripOutcome {
  html: string;
  /** Strategy name per position, `absent` when there was no template */
  header: string;
  footer: string;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function normalizeText(text: string): string {
  return normalizeWhitespace(text).toLowerCase();
}

/**
 * Template markup found verbatim at the start (header) or end (footer),
 * tolerating whitespace between tags.
 */
export const exactHtmlStrategy: TemplateStripStrategy = {
  name: 'exact-html',
  strip(html, template, position) {
    const trimmed = template.trim();
    if (!trimmed) {
      return undefined;
    }
    const pattern = trimmed.split(/>\s*</).map(escapeRegExp).join('>\\s*<');
    const regex = position === 'header' ? new RegExp(`^\\s*${pattern}`) : new RegExp(`${pattern}\\s*$`);
    const match = regex.exec(html);
    if (!match) {
      return undefined;
    }
    return position === 'header'
      ? html.slice(match[0].length)
      : html.slice(0, match.index);
  },
};

/** Fraction of the template's text the removed elements must cover */
export const FUZZY_MIN_COVERAGE = 0.5;

function significantChildren(root: HTMLElement): HtmlNode[] {
  return root.childNodes.filter(node => node.nodeType === NodeType.ELEMENT_NODE || node.text.trim() !== '');
}

/**
 * Removes the run of top-level elements at the start (header) or end
 * (footer) whose normalized text is contained in the template's text.
 */
export const fuzzyTextStrategy: TemplateStripStrategy = {
  name: 'fuzzy-text',
  strip(html, template, position) {
    const templateText = normalizeText(parse(template).text);
    if (!templateText) {
      return undefined;
    }

    const root = parse(html);
    const nodes = significantChildren(root);
    const ordered = position === 'header' ? nodes : [...nodes].reverse();

    const region: HtmlNode[] = [];
    let covered = 0;
    for (const node of ordered) {
      const text = normalizeText(node.text);
      if (text === '') {
        region.push(node);
        continue;
      }
      if (!templateText.includes(text)) {
        break;
      }
      region.push(node);
      covered += text.length;
    }
    while (region.length > 0 && normalizeText(region[region.length - 1].text) === '') {
      region.pop();
    }

    if (covered === 0 || covered < templateText.length * FUZZY_MIN_COVERAGE) {
      return undefined;
    }
    for (const node of region) {
      node.remove();
    }
    return root.toString();
  },
};

/** Terminal strategy: nothing recognisable, keep the HTML unchanged */
export const noMatchStrategy: TemplateStripStrategy = {
  name: 'none',
  strip: html => html,
};

export const DEFAULT_STRIP_STRATEGIES: readonly TemplateStripStrategy[] = [
  exactHtmlStrategy,
  fuzzyTextStrategy,
  noMatchStrategy,
];

/**
 * Strip one template fragment, returning the HTML and the strategy that fired.
 */
export function stripFragment(
  html: string,
  template: string,
  position: TemplatePosition,
  strategies: readonly TemplateStripStrategy[] = DEFAULT_STRIP_STRATEGIES
): { html: string; strategy: string } {
  for (const strategy of strategies) {
    const stripped = strategy.strip(html, template, position);
    if (stripped !== undefined) {
      return { html: stripped, strategy: strategy.name };
    }
  }
  return { html, strategy: noMatchStrategy.name };
}

/**
 * Peel header candidates off the start and footer candidates off the end,
 * in the order given. Each position reports the first strategy that matched
 * something other than `none`, else `none`, or `absent` without candidates.
 */
export function stripTemplate(
  html: string,
  candidates: { header: string[]; footer: string[] },
  strategies: readonly TemplateStripStrategy[] = DEFAULT_STRIP_STRATEGIES
): StripOutcome {
  let current = html;
  const report = (position: TemplatePosition, fragments: string[]): string => {
    const usable = fragments.filter(f => f.trim() !== '');
    if (usable.length === 0) {
      return 'absent';
    }
    let outcome = noMatchStrategy.name;
    for (const fragment of usable) {
      const result = stripFragment(current, fragment, position, strategies);
      current = result.html;
      if (outcome === noMatchStrategy.name) {
        outcome = result.strategy;
      }
    }
    return outcome;
  };

  const header = report('header', candidates.header);
  const footer = report('footer', candidates.footer);
  return { html: current.trim(), header, footer };
}
