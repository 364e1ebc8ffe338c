/**
 * Namespace-aware XML lookups
 *
 * Package files come from many producers. Lookups try the expected
 * namespaces first and then fall back to matching the local name in any
 * (or no) namespace, so a cartridge with a different namespace version
 * still decodes.
 */

import { DOMParser } from '@xmldom/xmldom';

/** Namespace URIs by vocabulary, preferred first */
export const XML_NAMESPACES = {
  imscp: [
    'http://www.imsglobal.org/xsd/imsccv1p1/imscp_v1p1',
    'http://www.imsglobal.org/xsd/imsccv1p2/imscp_v1p1',
    'http://www.imsglobal.org/xsd/imsccv1p3/imscp_v1p1',
    'http://www.imsglobal.org/xsd/imscp_v1p1',
  ],
  qti: ['http://www.imsglobal.org/xsd/ims_qtiasiv1p2'],
  canvas: ['http://canvas.instructure.com/xsd/cccv1p0'],
  weblink: [
    'http://www.imsglobal.org/xsd/imsccv1p1/imswl_v1p1',
    'http://www.imsglobal.org/xsd/imsccv1p2/imswl_v1p2',
    'http://www.imsglobal.org/xsd/imsccv1p3/imswl_v1p3',
  ],
  lom: ['http://ltsc.ieee.org/xsd/imsccv1p1/LOM/manifest', 'http://ltsc.ieee.org/xsd/imsccv1p3/LOM/manifest'],
} as const;

export type Namespaces = readonly string[];

const ELEMENT_NODE = 1;

export function isElement(node: Node | null | undefined): node is Element {
  return !!node && node.nodeType === ELEMENT_NODE;
}

/**
 * Parse XML text. Parser errors are collected and thrown as one Error;
 * callers wrap it in the error class for their blast radius.
 */
export function parseXml(
  text: string,
  sourceName: string,
  onWarning?: (message: string) => void
): Document {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: (msg: unknown) => onWarning?.(`${sourceName}: ${String(msg)}`),
      error: (msg: unknown) => problems.push(String(msg)),
      fatalError: (msg: unknown) => problems.push(String(msg)),
    },
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(text, 'text/xml');
  } catch (err) {
    throw new Error(`${sourceName} is not well-formed XML: ${String(err)}`);
  }

  if (problems.length > 0) {
    throw new Error(`${sourceName} is not well-formed XML: ${problems[0]}`);
  }
  if (!doc || !isElement(doc.documentElement)) {
    throw new Error(`${sourceName} has no root element`);
  }
  return doc;
}

/**
 * All descendants named `localName`, preferring the given namespaces.
 */
export function findAll(root: Document | Element, localName: string, namespaces: Namespaces = []): Element[] {
  for (const ns of namespaces) {
    const matches = Array.from(root.getElementsByTagNameNS(ns, localName));
    if (matches.length > 0) {
      return matches;
    }
  }
  return Array.from(root.getElementsByTagName('*')).filter(el => el.localName === localName);
}

export function findFirst(
  root: Document | Element,
  localName: string,
  namespaces: Namespaces = []
): Element | undefined {
  return findAll(root, localName, namespaces)[0];
}

/**
 * Direct element children, optionally filtered by local name.
 */
export function childElements(parent: Element, localName?: string): Element[] {
  const result: Element[] = [];
  for (let node = parent.firstChild; node; node = node.nextSibling) {
    if (isElement(node) && (localName === undefined || node.localName === localName)) {
      result.push(node);
    }
  }
  return result;
}

export function firstChild(parent: Element, localName: string): Element | undefined {
  return childElements(parent, localName)[0];
}

export function textOf(element: Element | undefined): string {
  return (element?.textContent ?? '').trim();
}

/**
 * Trimmed text of the first direct child named `localName`, or undefined.
 */
export function childText(parent: Element, localName: string): string | undefined {
  const child = firstChild(parent, localName);
  return child ? textOf(child) : undefined;
}

/** Number from a child element's text, or undefined when absent or not numeric */
export function childNumber(parent: Element, localName: string): number | undefined {
  const text = childText(parent, localName);
  if (text === undefined || text === '') {
    return undefined;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

/** Boolean from a child element's text (`true`/`false`), or undefined */
export function childBoolean(parent: Element, localName: string): boolean | undefined {
  const text = childText(parent, localName)?.toLowerCase();
  if (text === 'true') return true;
  if (text === 'false') return false;
  return undefined;
}
