/**
 * String builders for package XML
 *
 * Documents are assembled from escaped fragments; elements with an
 * undefined value are omitted so optional settings simply do not appear.
 */

import { escapeXml } from '../utils/text-formatters';

export type XmlAttributes = Record<string, string | number | boolean | undefined>;

function renderAttributes(attributes: XmlAttributes): string {
  return Object.entries(attributes)
    .filter((entry): entry is [string, string | number | boolean] => entry[1] !== undefined)
    .map(([name, value]) => ` ${name}="${escapeXml(String(value))}"`)
    .join('');
}

/** Element wrapping already-rendered children */
export function element(name: string, attributes: XmlAttributes, children: Array<string | undefined>): string {
  const body = children.filter((child): child is string => child !== undefined && child !== '');
  if (body.length === 0) {
    return `<${name}${renderAttributes(attributes)}/>`;
  }
  return `<${name}${renderAttributes(attributes)}>${body.join('')}</${name}>`;
}

/** Element with escaped text content, or undefined when there is no value */
export function textElement(
  name: string,
  value: string | number | boolean | undefined,
  attributes: XmlAttributes = {}
): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  return `<${name}${renderAttributes(attributes)}>${escapeXml(String(value))}</${name}>`;
}

export function emptyElement(name: string, attributes: XmlAttributes = {}): string {
  return `<${name}${renderAttributes(attributes)}/>`;
}
