/**
 * imsmanifest.xml encoding and decoding
 */

import {
  ManifestItemRef,
  ManifestModule,
  ManifestResource,
  PackageManifest,
} from '../models/package.model';
import {
  XML_NAMESPACES,
  childElements,
  childText,
  findAll,
  findFirst,
  firstChild,
  parseXml,
  textOf,
} from '../parsers/xml-query';

import {
  CC_NAMESPACE,
  LOM_MANIFEST_NAMESPACE,
  LOM_RESOURCE_NAMESPACE,
  XML_DECLARATION,
  XSI_NAMESPACE,
} from './package-layout';
import { element, emptyElement, textElement } from './xml-writer';

const SCHEMA_LOCATION = [
  CC_NAMESPACE,
  'http://www.imsglobal.org/profile/cc/ccv1p1/ccv1p1_imscp_v1p2_v1p0.xsd',
  LOM_RESOURCE_NAMESPACE,
  'http://www.imsglobal.org/profile/cc/ccv1p1/LOM/ccv1p1_lomresource_v1p0.xsd',
  LOM_MANIFEST_NAMESPACE,
  'http://www.imsglobal.org/profile/cc/ccv1p1/LOM/ccv1p1_lommanifest_v1p0.xsd',
].join(' ');

/** Wrapper item the organization puts modules under */
export const MODULES_WRAPPER_ID = 'LearningModules';

function encodeModule(module: ManifestModule): string {
  return element('item', { identifier: module.identifier }, [
    textElement('title', module.title),
    ...module.items.map(item =>
      element('item', { identifier: item.identifier, identifierref: item.identifierRef }, [
        textElement('title', item.title),
      ])
    ),
  ]);
}

function encodeResource(resource: ManifestResource): string {
  return element('resource', { identifier: resource.identifier, type: resource.type, href: resource.href }, [
    ...resource.files.map(file => emptyElement('file', { href: file })),
    ...resource.dependencies.map(dep => emptyElement('dependency', { identifierref: dep })),
  ]);
}

export function encodeManifest(manifest: PackageManifest): string {
  const metadata = element('metadata', {}, [
    textElement('schema', 'IMS Common Cartridge'),
    textElement('schemaversion', '1.1.0'),
    element('lomimscc:lom', {}, [
      element('lomimscc:general', {}, [
        element('lomimscc:title', {}, [textElement('lomimscc:string', manifest.title)]),
      ]),
    ]),
  ]);

  const organizations = element('organizations', {}, [
    element('organization', { identifier: 'org_1', structure: 'rooted-hierarchy' }, [
      element('item', { identifier: MODULES_WRAPPER_ID }, manifest.modules.map(encodeModule)),
    ]),
  ]);

  const root = element(
    'manifest',
    {
      identifier: manifest.identifier,
      xmlns: CC_NAMESPACE,
      'xmlns:lom': LOM_RESOURCE_NAMESPACE,
      'xmlns:lomimscc': LOM_MANIFEST_NAMESPACE,
      'xmlns:xsi': XSI_NAMESPACE,
      'xsi:schemaLocation': SCHEMA_LOCATION,
    },
    [metadata, organizations, element('resources', {}, manifest.resources.map(encodeResource))]
  );

  return `${XML_DECLARATION}\n${root}\n`;
}

function decodeItems(moduleElement: Element): ManifestItemRef[] {
  // Nested sub-items are flattened into the module
  const refs: ManifestItemRef[] = [];
  const visit = (parent: Element): void => {
    for (const child of childElements(parent, 'item')) {
      const identifierRef = child.getAttribute('identifierref') || undefined;
      refs.push({
        identifier: child.getAttribute('identifier') ?? '',
        title: childText(child, 'title') ?? '',
        identifierRef,
      });
      visit(child);
    }
  };
  visit(moduleElement);
  return refs;
}

/**
 * Module items of an organization. A single untitled item without a
 * resource reference wraps the modules and is descended into.
 */
function decodeModules(doc: Document): ManifestModule[] {
  const organization = findFirst(doc, 'organization', XML_NAMESPACES.imscp);
  if (!organization) {
    return [];
  }
  let top = childElements(organization, 'item');
  while (
    top.length === 1 &&
    !top[0].getAttribute('identifierref') &&
    !(childText(top[0], 'title') ?? '')
  ) {
    top = childElements(top[0], 'item');
  }
  return top.map(item => ({
    identifier: item.getAttribute('identifier') ?? '',
    title: childText(item, 'title') ?? '',
    items: decodeItems(item),
  }));
}

function decodeResource(resource: Element): ManifestResource {
  return {
    identifier: resource.getAttribute('identifier') ?? '',
    type: resource.getAttribute('type') ?? '',
    href: resource.getAttribute('href') || undefined,
    files: childElements(resource, 'file')
      .map(file => file.getAttribute('href') ?? '')
      .filter(href => href !== ''),
    dependencies: childElements(resource, 'dependency')
      .map(dep => dep.getAttribute('identifierref') ?? '')
      .filter(ref => ref !== ''),
  };
}

function decodeTitle(doc: Document): string {
  const general = findFirst(doc, 'general');
  const title = general ? firstChild(general, 'title') : undefined;
  if (title) {
    const localized = firstChild(title, 'string');
    return textOf(localized ?? title);
  }
  return '';
}

/**
 * Parse manifest XML. Throws on malformed XML; callers decide the error class.
 */
export function decodeManifest(xml: string): PackageManifest {
  const doc = parseXml(xml, 'imsmanifest.xml');
  const resources = findAll(doc, 'resource', XML_NAMESPACES.imscp).map(decodeResource);
  return {
    identifier: doc.documentElement.getAttribute('identifier') ?? '',
    title: decodeTitle(doc),
    modules: decodeModules(doc),
    resources,
  };
}

/** Every archive path the manifest lists, hrefs included */
export function listedFiles(manifest: PackageManifest): Set<string> {
  const listed = new Set<string>();
  for (const resource of manifest.resources) {
    if (resource.href) {
      listed.add(resource.href);
    }
    resource.files.forEach(file => listed.add(file));
  }
  return listed;
}
