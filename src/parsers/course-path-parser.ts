/**
 * Course Path Parser
 *
 * Derives item kind, module membership and ordering hints from the author
 * folder layout:
 *
 *   content/01-Week 1.module/02-intro.page/index.md
 *            ^^ module order   ^^ item order  ^^^^ kind
 */

import * as path from 'path';

import { ContentKind } from '../models/content.model';
import { splitNumericPrefix } from '../utils/text-formatters';

export const MODULE_SUFFIX = '.module';

export const ITEM_SUFFIXES: Record<string, ContentKind> = {
  '.page': 'page',
  '.assignment': 'assignment',
  '.quiz': 'quiz',
  '.link': 'link',
  '.file': 'file',
};

export interface ModuleFolderInfo {
  /** Module title from the folder name, prefix and suffix removed */
  title: string;
  orderPrefix?: number;
  /** Course-relative folder */
  relativeDir: string;
}

export interface ItemPathInfo {
  kind: ContentKind;
  /** Course-relative POSIX folder */
  relativeDir: string;
  /** Folder name without numeric prefix and kind suffix */
  baseName: string;
  orderPrefix?: number;
  /** Enclosing module folder, if any */
  module?: ModuleFolderInfo;
}

/**
 * Parse a `NN-Title.module` folder name.
 */
export function parseModuleFolderName(folderName: string): { title: string; orderPrefix?: number } | undefined {
  if (!folderName.endsWith(MODULE_SUFFIX)) {
    return undefined;
  }
  const { prefix, rest } = splitNumericPrefix(folderName.slice(0, -MODULE_SUFFIX.length));
  return { title: rest, orderPrefix: prefix };
}

/**
 * Parse a course-relative item folder such as `content/01-Week 1.module/02-intro.page`.
 * Returns undefined for folders without a kind suffix.
 */
export function parseItemPath(relativeDir: string): ItemPathInfo | undefined {
  const posixDir = relativeDir.split('\\').join('/');
  const segments = posixDir.split('/').filter(Boolean);
  const folderName = segments[segments.length - 1];
  if (!folderName) {
    return undefined;
  }

  const extension = path.posix.extname(folderName);
  const kind = ITEM_SUFFIXES[extension];
  if (!kind) {
    return undefined;
  }

  const { prefix, rest } = splitNumericPrefix(folderName.slice(0, -extension.length));
  const info: ItemPathInfo = { kind, relativeDir: posixDir, baseName: rest, orderPrefix: prefix };

  for (let i = segments.length - 2; i >= 0; i--) {
    const moduleInfo = parseModuleFolderName(segments[i]);
    if (moduleInfo) {
      info.module = { ...moduleInfo, relativeDir: segments.slice(0, i + 1).join('/') };
      break;
    }
  }
  return info;
}

export interface Orderable {
  name: string;
  position?: number;
  orderPrefix?: number;
}

/**
 * Item ordering: explicit position, else numeric prefix, else lexical.
 * Entries with neither number come after numbered ones.
 */
export function compareOrderable(a: Orderable, b: Orderable): number {
  const orderA = a.position ?? a.orderPrefix;
  const orderB = b.position ?? b.orderPrefix;
  if (orderA !== undefined && orderB !== undefined && orderA !== orderB) {
    return orderA - orderB;
  }
  if (orderA !== undefined && orderB === undefined) {
    return -1;
  }
  if (orderA === undefined && orderB !== undefined) {
    return 1;
  }
  return a.name.localeCompare(b.name);
}

/**
 * Module ordering: explicit list from module_order.yaml first (in list
 * order), then numeric prefix, then lexical.
 */
export function orderModuleTitles(
  modules: Array<{ title: string; orderPrefix?: number }>,
  explicitOrder: string[] = []
): string[] {
  const rank = new Map(explicitOrder.map((title, index) => [title, index]));
  return [...modules]
    .sort((a, b) => {
      const rankA = rank.get(a.title);
      const rankB = rank.get(b.title);
      if (rankA !== undefined || rankB !== undefined) {
        return (rankA ?? Number.MAX_SAFE_INTEGER) - (rankB ?? Number.MAX_SAFE_INTEGER);
      }
      return compareOrderable(
        { name: a.title, orderPrefix: a.orderPrefix },
        { name: b.title, orderPrefix: b.orderPrefix }
      );
    })
    .map(m => m.title);
}
