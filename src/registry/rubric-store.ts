/**
 * Rubric Store
 *
 * Content-addressed rubrics: structurally identical rubrics share one key,
 * so the exporter writes each distinct rubric once and the importer can tell
 * which assignments share one.
 */

import { Course, Rubric, RubricCriterion } from '../models/content.model';
import { SlugAllocator } from '../utils/id-generator';
import { normalizeWhitespace } from '../utils/text-formatters';

import { ContentAddressableStore } from './content-store';

export const RUBRIC_KEY_PREFIX = 'rubric-';
export const RUBRIC_ROW_KEY_PREFIX = 'rubric-row-';
export const RUBRIC_ROWS_DIR = 'rubrics/rows';

/** Stands in for a criterion whose body lives in `rubrics/rows/<name>.yaml` */
export const RUBRIC_ROW_PLACEHOLDER = /^\{\{rubric_row:([A-Za-z0-9_-]+)\}\}$/;

export function rubricRowPlaceholder(name: string): string {
  return `{{rubric_row:${name}}}`;
}

export interface StoredRubric {
  key: string;
  /** Unique slug, used as the shared rubric file name */
  name: string;
  rubric: Rubric;
  /** Ids of items that use this rubric */
  usedBy: string[];
}

/**
 * Canonical JSON for hashing. Whitespace differences and key order do not
 * change the key; wording, points and rating order do.
 */
export function normalizeRubric(rubric: Rubric): string {
  return JSON.stringify({
    title: normalizeWhitespace(rubric.title),
    description: normalizeWhitespace(rubric.description ?? ''),
    freeFormComments: rubric.freeFormComments,
    criteria: rubric.criteria.map(canonicalCriterion),
  });
}

function canonicalCriterion(c: RubricCriterion) {
  return {
    description: normalizeWhitespace(c.description),
    longDescription: normalizeWhitespace(c.longDescription ?? ''),
    points: c.points,
    ratings: c.ratings.map(r => ({
      description: normalizeWhitespace(r.description),
      longDescription: normalizeWhitespace(r.longDescription ?? ''),
      points: r.points,
    })),
  };
}

export function normalizeCriterion(criterion: RubricCriterion): string {
  return JSON.stringify(canonicalCriterion(criterion));
}

/** Sum of each criterion's points */
export function rubricPointsPossible(rubric: Rubric): number {
  return rubric.criteria.reduce((sum, c) => sum + c.points, 0);
}

export class RubricStore {
  private readonly store = new ContentAddressableStore<Rubric, StoredRubric>({
    prefix: RUBRIC_KEY_PREFIX,
    normalize: normalizeRubric,
  });
  private readonly names = new SlugAllocator();

  /**
   * Add a rubric used by `itemId`. Returns the stored entry, shared with any
   * structurally identical rubric added earlier.
   */
  add(rubric: Rubric, itemId?: string, preferredName?: string): StoredRubric {
    const { record } = this.store.putIfAbsent(rubric, key => ({
      key,
      name: this.names.allocate(preferredName ?? rubric.title),
      rubric,
      usedBy: [],
    }));
    if (itemId && !record.usedBy.includes(itemId)) {
      record.usedBy.push(itemId);
    }
    return record;
  }

  get(key: string): StoredRubric | undefined {
    return this.store.get(key);
  }

  keyFor(rubric: Rubric): string {
    return this.store.keyFor(rubric);
  }

  all(): StoredRubric[] {
    return this.store.entries().map(([, stored]) => stored);
  }

  /** Rubrics used by more than one item */
  shared(): StoredRubric[] {
    return this.all().filter(stored => stored.usedBy.length > 1);
  }
}

/**
 * Turn inline rubrics used by two or more assignments into named shared
 * rubrics. Returns the number of shared rubrics created.
 */
export function promoteSharedRubrics(course: Course): number {
  const store = new RubricStore();
  for (const item of course.items) {
    if (item.kind === 'assignment' && item.rubric?.kind === 'inline') {
      store.add(item.rubric.rubric, item.id);
    }
  }
  const shared = store.shared();
  for (const entry of shared) {
    course.rubrics[entry.name] = entry.rubric;
    for (const item of course.items) {
      if (item.kind === 'assignment' && entry.usedBy.includes(item.id)) {
        item.rubric = { kind: 'shared', name: entry.name };
      }
    }
  }
  return shared.length;
}

export interface StoredRubricRow {
  key: string;
  /** Unique slug, used as the row file name under `rubrics/rows/` */
  name: string;
  criterion: RubricCriterion;
  /** Rubrics (shared names or assignment ids) that contain this row */
  usedBy: string[];
}

/**
 * Criterion-level counterpart of RubricStore. Rows repeated across rubric
 * files are written once and referenced by placeholder.
 */
export class RubricRowStore {
  private readonly store = new ContentAddressableStore<RubricCriterion, StoredRubricRow>({
    prefix: RUBRIC_ROW_KEY_PREFIX,
    normalize: normalizeCriterion,
  });
  private readonly names = new SlugAllocator();

  add(criterion: RubricCriterion, owner: string): StoredRubricRow {
    const { record } = this.store.putIfAbsent(criterion, key => ({
      key,
      name: this.names.allocate(criterion.description.slice(0, 40)),
      criterion,
      usedBy: [],
    }));
    if (!record.usedBy.includes(owner)) {
      record.usedBy.push(owner);
    }
    return record;
  }

  /** The row stored for `criterion`, when it is shared by two or more rubrics */
  sharedRowFor(criterion: RubricCriterion): StoredRubricRow | undefined {
    const row = this.store.get(this.store.keyFor(criterion));
    return row && row.usedBy.length > 1 ? row : undefined;
  }

  /** Rows used by more than one rubric, in the order first seen */
  shared(): StoredRubricRow[] {
    return this.store
      .entries()
      .map(([, row]) => row)
      .filter(row => row.usedBy.length > 1);
  }
}

/**
 * Collect the rows of every rubric the course writes: shared rubrics under
 * their name and inline rubrics under the assignment id.
 */
export function collectRubricRows(course: Course): RubricRowStore {
  const rows = new RubricRowStore();
  for (const [name, rubric] of Object.entries(course.rubrics)) {
    rubric.criteria.forEach(criterion => rows.add(criterion, `rubrics/${name}`));
  }
  for (const item of course.items) {
    if (item.kind === 'assignment' && item.rubric?.kind === 'inline') {
      const owner = item.id;
      item.rubric.rubric.criteria.forEach(criterion => rows.add(criterion, owner));
    }
  }
  return rows;
}
