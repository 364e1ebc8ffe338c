/**
 * Rubric Parser
 *
 * Reads rubric YAML (inline `rubric.yaml` in an assignment folder, or
 * shared `rubrics/<name>.yaml`) and writes it back for import mode.
 */

import * as yaml from 'js-yaml';

import { ValidationError } from '../errors/errors';
import { Rubric, RubricCriterion } from '../models/content.model';
import { RUBRIC_ROW_PLACEHOLDER, rubricRowPlaceholder } from '../registry/rubric-store';

import { parseYamlMapping } from './frontmatter-parser';
import { CriterionFile, criterionSchema, parseWithSchema, rubricFileSchema, rubricReferenceSchema } from './source-schemas';

export type ParsedRubricFile = { kind: 'inline'; rubric: Rubric } | { kind: 'shared'; name: string };

/** Rows from `rubrics/rows/`, by file name */
export type RubricRows = ReadonlyMap<string, RubricCriterion>;

function toCriterion(c: CriterionFile): RubricCriterion {
  return {
    description: c.description,
    longDescription: c.long_description,
    points: c.points ?? Math.max(...c.ratings.map(r => r.points)),
    ratings: c.ratings.map(r => ({
      description: r.description,
      points: r.points,
      longDescription: r.long_description,
    })),
  };
}

function resolveRow(placeholder: string, rows: RubricRows, sourcePath: string): RubricCriterion {
  const name = RUBRIC_ROW_PLACEHOLDER.exec(placeholder)?.[1] ?? '';
  const row = rows.get(name);
  if (!row) {
    throw new ValidationError(`Unknown rubric row "${name}"`, sourcePath, [`no rubrics/rows/${name}.yaml`]);
  }
  return row;
}

/**
 * Parse rubric YAML into a Rubric. Criterion points default to the highest
 * rating. A criterion written as `{{rubric_row:<name>}}` is taken from `rows`.
 * @throws ValidationError on malformed YAML, missing fields or an unknown row
 */
export function parseRubricYaml(text: string, sourcePath: string, rows: RubricRows = new Map()): Rubric {
  const data = parseWithSchema(rubricFileSchema, parseYamlMapping(text, sourcePath), sourcePath);
  return {
    title: data.title,
    description: data.description,
    freeFormComments: data.free_form_criterion_comments,
    criteria: data.criteria.map(c => (typeof c === 'string' ? resolveRow(c, rows, sourcePath) : toCriterion(c))),
  };
}

/**
 * Parse one `rubrics/rows/<name>.yaml` file: a single criterion.
 */
export function parseRubricRowYaml(text: string, sourcePath: string): RubricCriterion {
  return toCriterion(parseWithSchema(criterionSchema, parseYamlMapping(text, sourcePath), sourcePath));
}

/**
 * Parse an assignment's `rubric.yaml`, which is either a full rubric or
 * `use_rubric: <shared name>`.
 */
export function parseAssignmentRubricFile(text: string, sourcePath: string, rows?: RubricRows): ParsedRubricFile {
  const mapping = parseYamlMapping(text, sourcePath);
  if ('use_rubric' in mapping) {
    return { kind: 'shared', name: parseWithSchema(rubricReferenceSchema, mapping, sourcePath).use_rubric };
  }
  return { kind: 'inline', rubric: parseRubricYaml(text, sourcePath, rows) };
}

function criterionDoc(c: RubricCriterion) {
  return {
    description: c.description,
    long_description: c.longDescription || undefined,
    points: c.points,
    ratings: c.ratings.map(r => ({
      description: r.description,
      points: r.points,
      long_description: r.longDescription || undefined,
    })),
  };
}

const dumpOptions: yaml.DumpOptions = { lineWidth: -1, noRefs: true, skipInvalid: true };

/**
 * Serialize a rubric as YAML in the author format. Criteria that `rowName`
 * names are written as row placeholders.
 */
export function serializeRubricYaml(
  rubric: Rubric,
  rowName: (criterion: RubricCriterion) => string | undefined = () => undefined
): string {
  const doc = {
    title: rubric.title,
    description: rubric.description,
    free_form_criterion_comments: rubric.freeFormComments || undefined,
    criteria: rubric.criteria.map(c => {
      const name = rowName(c);
      return name ? rubricRowPlaceholder(name) : criterionDoc(c);
    }),
  };
  return yaml.dump(doc, dumpOptions);
}

export function serializeRubricRowYaml(criterion: RubricCriterion): string {
  return yaml.dump(criterionDoc(criterion), dumpOptions);
}
