/**
 * Zod Schemas for Author Source
 *
 * Frontmatter of item folders, module and rubric YAML files. Keys are
 * snake_case as authors write them.
 */

import { z } from 'zod';

import { ValidationError } from '../errors/errors';
import { RUBRIC_ROW_PLACEHOLDER } from '../registry/rubric-store';

/** js-yaml turns unquoted timestamps into Date objects */
const dateString = z
  .union([z.string(), z.date()])
  .transform(value => (value instanceof Date ? value.toISOString() : value));

export const contentKindEnum = z.enum(['page', 'assignment', 'quiz', 'link', 'file']);

export const moduleRefSchema = z.union([
  z.string().min(1),
  z.object({
    name: z.string().min(1),
    position: z.number().int().optional(),
    indent: z.number().int().min(0).optional(),
  }),
]);

export const baseFrontmatterSchema = z.object({
  name: z.string().min(1),
  type: contentKindEnum.optional(),
  identifier: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_.-]*$/, 'identifier must start with a letter and contain no spaces')
    .optional(),
  published: z.boolean().default(false),
  modules: z.array(moduleRefSchema).default([]),
  position: z.number().int().optional(),
  indent: z.number().int().min(0).max(5).default(0),
  /** Template folder name under templates/ */
  template: z.string().optional(),
  /** Values for {{var:name}} placeholders */
  variables: z.record(z.union([z.string(), z.number(), z.boolean()]).transform(String)).default({}),
});

export const pageFrontmatterSchema = baseFrontmatterSchema;

export const assignmentFrontmatterSchema = baseFrontmatterSchema.extend({
  points_possible: z.number().nonnegative().optional(),
  submission_types: z
    .union([z.string(), z.array(z.string())])
    .transform(value => (Array.isArray(value) ? value : [value]))
    .default(['online_upload']),
  due_at: dateString.optional(),
  unlock_at: dateString.optional(),
  lock_at: dateString.optional(),
  grading_type: z.string().default('points'),
  assignment_group: z.string().optional(),
});

export const questionGroupSchema = z.object({
  bank: z.string().min(1),
  pick: z.number().int().positive(),
  points_per_question: z.number().nonnegative().default(1),
});

export const quizFrontmatterSchema = baseFrontmatterSchema.extend({
  points_possible: z.number().nonnegative().optional(),
  time_limit: z.number().int().positive().optional(),
  allowed_attempts: z.number().int().optional(),
  shuffle_answers: z.boolean().default(false),
  quiz_type: z.enum(['assignment', 'practice_quiz', 'graded_survey', 'survey']).default('assignment'),
  due_at: dateString.optional(),
  points_per_question: z.number().nonnegative().default(1),
  question_groups: z.array(questionGroupSchema).default([]),
});

export const linkFrontmatterSchema = baseFrontmatterSchema.extend({
  external_url: z.string().url(),
  new_tab: z.boolean().default(true),
});

export const fileFrontmatterSchema = baseFrontmatterSchema.extend({
  file: z.string().min(1),
});

export const bankFrontmatterSchema = z.object({
  name: z.string().min(1).optional(),
  identifier: z.string().optional(),
  points_per_question: z.number().nonnegative().default(1),
});

export const moduleFileSchema = z.object({
  name: z.string().min(1).optional(),
  published: z.boolean().default(true),
});

export const moduleOrderSchema = z.object({
  modules: z.array(z.string().min(1)).default([]),
});

export const ratingSchema = z.object({
  description: z.string(),
  points: z.number(),
  long_description: z.string().optional(),
});

export const criterionSchema = z.object({
  description: z.string().min(1),
  long_description: z.string().optional(),
  points: z.number().optional(),
  ratings: z.array(ratingSchema).min(1),
});

export const rubricFileSchema = z.object({
  title: z.string().min(1),
  description: z.string().optional(),
  free_form_criterion_comments: z.boolean().default(false),
  criteria: z.array(z.union([criterionSchema, z.string().regex(RUBRIC_ROW_PLACEHOLDER)])).min(1),
});

export const rubricReferenceSchema = z.object({
  use_rubric: z.string().min(1),
});

export type PageFrontmatter = z.infer<typeof pageFrontmatterSchema>;
export type AssignmentFrontmatter = z.infer<typeof assignmentFrontmatterSchema>;
export type QuizFrontmatter = z.infer<typeof quizFrontmatterSchema>;
export type LinkFrontmatter = z.infer<typeof linkFrontmatterSchema>;
export type FileFrontmatter = z.infer<typeof fileFrontmatterSchema>;
export type RubricFile = z.infer<typeof rubricFileSchema>;
export type CriterionFile = z.infer<typeof criterionSchema>;

/**
 * Validate `value` against `schema`, turning zod issues into a ValidationError.
 */
export function parseWithSchema<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  sourcePath: string
): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ValidationError(`Invalid ${sourcePath}: ${issues.join('; ')}`, sourcePath, issues);
  }
  return result.data;
}
