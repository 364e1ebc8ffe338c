/**
 * Canonical Course Model
 *
 * The single in-memory representation every conversion goes through:
 * author source, rendered platform HTML and the package format are all
 * produced from (or decoded into) these types. Pure data, no I/O.
 */

/** Item kinds, one per author folder suffix */
export type ContentKind = 'page' | 'assignment' | 'quiz' | 'link' | 'file';

export const CONTENT_KINDS: readonly ContentKind[] = ['page', 'assignment', 'quiz', 'link', 'file'];

/**
 * Placement of an item inside a module
 */
export interface ModuleMembership {
  /** Module title */
  module: string;

  /** Explicit position (frontmatter `position`) */
  position?: number;

  /** Visual indent level inside the module */
  indent: number;
}

/**
 * Fields shared by every content item
 */
export interface ContentItemBase {
  /** Stable identifier, survives export/import round trips */
  id: string;

  kind: ContentKind;

  title: string;

  /** Author markdown body */
  body: string;

  published: boolean;

  modules: ModuleMembership[];

  /** Course-relative folder the item was loaded from */
  sourcePath?: string;

  /** Numeric prefix of the item folder, used for ordering */
  orderPrefix?: number;
}

export interface PageItem extends ContentItemBase {
  kind: 'page';
}

export interface AssignmentSettings {
  pointsPossible?: number;
  submissionTypes: string[];
  dueAt?: string;
  unlockAt?: string;
  lockAt?: string;
  gradingType: string;
  /** Assignment group title */
  assignmentGroup?: string;
}

/** Inline rubric or a reference to a shared one by name */
export type RubricRef = { kind: 'inline'; rubric: Rubric } | { kind: 'shared'; name: string };

export interface AssignmentItem extends ContentItemBase {
  kind: 'assignment';
  settings: AssignmentSettings;
  rubric?: RubricRef;
}

export type QuestionType =
  | 'multiple_choice'
  | 'multiple_answers'
  | 'true_false'
  | 'short_answer'
  | 'essay'
  | 'file_upload';

export interface Answer {
  text: string;
  correct: boolean;
}

export interface Question {
  /** 1-based number as written in the quiz text */
  number: number;
  stem: string;
  type: QuestionType;
  answers: Answer[];
  points: number;
}

/**
 * Random draw of questions from a bank
 */
export interface QuestionGroup {
  /** Bank title */
  bank: string;
  pick: number;
  pointsPerQuestion: number;
}

export type QuizType = 'assignment' | 'practice_quiz' | 'graded_survey' | 'survey';

export const QUIZ_TYPES: readonly QuizType[] = ['assignment', 'practice_quiz', 'graded_survey', 'survey'];

/** Unknown or missing values read as a graded quiz */
export function toQuizType(value: string | null | undefined): QuizType {
  return QUIZ_TYPES.find(type => type === value) ?? 'assignment';
}

export interface QuizSettings {
  timeLimit?: number;
  allowedAttempts?: number;
  shuffleAnswers: boolean;
  pointsPossible?: number;
  quizType: QuizType;
  dueAt?: string;
}

export interface QuizItem extends ContentItemBase {
  kind: 'quiz';
  /** Instructional text shown before the questions, markdown */
  description: string;
  questions: Question[];
  questionGroups: QuestionGroup[];
  settings: QuizSettings;
}

export interface LinkItem extends ContentItemBase {
  kind: 'link';
  url: string;
  newTab: boolean;
}

export interface FileItem extends ContentItemBase {
  kind: 'file';
  /** Course-relative path of the file */
  filePath: string;
}

export type ContentItem = PageItem | AssignmentItem | QuizItem | LinkItem | FileItem;

export interface RubricRating {
  description: string;
  points: number;
  longDescription?: string;
}

export interface RubricCriterion {
  description: string;
  longDescription?: string;
  points: number;
  ratings: RubricRating[];
}

export interface Rubric {
  title: string;
  description?: string;
  freeFormComments: boolean;
  criteria: RubricCriterion[];
}

export interface QuestionBank {
  id: string;
  title: string;
  questions: Question[];
  sourcePath?: string;
}

/**
 * Ordered group of items
 */
export interface CourseModule {
  id: string;
  title: string;
  /** 1-based position in the course */
  position: number;
  published: boolean;
  /** Item ids in display order */
  itemIds: string[];
}

/**
 * An asset file the course ships, addressed by course-relative path
 */
export interface AssetFile {
  path: string;
  read(): Promise<Buffer>;
}

/**
 * A whole course in canonical form
 */
export interface Course {
  title: string;
  code?: string;
  items: ContentItem[];
  modules: CourseModule[];
  banks: QuestionBank[];
  /** Shared rubrics by name */
  rubrics: Record<string, Rubric>;
  assets: AssetFile[];
}

export function createEmptyCourse(title: string): Course {
  return { title, items: [], modules: [], banks: [], rubrics: {}, assets: [] };
}
