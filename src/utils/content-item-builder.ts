/**
 * Utility functions for building and querying canonical course objects
 *
 * Both the source loader and the package/remote decoders construct items
 * through these builders, so defaults are applied in one place.
 */

import {
  AssignmentItem,
  AssignmentSettings,
  ContentItem,
  ContentKind,
  Course,
  CourseModule,
  FileItem,
  LinkItem,
  ModuleMembership,
  PageItem,
  Question,
  QuestionBank,
  QuestionGroup,
  QuizItem,
  QuizSettings,
  Rubric,
  RubricRef,
} from '../models/content.model';

interface ItemFields {
  id: string;
  title: string;
  body?: string;
  published?: boolean;
  modules?: ModuleMembership[];
  sourcePath?: string;
  orderPrefix?: number;
}

function baseFields<K extends ContentKind>(kind: K, config: ItemFields) {
  return {
    id: config.id,
    kind,
    title: config.title,
    body: config.body ?? '',
    published: config.published ?? false,
    modules: config.modules ?? [],
    sourcePath: config.sourcePath,
    orderPrefix: config.orderPrefix,
  };
}

export function buildPage(config: ItemFields): PageItem {
  return baseFields('page', config);
}

export function buildAssignment(
  config: ItemFields & { settings?: Partial<AssignmentSettings>; rubric?: RubricRef }
): AssignmentItem {
  return {
    ...baseFields('assignment', config),
    settings: {
      submissionTypes: ['online_upload'],
      gradingType: 'points',
      ...config.settings,
    },
    rubric: config.rubric,
  };
}

export function buildQuiz(
  config: ItemFields & {
    description?: string;
    questions?: Question[];
    questionGroups?: QuestionGroup[];
    settings?: Partial<QuizSettings>;
  }
): QuizItem {
  return {
    ...baseFields('quiz', config),
    description: config.description ?? '',
    questions: config.questions ?? [],
    questionGroups: config.questionGroups ?? [],
    settings: {
      shuffleAnswers: false,
      quizType: 'assignment',
      ...config.settings,
    },
  };
}

export function buildLink(config: ItemFields & { url: string; newTab?: boolean }): LinkItem {
  return { ...baseFields('link', config), url: config.url, newTab: config.newTab ?? true };
}

export function buildFile(config: ItemFields & { filePath: string }): FileItem {
  return { ...baseFields('file', config), filePath: config.filePath };
}

export function buildQuestionBank(config: {
  id: string;
  title: string;
  questions?: Question[];
  sourcePath?: string;
}): QuestionBank {
  return { id: config.id, title: config.title, questions: config.questions ?? [], sourcePath: config.sourcePath };
}

/** Sum of question points plus drawn bank points */
export function quizPointsPossible(quiz: QuizItem): number {
  const own = quiz.questions.reduce((sum, q) => sum + q.points, 0);
  const drawn = quiz.questionGroups.reduce((sum, g) => sum + g.pick * g.pointsPerQuestion, 0);
  return own + drawn;
}

export function findItem(course: Course, id: string): ContentItem | undefined {
  return course.items.find(item => item.id === id);
}

/** Items of a module in display order; unknown ids are dropped */
export function itemsInModule(course: Course, module: CourseModule): ContentItem[] {
  return module.itemIds.flatMap(id => {
    const item = findItem(course, id);
    return item ? [item] : [];
  });
}

/** Indent of `item` inside the module titled `moduleTitle` */
export function indentIn(item: ContentItem, moduleTitle: string): number {
  return item.modules.find(m => m.module === moduleTitle)?.indent ?? 0;
}

export function bankByName(course: Course, name: string): QuestionBank | undefined {
  const wanted = name.trim().toLowerCase();
  return course.banks.find(bank => bank.title.toLowerCase() === wanted || bank.id.toLowerCase() === wanted);
}

/**
 * The rubric an assignment uses, following shared references.
 * Returns undefined when a shared name is unknown.
 */
export function resolveRubric(course: Course, item: AssignmentItem): Rubric | undefined {
  if (!item.rubric) {
    return undefined;
  }
  return item.rubric.kind === 'inline' ? item.rubric.rubric : course.rubrics[item.rubric.name];
}

export function isKind<K extends ContentKind>(kind: K) {
  return (item: ContentItem): item is Extract<ContentItem, { kind: K }> => item.kind === kind;
}
