/**
 * Remote platform contracts
 *
 * The publish pipeline talks to the platform through RemotePublisher and the
 * remote importer through RemoteCourseReader. CanvasClient implements both;
 * tests substitute in-process fakes.
 */

import { AssetSource, RemoteDescriptor } from '../models/asset.model';
import {
  AssignmentSettings,
  ContentKind,
  Question,
  QuizSettings,
  Rubric,
} from '../models/content.model';

/** Handle of an object the platform holds */
export interface RemoteRef {
  remoteId: string;
  /** Page slug, for platforms that address pages by url */
  url?: string;
}

export interface PagePayload {
  id: string;
  title: string;
  html: string;
  published: boolean;
}

export interface AssignmentPayload {
  id: string;
  title: string;
  html: string;
  published: boolean;
  settings: AssignmentSettings;
  rubric?: Rubric;
}

export interface QuizGroupPayload {
  name: string;
  pick: number;
  pointsPerQuestion: number;
}

export interface QuizPayload {
  id: string;
  title: string;
  descriptionHtml: string;
  published: boolean;
  settings: QuizSettings;
  questions: Question[];
  groups: QuizGroupPayload[];
}

export interface LinkPayload {
  id: string;
  title: string;
  url: string;
  newTab: boolean;
}

export interface ModulePlanItem {
  title: string;
  kind: ContentKind;
  remote: RemoteRef;
  indent: number;
  /** External url, for links */
  url?: string;
  newTab?: boolean;
}

export interface ModulePlan {
  title: string;
  position: number;
  published: boolean;
  items: ModulePlanItem[];
}

/**
 * Write side. Upserts match existing objects by title, so author source
 * never needs to carry remote ids.
 */
export interface RemotePublisher {
  uploadFile(source: AssetSource): Promise<RemoteDescriptor>;
  upsertPage(page: PagePayload): Promise<RemoteRef>;
  upsertAssignment(assignment: AssignmentPayload): Promise<RemoteRef>;
  upsertQuiz(quiz: QuizPayload): Promise<RemoteRef>;
  upsertLink(link: LinkPayload): Promise<RemoteRef>;
  syncModules(modules: ModulePlan[]): Promise<void>;
}

export interface RemoteCourseInfo {
  id: string;
  name: string;
  courseCode?: string;
}

export interface RemotePage {
  id: string;
  url: string;
  title: string;
  body: string;
  published: boolean;
}

export interface RemoteAssignment {
  id: string;
  name: string;
  description: string;
  published: boolean;
  settings: AssignmentSettings;
  rubric?: Rubric;
}

export interface RemoteQuiz {
  id: string;
  title: string;
  description: string;
  published: boolean;
  settings: QuizSettings;
}

export interface RemoteQuizAnswer {
  text: string;
  weight: number;
}

export interface RemoteQuizQuestion {
  id: string;
  position: number;
  questionType: string;
  questionText: string;
  pointsPossible: number;
  answers: RemoteQuizAnswer[];
}

export interface RemoteModuleItem {
  id: string;
  title: string;
  /** Platform item type: Page, Assignment, Quiz, ExternalUrl, File, SubHeader... */
  type: string;
  position: number;
  indent: number;
  published: boolean;
  contentId?: string;
  pageUrl?: string;
  externalUrl?: string;
  newTab?: boolean;
}

export interface RemoteModule {
  id: string;
  name: string;
  position: number;
  published: boolean;
  items: RemoteModuleItem[];
}

/**
 * Read side, used to reconstruct author source from a live course.
 */
export interface RemoteCourseReader {
  getCourse(courseId: string): Promise<RemoteCourseInfo>;
  listPages(courseId: string): Promise<RemotePage[]>;
  listAssignments(courseId: string): Promise<RemoteAssignment[]>;
  listQuizzes(courseId: string): Promise<RemoteQuiz[]>;
  listQuizQuestions(courseId: string, quizId: string): Promise<RemoteQuizQuestion[]>;
  listModules(courseId: string): Promise<RemoteModule[]>;
}
