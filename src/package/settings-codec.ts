/**
 * Platform extension files: course settings, module metadata, assignment
 * groups, rubrics, per-assignment and per-quiz settings, web links and the
 * HTML wrapper of pages.
 */

import { parse } from 'node-html-parser';

import {
  AssignmentSettings,
  QuizSettings,
  Rubric,
  RubricCriterion,
  toQuizType,
} from '../models/content.model';
import {
  XML_NAMESPACES,
  childBoolean,
  childElements,
  childNumber,
  childText,
  findAll,
  findFirst,
  firstChild,
  parseXml,
  textOf,
} from '../parsers/xml-query';
import { escapeHtml } from '../utils/text-formatters';

import { CANVAS_NAMESPACE, WEBLINK_NAMESPACE, XML_DECLARATION } from './package-layout';
import { element, textElement } from './xml-writer';

const CANVAS = XML_NAMESPACES.canvas;

function xmlDocument(root: string): string {
  return `${XML_DECLARATION}\n${root}\n`;
}

function workflowState(published: boolean): string {
  return published ? 'active' : 'unpublished';
}

/** Anything but an explicit unpublished state counts as published */
export function isPublishedState(state: string | undefined): boolean {
  return state === undefined || state === '' || (state !== 'unpublished' && state !== 'deleted');
}

// course_settings.xml

export interface CourseSettings {
  identifier: string;
  title: string;
  code?: string;
}

export function encodeCourseSettings(settings: CourseSettings): string {
  return xmlDocument(
    element('course', { identifier: settings.identifier, xmlns: CANVAS_NAMESPACE }, [
      textElement('title', settings.title),
      textElement('course_code', settings.code),
    ])
  );
}

export function decodeCourseSettings(xml: string): CourseSettings {
  const root = parseXml(xml, 'course_settings.xml').documentElement;
  return {
    identifier: root.getAttribute('identifier') ?? '',
    title: childText(root, 'title') ?? '',
    code: childText(root, 'course_code') || undefined,
  };
}

// module_meta.xml

export interface ModuleMetaItem {
  identifier: string;
  contentType: string;
  title: string;
  identifierRef?: string;
  url?: string;
  position: number;
  indent: number;
  published: boolean;
}

export interface ModuleMeta {
  identifier: string;
  title: string;
  position: number;
  published: boolean;
  items: ModuleMetaItem[];
}

export function encodeModuleMeta(modules: ModuleMeta[]): string {
  return xmlDocument(
    element(
      'modules',
      { xmlns: CANVAS_NAMESPACE },
      modules.map(module =>
        element('module', { identifier: module.identifier }, [
          textElement('title', module.title),
          textElement('workflow_state', workflowState(module.published)),
          textElement('position', module.position),
          element(
            'items',
            {},
            module.items.map(item =>
              element('item', { identifier: item.identifier }, [
                textElement('content_type', item.contentType),
                textElement('workflow_state', workflowState(item.published)),
                textElement('title', item.title),
                textElement('identifierref', item.identifierRef),
                textElement('url', item.url),
                textElement('position', item.position),
                textElement('indent', item.indent),
              ])
            )
          ),
        ])
      )
    )
  );
}

export function decodeModuleMeta(xml: string): ModuleMeta[] {
  const doc = parseXml(xml, 'module_meta.xml');
  return findAll(doc, 'module', CANVAS).map((module, moduleIndex) => {
    const items = firstChild(module, 'items');
    return {
      identifier: module.getAttribute('identifier') ?? '',
      title: childText(module, 'title') ?? '',
      position: childNumber(module, 'position') ?? moduleIndex + 1,
      published: isPublishedState(childText(module, 'workflow_state')),
      items: (items ? childElements(items, 'item') : []).map((item, itemIndex) => ({
        identifier: item.getAttribute('identifier') ?? '',
        contentType: childText(item, 'content_type') ?? '',
        title: childText(item, 'title') ?? '',
        identifierRef: childText(item, 'identifierref') || undefined,
        url: childText(item, 'url') || undefined,
        position: childNumber(item, 'position') ?? itemIndex + 1,
        indent: childNumber(item, 'indent') ?? 0,
        published: isPublishedState(childText(item, 'workflow_state')),
      })),
    };
  });
}

// assignment_groups.xml

export interface AssignmentGroup {
  identifier: string;
  title: string;
  position: number;
}

export function encodeAssignmentGroups(groups: AssignmentGroup[]): string {
  return xmlDocument(
    element(
      'assignmentGroups',
      { xmlns: CANVAS_NAMESPACE },
      groups.map(group =>
        element('assignmentGroup', { identifier: group.identifier }, [
          textElement('title', group.title),
          textElement('position', group.position),
        ])
      )
    )
  );
}

/** Group titles by identifier */
export function decodeAssignmentGroups(xml: string): Map<string, string> {
  const doc = parseXml(xml, 'assignment_groups.xml');
  return new Map(
    findAll(doc, 'assignmentGroup', CANVAS).map(group => [
      group.getAttribute('identifier') ?? '',
      childText(group, 'title') ?? '',
    ])
  );
}

// files_meta.xml

export function encodeFilesMeta(files: Array<{ identifier: string; displayName: string }>): string {
  return xmlDocument(
    element('fileMeta', { xmlns: CANVAS_NAMESPACE }, [
      element(
        'files',
        {},
        files.map(file => element('file', { identifier: file.identifier }, [textElement('display_name', file.displayName)]))
      ),
    ])
  );
}

// rubrics.xml and per-assignment rubric.xml

function encodeRubricBody(rubric: Rubric): Array<string | undefined> {
  return [
    textElement('title', rubric.title),
    textElement('description', rubric.description),
    textElement('free_form_criterion_comments', rubric.freeFormComments),
    textElement(
      'points_possible',
      rubric.criteria.reduce((sum, c) => sum + c.points, 0)
    ),
    element(
      'data',
      {},
      rubric.criteria.map((criterion, i) =>
        element('criterion', {}, [
          textElement('criterion_id', `criterion_${i + 1}`),
          textElement('description', criterion.description),
          textElement('long_description', criterion.longDescription),
          textElement('points', criterion.points),
          element(
            'ratings',
            {},
            criterion.ratings.map(rating =>
              element('rating', {}, [
                textElement('description', rating.description),
                textElement('long_description', rating.longDescription),
                textElement('points', rating.points),
              ])
            )
          ),
        ])
      )
    ),
  ];
}

export function encodeRubrics(rubrics: Array<{ identifier: string; rubric: Rubric }>): string {
  return xmlDocument(
    element(
      'rubrics',
      { xmlns: CANVAS_NAMESPACE },
      rubrics.map(({ identifier, rubric }) => element('rubric', { identifier }, encodeRubricBody(rubric)))
    )
  );
}

function decodeCriterion(criterion: Element): RubricCriterion {
  const ratingsElement = firstChild(criterion, 'ratings');
  const ratings = (ratingsElement ? childElements(ratingsElement, 'rating') : []).map(rating => ({
    description: childText(rating, 'description') ?? '',
    points: childNumber(rating, 'points') ?? 0,
    longDescription: childText(rating, 'long_description') || undefined,
  }));
  const highest = ratings.reduce((max, r) => Math.max(max, r.points), 0);
  return {
    description: childText(criterion, 'description') ?? '',
    longDescription: childText(criterion, 'long_description') || undefined,
    points: childNumber(criterion, 'points') ?? highest,
    ratings,
  };
}

function decodeRubricElement(rubric: Element): Rubric {
  const data = firstChild(rubric, 'data');
  return {
    title: childText(rubric, 'title') ?? '',
    description: childText(rubric, 'description') || undefined,
    freeFormComments: childBoolean(rubric, 'free_form_criterion_comments') ?? false,
    criteria: (data ? childElements(data, 'criterion') : findAll(rubric, 'criterion')).map(decodeCriterion),
  };
}

/** Rubrics by identifier */
export function decodeRubrics(xml: string): Map<string, Rubric> {
  const doc = parseXml(xml, 'rubrics.xml');
  return new Map(
    findAll(doc, 'rubric', CANVAS).map(rubric => [rubric.getAttribute('identifier') ?? '', decodeRubricElement(rubric)])
  );
}

/** A stand-alone `<rubric>` document, as some producers place next to an assignment */
export function decodeRubricDocument(xml: string, sourceName: string): Rubric {
  return decodeRubricElement(parseXml(xml, sourceName).documentElement);
}

// assignment_settings.xml

export interface AssignmentSettingsDocument {
  identifier: string;
  title: string;
  published: boolean;
  settings: AssignmentSettings;
  assignmentGroupRef?: string;
  rubricRef?: string;
}

export function encodeAssignmentSettings(doc: AssignmentSettingsDocument): string {
  const { settings } = doc;
  return xmlDocument(
    element('assignment', { identifier: doc.identifier, xmlns: CANVAS_NAMESPACE }, [
      textElement('title', doc.title),
      textElement('workflow_state', doc.published ? 'published' : 'unpublished'),
      textElement('points_possible', settings.pointsPossible),
      textElement('grading_type', settings.gradingType),
      textElement('submission_types', settings.submissionTypes.join(',')),
      textElement('due_at', settings.dueAt),
      textElement('unlock_at', settings.unlockAt),
      textElement('lock_at', settings.lockAt),
      textElement('assignment_group_identifierref', doc.assignmentGroupRef),
      textElement('rubric_identifierref', doc.rubricRef),
    ])
  );
}

export function decodeAssignmentSettings(xml: string, sourceName: string): AssignmentSettingsDocument {
  const root = parseXml(xml, sourceName).documentElement;
  const submission = childText(root, 'submission_types');
  return {
    identifier: root.getAttribute('identifier') ?? '',
    title: childText(root, 'title') ?? '',
    published: isPublishedState(childText(root, 'workflow_state')),
    settings: {
      pointsPossible: childNumber(root, 'points_possible'),
      gradingType: childText(root, 'grading_type') || 'points',
      submissionTypes: submission
        ? submission.split(',').map(s => s.trim()).filter(s => s !== '')
        : ['online_upload'],
      dueAt: childText(root, 'due_at') || undefined,
      unlockAt: childText(root, 'unlock_at') || undefined,
      lockAt: childText(root, 'lock_at') || undefined,
    },
    assignmentGroupRef: childText(root, 'assignment_group_identifierref') || undefined,
    rubricRef: childText(root, 'rubric_identifierref') || undefined,
  };
}

// assessment_meta.xml

export interface QuizMetaDocument {
  identifier: string;
  title: string;
  published: boolean;
  descriptionHtml?: string;
  settings: QuizSettings;
}

export function encodeQuizMeta(doc: QuizMetaDocument): string {
  const { settings } = doc;
  return xmlDocument(
    element('quiz', { identifier: doc.identifier, xmlns: CANVAS_NAMESPACE }, [
      textElement('title', doc.title),
      textElement('description', doc.descriptionHtml),
      textElement('quiz_type', settings.quizType),
      textElement('points_possible', settings.pointsPossible),
      textElement('shuffle_answers', settings.shuffleAnswers),
      textElement('time_limit', settings.timeLimit),
      textElement('allowed_attempts', settings.allowedAttempts),
      textElement('due_at', settings.dueAt),
      textElement('available', doc.published),
      textElement('workflow_state', doc.published ? 'available' : 'unpublished'),
    ])
  );
}

export function decodeQuizMeta(xml: string, sourceName: string): QuizMetaDocument {
  const root = parseXml(xml, sourceName).documentElement;
  return {
    identifier: root.getAttribute('identifier') ?? '',
    title: childText(root, 'title') ?? '',
    published: isPublishedState(childText(root, 'workflow_state')),
    descriptionHtml: childText(root, 'description') || undefined,
    settings: {
      quizType: toQuizType(childText(root, 'quiz_type')),
      pointsPossible: childNumber(root, 'points_possible'),
      shuffleAnswers: childBoolean(root, 'shuffle_answers') ?? false,
      timeLimit: childNumber(root, 'time_limit'),
      allowedAttempts: childNumber(root, 'allowed_attempts'),
      dueAt: childText(root, 'due_at') || undefined,
    },
  };
}

// web links

export function encodeWebLink(title: string, url: string, newTab: boolean): string {
  return xmlDocument(
    element('webLink', { xmlns: WEBLINK_NAMESPACE }, [
      textElement('title', title),
      element('url', { href: url, target: newTab ? '_blank' : '_self' }, []),
    ])
  );
}

export function decodeWebLink(xml: string, sourceName: string): { title: string; url: string; newTab: boolean } {
  const doc = parseXml(xml, sourceName);
  const url = findFirst(doc, 'url', XML_NAMESPACES.weblink);
  const href = url?.getAttribute('href') ?? '';
  if (!href) {
    throw new Error(`${sourceName} has no url`);
  }
  return {
    title: textOf(findFirst(doc, 'title', XML_NAMESPACES.weblink)),
    url: href,
    newTab: (url?.getAttribute('target') ?? '_blank') !== '_self',
  };
}

// page HTML

export interface PageDocument {
  identifier: string;
  title: string;
  published: boolean;
  bodyHtml: string;
}

export function encodePageHtml(page: PageDocument): string {
  return [
    '<html>',
    '<head>',
    '<meta http-equiv="Content-Type" content="text/html; charset=utf-8"/>',
    `<title>${escapeHtml(page.title)}</title>`,
    `<meta name="identifier" content="${escapeHtml(page.identifier)}"/>`,
    '<meta name="editing_roles" content="teachers"/>',
    `<meta name="workflow_state" content="${workflowState(page.published)}"/>`,
    '</head>',
    '<body>',
    page.bodyHtml,
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

/**
 * Title, identifier marker and publish state from a page's head; the body
 * HTML is returned whole for the reverse markup pass.
 */
export function decodePageHtml(html: string): { identifier?: string; title?: string; published: boolean } {
  const root = parse(html);
  const meta = (name: string): string | undefined =>
    root.querySelector(`meta[name="${name}"]`)?.getAttribute('content') || undefined;
  const title = root.querySelector('title')?.text.trim();
  return {
    identifier: meta('identifier'),
    title: title || undefined,
    published: isPublishedState(meta('workflow_state')),
  };
}
