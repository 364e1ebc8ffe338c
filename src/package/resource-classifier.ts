/**
 * Resource classification
 *
 * Producers disagree on resource type strings, so each resource is offered
 * to an ordered list of matchers. Every matcher that recognises something
 * reports a kind with a confidence; the highest confidence wins and ties go
 * to the earlier matcher. Nothing recognised means `unknown`.
 */

import { ManifestResource, ResourceKind } from '../models/package.model';

import { FLAT_QTI_DIR, SENTINEL_PATH, WEB_RESOURCES_DIR, WIKI_DIR } from './package-layout';

export interface Classification {
  kind: ResourceKind;
  confidence: number;
  /** What the decision was based on, for logs */
  signal: string;
}

export interface ResourceMatcher {
  readonly name: string;
  match(resource: ManifestResource): Classification | undefined;
}

function allPaths(resource: ManifestResource): string[] {
  return resource.href ? [resource.href, ...resource.files] : resource.files;
}

function hasFile(resource: ManifestResource, predicate: (path: string) => boolean): boolean {
  return allPaths(resource).some(predicate);
}

const isHtml = (path: string): boolean => /\.html?$/i.test(path);

export const courseSettingsMatcher: ResourceMatcher = {
  name: 'course-settings',
  match: resource =>
    hasFile(resource, p => p === SENTINEL_PATH || p.startsWith('course_settings/'))
      ? { kind: 'course-settings', confidence: 1, signal: 'course_settings files' }
      : undefined,
};

export const companionFileMatcher: ResourceMatcher = {
  name: 'companion-files',
  match: resource => {
    if (hasFile(resource, p => /(^|\/)(assignment_settings|assignment)\.xml$/.test(p))) {
      return { kind: 'assignment', confidence: 0.95, signal: 'assignment settings file' };
    }
    if (hasFile(resource, p => /(^|\/)assessment_meta\.xml$/.test(p))) {
      const declaredQuiz = /imsqti|assessment/i.test(resource.type) && !/learning-application/i.test(resource.type);
      return declaredQuiz ? undefined : { kind: 'quiz-meta', confidence: 0.95, signal: 'assessment_meta.xml' };
    }
    if (hasFile(resource, p => p.startsWith(`${FLAT_QTI_DIR}/`) && p.endsWith('.xml.qti'))) {
      return { kind: 'question-bank', confidence: 0.85, signal: 'stand-alone .xml.qti' };
    }
    if (resource.href?.startsWith(`${WIKI_DIR}/`) && isHtml(resource.href)) {
      return { kind: 'page', confidence: 0.9, signal: 'wiki_content html' };
    }
    return undefined;
  },
};

export const declaredTypeMatcher: ResourceMatcher = {
  name: 'declared-type',
  match: resource => {
    const type = resource.type.toLowerCase();
    if (type.includes('objectbank') || type.includes('question-bank')) {
      return { kind: 'question-bank', confidence: 0.9, signal: type };
    }
    if (type.includes('imsqti') || type.includes('assessment')) {
      return { kind: 'quiz', confidence: 0.8, signal: type };
    }
    if (type.includes('imswl') || type.includes('weblink')) {
      return { kind: 'link', confidence: 0.9, signal: type };
    }
    if (type === 'webcontent') {
      const href = resource.href ?? resource.files[0] ?? '';
      if (href.startsWith(`${WEB_RESOURCES_DIR}/`) || !isHtml(href)) {
        return { kind: 'asset', confidence: 0.8, signal: 'webcontent file' };
      }
      return { kind: 'page', confidence: 0.6, signal: 'webcontent html' };
    }
    if (type.includes('learning-application-resource') || type.includes('assignment')) {
      return { kind: 'assignment', confidence: 0.5, signal: type };
    }
    return undefined;
  },
};

export const DEFAULT_MATCHERS: readonly ResourceMatcher[] = [
  courseSettingsMatcher,
  companionFileMatcher,
  declaredTypeMatcher,
];

export function classifyResource(
  resource: ManifestResource,
  matchers: readonly ResourceMatcher[] = DEFAULT_MATCHERS
): Classification {
  let best: Classification = { kind: 'unknown', confidence: 0, signal: 'no matcher' };
  for (const matcher of matchers) {
    const result = matcher.match(resource);
    if (result && result.confidence > best.confidence) {
      best = result;
    }
  }
  return best;
}
