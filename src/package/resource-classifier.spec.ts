import { ManifestResource } from '../models/package.model';

import { RESOURCE_TYPES } from './package-layout';
import { ResourceMatcher, classifyResource } from './resource-classifier';

function resource(overrides: Partial<ManifestResource>): ManifestResource {
  return { identifier: 'r1', type: '', files: [], dependencies: [], ...overrides };
}

describe('resource-classifier', () => {
  it('should classify the settings resource by its files', () => {
    const result = classifyResource(
      resource({ type: RESOURCE_TYPES.learningApplication, href: 'course_settings/canvas_export.txt' })
    );
    expect(result.kind).toBe('course-settings');
  });

  it('should prefer an assignment settings file over the declared type', () => {
    const result = classifyResource(
      resource({ type: RESOURCE_TYPES.webcontent, href: 'a1/essay.html', files: ['a1/essay.html', 'a1/assignment_settings.xml'] })
    );
    expect(result).toEqual({ kind: 'assignment', confidence: 0.95, signal: 'assignment settings file' });
  });

  it('should tell quiz metadata from the quiz itself', () => {
    const meta = resource({
      type: RESOURCE_TYPES.learningApplication,
      files: ['q1/assessment_meta.xml', 'non_cc_assessments/q1.xml.qti'],
    });
    const quiz = resource({ type: RESOURCE_TYPES.assessment, files: ['q1/assessment_qti.xml'] });

    expect(classifyResource(meta).kind).toBe('quiz-meta');
    expect(classifyResource(quiz).kind).toBe('quiz');
  });

  it('should treat a lone flat QTI file as a question bank', () => {
    const bank = resource({ type: RESOURCE_TYPES.learningApplication, href: 'non_cc_assessments/b1.xml.qti' });
    expect(classifyResource(bank)).toEqual({ kind: 'question-bank', confidence: 0.85, signal: 'stand-alone .xml.qti' });
  });

  it('should split webcontent into pages and assets', () => {
    expect(classifyResource(resource({ type: 'webcontent', href: 'wiki_content/intro.html' })).kind).toBe('page');
    expect(classifyResource(resource({ type: 'webcontent', href: 'web_resources/a.png' })).kind).toBe('asset');
    expect(classifyResource(resource({ type: 'webcontent', href: 'docs/notes.html' })).kind).toBe('page');
    expect(classifyResource(resource({ type: 'webcontent', href: 'docs/notes.pdf' })).kind).toBe('asset');
  });

  it('should recognise web links from any CC version', () => {
    expect(classifyResource(resource({ type: 'imswl_xmlv1p3' })).kind).toBe('link');
  });

  it('should report unknown when nothing matches', () => {
    expect(classifyResource(resource({ type: 'imsdt_xmlv1p1' }))).toEqual({
      kind: 'unknown',
      confidence: 0,
      signal: 'no matcher',
    });
  });

  it('should let a custom matcher win with a higher confidence', () => {
    const lti: ResourceMatcher = {
      name: 'lti',
      match: r => (r.type.startsWith('imsbasiclti') ? { kind: 'link', confidence: 0.7, signal: 'lti' } : undefined),
    };
    expect(classifyResource(resource({ type: 'imsbasiclti_xmlv1p0' }), [lti]).kind).toBe('link');
  });
});
