/**
 * Remote Course Importer Tests
 */

import { Rubric } from '../models/content.model';
import { platformFileId } from '../markup/html-to-markdown';
import { findItem } from '../utils/content-item-builder';
import { deriveItemId } from '../utils/id-generator';
import { Logger } from '../utils/logger';

import { importRemoteCourse } from './remote-importer.service';
import { RemoteAssignment, RemoteCourseReader, RemoteModule } from './remote.types';

function silentLogger(): jest.Mocked<Logger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

const RUBRIC: Rubric = {
  title: 'Essay rubric',
  freeFormComments: false,
  criteria: [{ description: 'Clarity', points: 5, ratings: [{ description: 'Clear', points: 5 }] }],
};

function essay(id: string, name: string): RemoteAssignment {
  return {
    id,
    name,
    description: '<p>Write.</p>',
    published: true,
    settings: { submissionTypes: ['online_text_entry'], gradingType: 'points', pointsPossible: 5 },
    rubric: RUBRIC,
  };
}

const MODULES: RemoteModule[] = [
  {
    id: '10',
    name: 'Week 1',
    position: 1,
    published: true,
    items: [
      { id: '103', title: 'Map', type: 'File', position: 4, indent: 0, published: true, contentId: '55' },
      { id: '100', title: 'Welcome', type: 'Page', position: 1, indent: 0, published: true, pageUrl: 'welcome' },
      { id: '101', title: 'Check-in', type: 'Quiz', position: 2, indent: 1, published: true, contentId: '9' },
      {
        id: '102',
        title: 'Atlas',
        type: 'ExternalUrl',
        position: 3,
        indent: 0,
        published: true,
        externalUrl: 'https://example.com/atlas',
        newTab: true,
      },
      { id: '104', title: 'Unit intro', type: 'SubHeader', position: 5, indent: 0, published: true },
    ],
  },
];

function fakeReader(): RemoteCourseReader {
  return {
    getCourse: async () => ({ id: '1', name: 'Geo 101', courseCode: 'GEO' }),
    listPages: async () => [
      {
        id: '11',
        url: 'welcome',
        title: 'Welcome',
        body: '<div class="user_content"><h1>Hello</h1><p>See <img src="https://lms.example.com/courses/1/files/55/preview" alt="Map"></p></div>',
        published: true,
      },
    ],
    listAssignments: async () => [essay('21', 'Essay one'), essay('22', 'Essay two')],
    listQuizzes: async () => [
      {
        id: '9',
        title: 'Check-in',
        description: '<p>Read ch.1</p>',
        published: true,
        settings: { shuffleAnswers: false, quizType: 'assignment' },
      },
    ],
    listQuizQuestions: async () => [
      {
        id: '2',
        position: 2,
        questionType: 'essay_question',
        questionText: '<p>Discuss.</p>',
        pointsPossible: 5,
        answers: [],
      },
      {
        id: '1',
        position: 1,
        questionType: 'multiple_choice_question',
        questionText: '<p>What is the capital of France?</p>',
        pointsPossible: 1,
        answers: [
          { text: 'Paris', weight: 100 },
          { text: 'Lyon', weight: 0 },
        ],
      },
    ],
    listModules: async () => MODULES,
  };
}

const resolveAssetPath = (url: string): string | undefined =>
  platformFileId(url) === '55' ? 'assets/map.png' : undefined;

describe('remote-importer', () => {
  let logger: jest.Mocked<Logger>;

  beforeEach(() => {
    logger = silentLogger();
  });

  it('should convert page bodies back to markdown with local asset paths', async () => {
    // Act
    const { course } = await importRemoteCourse(fakeReader(), '1', { resolveAssetPath, logger });

    // Assert
    expect(course.title).toBe('Geo 101');
    expect(course.code).toBe('GEO');
    expect(findItem(course, deriveItemId('remote/page/11'))?.body).toBe('# Hello\n\nSee ![Map](assets/map.png)');
  });

  it('should order quiz questions and mark full-weight answers correct', async () => {
    // Act
    const { course } = await importRemoteCourse(fakeReader(), '1', { resolveAssetPath, logger });

    // Assert
    const quiz = findItem(course, deriveItemId('remote/quiz/9'));
    if (quiz?.kind !== 'quiz') {
      throw new Error('quiz 9 was not imported');
    }
    expect(quiz.description).toBe('Read ch.1');
    expect(quiz.questions).toEqual([
      {
        number: 1,
        stem: 'What is the capital of France?',
        type: 'multiple_choice',
        answers: [
          { text: 'Paris', correct: true },
          { text: 'Lyon', correct: false },
        ],
        points: 1,
      },
      { number: 2, stem: 'Discuss.', type: 'essay', answers: [], points: 5 },
    ]);
    expect(quiz.modules).toEqual([{ module: 'Week 1', position: 2, indent: 1 }]);
  });

  it('should rebuild modules in item position order', async () => {
    // Act
    const { course, warnings } = await importRemoteCourse(fakeReader(), '1', { resolveAssetPath, logger });

    // Assert
    expect(course.modules).toHaveLength(1);
    expect(course.modules[0].itemIds).toEqual([
      deriveItemId('remote/page/11'),
      deriveItemId('remote/quiz/9'),
      deriveItemId('remote/link/102'),
      deriveItemId('remote/file/55'),
    ]);
    const file = findItem(course, deriveItemId('remote/file/55'));
    expect(file?.kind === 'file' && file.filePath).toBe('assets/map.png');
    expect(warnings).toEqual(['Module item type SubHeader is not imported']);
  });

  it('should share a rubric two assignments use', async () => {
    // Act
    const { course } = await importRemoteCourse(fakeReader(), '1', { resolveAssetPath, logger });

    // Assert
    expect(Object.keys(course.rubrics)).toEqual(['essay-rubric']);
    const first = findItem(course, deriveItemId('remote/assignment/21'));
    expect(first?.kind === 'assignment' && first.rubric).toEqual({ kind: 'shared', name: 'essay-rubric' });
  });

  it('should warn about files the registry does not know', async () => {
    // Act
    const { course, warnings } = await importRemoteCourse(fakeReader(), '1', { logger });

    // Assert
    expect(course.items.some(item => item.kind === 'file')).toBe(false);
    expect(warnings).toContain('File "Map" in module "Week 1" is not in the asset registry');
    expect(logger.warn).toHaveBeenCalledWith('File "Map" in module "Week 1" is not in the asset registry', {
      contentId: '55',
    });
  });
});
