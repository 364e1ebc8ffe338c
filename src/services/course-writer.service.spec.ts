/**
 * Course Writer Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { Course, Question, Rubric, createEmptyCourse } from '../models/content.model';
import {
  buildAssignment,
  buildFile,
  buildLink,
  buildPage,
  buildQuestionBank,
  buildQuiz,
  findItem,
} from '../utils/content-item-builder';
import { Logger } from '../utils/logger';

import { loadCourse } from './course-loader.service';
import { writeCourseSource } from './course-writer.service';

function silentLogger(): jest.Mocked<Logger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

const RUBRIC: Rubric = {
  title: 'Essay Rubric',
  freeFormComments: false,
  criteria: [{ description: 'Clarity', points: 5, ratings: [{ description: 'Clear', points: 5 }] }],
};

const QUESTIONS: Question[] = [
  {
    number: 1,
    stem: '2+2?',
    type: 'multiple_choice',
    answers: [
      { text: '4', correct: true },
      { text: '5', correct: false },
    ],
    points: 2,
  },
  { number: 2, stem: 'Capital of France?', type: 'short_answer', answers: [{ text: 'Paris', correct: true }], points: 2 },
];

const week = (title: string) => ({ module: title, indent: 0 });

function sampleCourse(): Course {
  const course = createEmptyCourse('Geo 101');
  course.items = [
    buildPage({ id: 'welcome', title: 'Welcome', body: '# Welcome', published: true, modules: [week('Week 1')] }),
    buildAssignment({
      id: 'essay',
      title: 'Essay',
      body: 'Write.',
      modules: [{ module: 'Week 1', indent: 1 }],
      settings: { pointsPossible: 10, submissionTypes: ['online_text_entry'] },
      rubric: { kind: 'inline', rubric: RUBRIC },
    }),
    buildQuiz({
      id: 'check',
      title: 'Check',
      description: 'Read first.',
      questions: QUESTIONS,
      questionGroups: [{ bank: 'Capitals', pick: 1, pointsPerQuestion: 2 }],
      settings: { timeLimit: 15 },
      modules: [week('Week 1')],
    }),
    buildLink({ id: 'atlas', title: 'Atlas', url: 'https://example.com/atlas', newTab: false, modules: [week('Week 1')] }),
    buildFile({ id: 'map', title: 'Map', filePath: 'assets/map.png', modules: [week('Week 1')] }),
  ];
  course.modules = [
    { id: 'm1', title: 'Week 1', position: 1, published: true, itemIds: ['welcome', 'essay', 'check', 'atlas', 'map'] },
  ];
  course.banks = [
    buildQuestionBank({
      id: 'capitals',
      title: 'Capitals',
      questions: [
        {
          number: 1,
          stem: 'Capital of Peru?',
          type: 'multiple_choice',
          answers: [
            { text: 'Lima', correct: true },
            { text: 'Quito', correct: false },
          ],
          points: 1,
        },
      ],
    }),
  ];
  course.assets = [{ path: 'assets/map.png', read: async () => Buffer.from([7, 8]) }];
  return course;
}

describe('course-writer.service', () => {
  let outputDir: string;
  let logger: jest.Mocked<Logger>;

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'course-sync-writer-'));
    logger = silentLogger();
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  const read = (relativePath: string): string => fs.readFileSync(path.join(outputDir, relativePath), 'utf-8');

  it('should lay out module and item folders in position order', async () => {
    // Act
    const { written } = await writeCourseSource(sampleCourse(), outputDir, { logger });

    // Assert
    const week1 = 'content/01-Week 1.module';
    expect(written).toEqual([
      'course.yaml',
      'modules/module_order.yaml',
      `${week1}/module.yaml`,
      'question-banks/capitals.bank.md',
      `${week1}/01-welcome.page/index.md`,
      `${week1}/02-essay.assignment/index.md`,
      `${week1}/02-essay.assignment/rubric.yaml`,
      `${week1}/03-check.quiz/index.md`,
      `${week1}/04-atlas.link/index.md`,
      `${week1}/05-map.file/index.md`,
      'assets/map.png',
    ]);
    expect(read('course.yaml')).toBe('title: Geo 101\n');
    expect(read('modules/module_order.yaml')).toBe('modules:\n  - Week 1\n');
    expect(read(`${week1}/01-welcome.page/index.md`)).toBe(
      '---\nname: Welcome\nidentifier: welcome\npublished: true\n---\n\n# Welcome\n'
    );
  });

  it('should load back into the same course', async () => {
    // Arrange
    await writeCourseSource(sampleCourse(), outputDir, { logger });

    // Act
    const { course, errors } = await loadCourse(outputDir, { logger });

    // Assert
    expect(errors).toEqual([]);
    expect(course.modules.map(m => [m.title, m.itemIds])).toEqual([
      ['Week 1', ['welcome', 'essay', 'check', 'atlas', 'map']],
    ]);

    const essay = findItem(course, 'essay');
    if (essay?.kind !== 'assignment') {
      throw new Error('essay was not loaded');
    }
    expect(essay.body).toBe('Write.\n');
    expect(essay.modules).toEqual([{ module: 'Week 1', indent: 1 }]);
    expect(essay.settings.pointsPossible).toBe(10);
    expect(essay.settings.submissionTypes).toEqual(['online_text_entry']);
    expect(essay.rubric).toEqual({ kind: 'inline', rubric: RUBRIC });

    const quiz = findItem(course, 'check');
    if (quiz?.kind !== 'quiz') {
      throw new Error('quiz was not loaded');
    }
    expect(quiz.description).toBe('Read first.');
    expect(quiz.questions).toEqual(QUESTIONS);
    expect(quiz.questionGroups).toEqual([{ bank: 'Capitals', pick: 1, pointsPerQuestion: 2 }]);
    expect(quiz.settings.timeLimit).toBe(15);

    const atlas = findItem(course, 'atlas');
    expect(atlas?.kind === 'link' && [atlas.url, atlas.newTab]).toEqual(['https://example.com/atlas', false]);
    const map = findItem(course, 'map');
    expect(map?.kind === 'file' && map.filePath).toBe('assets/map.png');

    expect(course.banks.map(bank => [bank.id, bank.title, bank.questions.length])).toEqual([['capitals', 'Capitals', 1]]);
    expect(fs.readFileSync(path.join(outputDir, 'assets/map.png'))).toEqual(Buffer.from([7, 8]));
  });

  it('should write shared rubrics and extra module memberships', async () => {
    // Arrange
    const course = createEmptyCourse('Geo 101');
    course.rubrics = { 'essay-rubric': RUBRIC };
    course.items = [
      buildAssignment({ id: 'essay', title: 'Essay', rubric: { kind: 'shared', name: 'essay-rubric' }, modules: [week('Week 1')] }),
      buildPage({ id: 'other', title: 'Other', modules: [week('Week 2')] }),
      buildPage({ id: 'shared', title: 'Shared', modules: [week('Week 1'), { module: 'Week 2', indent: 2 }] }),
      buildPage({ id: 'loose', title: 'Loose' }),
    ];
    course.modules = [
      { id: 'm1', title: 'Week 1', position: 1, published: true, itemIds: ['essay', 'shared'] },
      { id: 'm2', title: 'Week 2', position: 2, published: false, itemIds: ['other', 'shared'] },
    ];

    // Act
    const { written } = await writeCourseSource(course, outputDir, { logger });

    // Assert
    expect(written).toContain('rubrics/essay-rubric.yaml');
    expect(written).toContain('content/loose.page/index.md');
    expect(read('content/01-Week 1.module/01-essay.assignment/rubric.yaml')).toBe('use_rubric: essay-rubric\n');
    expect(read('content/01-Week 1.module/02-shared.page/index.md')).toBe(
      '---\nname: Shared\nidentifier: shared\npublished: false\nmodules:\n  - name: Week 2\n    position: 2\n    indent: 2\n---\n'
    );

    const loaded = await loadCourse(outputDir, { logger });
    expect(loaded.errors).toEqual([]);
    expect(loaded.course.modules.map(m => [m.title, m.published, m.itemIds])).toEqual([
      ['Week 1', true, ['essay', 'shared']],
      ['Week 2', false, ['other', 'shared']],
    ]);
    expect(loaded.course.rubrics['essay-rubric']).toEqual(RUBRIC);
  });

  it('should write rows shared by several rubrics once and load them back', async () => {
    // Arrange
    const lab: Rubric = {
      title: 'Lab Rubric',
      freeFormComments: false,
      criteria: [RUBRIC.criteria[0], { description: 'Safety', points: 2, ratings: [{ description: 'Goggles on', points: 2 }] }],
    };
    const course = createEmptyCourse('Geo 101');
    course.rubrics = { 'essay-rubric': RUBRIC };
    course.items = [
      buildAssignment({ id: 'essay', title: 'Essay', rubric: { kind: 'shared', name: 'essay-rubric' }, modules: [week('Week 1')] }),
      buildAssignment({ id: 'lab', title: 'Lab', rubric: { kind: 'inline', rubric: lab }, modules: [week('Week 1')] }),
    ];
    course.modules = [{ id: 'm1', title: 'Week 1', position: 1, published: true, itemIds: ['essay', 'lab'] }];

    // Act
    const { written } = await writeCourseSource(course, outputDir, { logger });

    // Assert
    expect(written.filter(file => file.startsWith('rubrics/'))).toEqual(['rubrics/rows/clarity.yaml', 'rubrics/essay-rubric.yaml']);
    expect(read('rubrics/rows/clarity.yaml')).toBe('description: Clarity\npoints: 5\nratings:\n  - description: Clear\n    points: 5\n');
    expect(read('rubrics/essay-rubric.yaml')).toBe("title: Essay Rubric\ncriteria:\n  - '{{rubric_row:clarity}}'\n");
    expect(read('content/01-Week 1.module/02-lab.assignment/rubric.yaml')).toContain("  - '{{rubric_row:clarity}}'\n");

    const loaded = await loadCourse(outputDir, { logger });
    expect(loaded.errors).toEqual([]);
    expect(loaded.course.rubrics['essay-rubric']).toEqual(RUBRIC);
    const loadedLab = findItem(loaded.course, 'lab');
    expect(loadedLab?.kind === 'assignment' && loadedLab.rubric).toEqual({ kind: 'inline', rubric: lab });
  });
});
