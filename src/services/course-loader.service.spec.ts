/**
 * Course Loader Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { findItem } from '../utils/content-item-builder';
import { deriveItemId } from '../utils/id-generator';
import { Logger } from '../utils/logger';

import { loadCourse } from './course-loader.service';

function silentLogger(): jest.Mocked<Logger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

const WEEK_ONE = 'content/01-Week 1.module';
const WEEK_TWO = 'content/02-Week 2.module';

describe('course-loader.service', () => {
  let courseRoot: string;
  let logger: jest.Mocked<Logger>;

  const write = (relativePath: string, content: string | Buffer): void => {
    const target = path.join(courseRoot, relativePath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  };

  beforeEach(() => {
    courseRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'course-sync-loader-'));
    logger = silentLogger();

    write(`${WEEK_ONE}/module.yaml`, 'name: Week One\npublished: false\n');
    write(`${WEEK_ONE}/02-intro.page/index.md`, '---\nname: Intro\npublished: true\nvariables:\n  term: 2024\n---\n\n# Intro\n');
    write(`${WEEK_ONE}/01-syllabus.page/index.md`, '---\nname: Syllabus\n---\n\nRead me.\n');
    write(`${WEEK_ONE}/essay.assignment/index.md`, '---\nname: Essay\npoints_possible: 10\n---\n\nWrite.\n');
    write(`${WEEK_ONE}/essay.assignment/rubric.yaml`, 'use_rubric: essay-rubric\n');
    write(
      'rubrics/essay-rubric.yaml',
      ['title: Essay Rubric', 'criteria:', '  - description: Clarity', '    points: 5', '    ratings:', '      - description: Clear', '        points: 5'].join('\n')
    );
    write('question-banks/capitals.bank.md', '---\nname: Capitals\n---\n\n1. Capital of France?\n*a) Paris\nb) Lyon\n');
    write(
      `${WEEK_TWO}/01-check.quiz/index.md`,
      '---\nname: Check\nquestion_groups:\n  - bank: Capitals\n    pick: 1\n---\n\nRead first.\n\n1. 2+2?\n*a) 4\nb) 5\n'
    );
    write(`${WEEK_TWO}/02-map.file/index.md`, '---\nname: Map\nfile: map.png\n---\n');
    write('assets/map.png', Buffer.from([1, 2, 3]));
    write('modules/module_order.yaml', 'modules:\n  - Week 2\n  - Week One\n');
  });

  afterEach(() => {
    fs.rmSync(courseRoot, { recursive: true, force: true });
  });

  it('should order modules by module_order.yaml and items by folder prefix', async () => {
    // Act
    const { course, errors } = await loadCourse(courseRoot, { title: 'Geo', logger });

    // Assert
    expect(errors).toEqual([]);
    expect(course.title).toBe('Geo');
    expect(course.modules.map(m => [m.title, m.position, m.published])).toEqual([
      ['Week 2', 1, true],
      ['Week One', 2, false],
    ]);
    expect(course.modules[0].itemIds).toEqual([
      deriveItemId(`${WEEK_TWO}/01-check.quiz`),
      deriveItemId(`${WEEK_TWO}/02-map.file`),
    ]);
    expect(course.modules[1].itemIds).toEqual([
      deriveItemId(`${WEEK_ONE}/01-syllabus.page`),
      deriveItemId(`${WEEK_ONE}/02-intro.page`),
      deriveItemId(`${WEEK_ONE}/essay.assignment`),
    ]);
  });

  it('should read bodies, memberships and render hints of pages', async () => {
    // Act
    const { course, renderHints } = await loadCourse(courseRoot, { logger });

    // Assert
    const id = deriveItemId(`${WEEK_ONE}/02-intro.page`);
    const intro = findItem(course, id);
    expect(intro?.title).toBe('Intro');
    expect(intro?.published).toBe(true);
    expect(intro?.body).toBe('# Intro\n');
    expect(intro?.modules).toEqual([{ module: 'Week One', position: undefined, indent: 0 }]);
    expect(renderHints.get(id)).toEqual({ template: undefined, variables: { term: '2024' } });
  });

  it('should resolve shared rubrics, banks and files', async () => {
    // Act
    const { course } = await loadCourse(courseRoot, { logger });

    // Assert
    const essay = findItem(course, deriveItemId(`${WEEK_ONE}/essay.assignment`));
    expect(essay?.kind === 'assignment' && essay.rubric).toEqual({ kind: 'shared', name: 'essay-rubric' });
    expect(course.rubrics['essay-rubric'].title).toBe('Essay Rubric');

    const quiz = findItem(course, deriveItemId(`${WEEK_TWO}/01-check.quiz`));
    if (quiz?.kind !== 'quiz') {
      throw new Error('quiz was not loaded');
    }
    expect(quiz.description).toBe('Read first.');
    expect(quiz.questions).toEqual([
      {
        number: 1,
        stem: '2+2?',
        type: 'multiple_choice',
        answers: [
          { text: '4', correct: true },
          { text: '5', correct: false },
        ],
        points: 1,
      },
    ]);
    expect(quiz.questionGroups).toEqual([{ bank: 'Capitals', pick: 1, pointsPerQuestion: 1 }]);
    expect(course.banks.map(bank => [bank.title, bank.questions.length])).toEqual([['Capitals', 1]]);

    const map = findItem(course, deriveItemId(`${WEEK_TWO}/02-map.file`));
    expect(map?.kind === 'file' && map.filePath).toBe('assets/map.png');
    expect(course.assets.map(asset => asset.path)).toEqual(['assets/map.png']);
    await expect(course.assets[0].read()).resolves.toEqual(Buffer.from([1, 2, 3]));
  });

  it('should skip an item whose frontmatter contradicts its folder', async () => {
    // Arrange
    const file = `${WEEK_TWO}/03-bad.page/index.md`;
    write(file, '---\nname: Bad\ntype: quiz\n---\n');

    // Act
    const { course, errors } = await loadCourse(courseRoot, { logger });

    // Assert
    expect(errors.map(err => err.message)).toEqual([`${file} declares type "quiz" but its folder is a page`]);
    expect(course.items.some(item => item.title === 'Bad')).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(`${file} declares type "quiz" but its folder is a page`, { sourcePath: file });
  });

  it('should report a quiz drawing from an unknown bank', async () => {
    // Arrange
    const file = `${WEEK_TWO}/04-draw.quiz/index.md`;
    write(file, '---\nname: Draw\nquestion_groups:\n  - bank: Rivers\n    pick: 2\n---\n');

    // Act
    const { errors } = await loadCourse(courseRoot, { logger });

    // Assert
    expect(errors.map(err => err.message)).toEqual([`${file} draws from unknown question banks: Rivers`]);
  });

  it('should reject a second item reusing an identifier', async () => {
    // Arrange
    write(`${WEEK_TWO}/05-a.page/index.md`, '---\nname: A\nidentifier: same\n---\n');
    write(`${WEEK_TWO}/06-b.page/index.md`, '---\nname: B\nidentifier: same\n---\n');

    // Act
    const { course, errors } = await loadCourse(courseRoot, { logger });

    // Assert
    expect(findItem(course, 'same')?.title).toBe('A');
    expect(errors.map(err => err.message)).toEqual([`${WEEK_TWO}/06-b.page/index.md reuses identifier "same"`]);
  });
});
