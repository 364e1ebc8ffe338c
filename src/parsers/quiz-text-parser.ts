/**
 * Quiz Text Parser
 *
 * Reads and writes the plain-text quiz format authors use:
 *
 *   Optional description, everything before the first question line.
 *
 *   1. Capital of France?
 *   *a) Paris
 *   b) Lyon
 *   2. Pick the primes
 *   [*] 2
 *   [ ] 4
 *   3. Name a colour
 *   * red
 *   4. Discuss.
 *   ####
 *   5. Upload your work.
 *   ^^^^
 */

import { ValidationError } from '../errors/errors';
import { Answer, Question, QuestionType } from '../models/content.model';

const QUESTION_LINE = /^\s*(\d+)[.)]\s+(.*)$/;
const CHOICE_LINE = /^\s*(\*)?\s*([a-zA-Z])\)\s+(.*)$/;
const MULTI_ANSWER_LINE = /^\s*\[([*xX ])\]\s+(.*)$/;
const SHORT_ANSWER_LINE = /^\s*\*\s+(.*)$/;
const ESSAY_LINE = /^\s*####\s*$/;
const FILE_UPLOAD_LINE = /^\s*\^\^\^\^\s*$/;

export interface ParsedQuizText {
  description: string;
  questions: Question[];
}

export interface QuizTextOptions {
  pointsPerQuestion?: number;
  sourcePath?: string;
}

type AnswerMarker = 'choice' | 'multi' | 'short' | 'essay' | 'upload';

interface QuestionDraft {
  number: number;
  stemLines: string[];
  answers: Answer[];
  markers: Set<AnswerMarker>;
}

export function isQuestionLine(line: string): boolean {
  return QUESTION_LINE.test(line);
}

/**
 * Split a quiz body into the description (text before the first numbered
 * question line) and the question text.
 */
export function splitQuizDescription(body: string): { description: string; questionText: string } {
  const lines = body.split(/\r?\n/);
  const first = lines.findIndex(isQuestionLine);
  if (first === -1) {
    return { description: body.trim(), questionText: '' };
  }
  return {
    description: lines.slice(0, first).join('\n').trim(),
    questionText: lines.slice(first).join('\n'),
  };
}

function classifyLine(line: string): { marker: AnswerMarker; answer?: Answer } | undefined {
  if (ESSAY_LINE.test(line)) {
    return { marker: 'essay' };
  }
  if (FILE_UPLOAD_LINE.test(line)) {
    return { marker: 'upload' };
  }
  const multi = MULTI_ANSWER_LINE.exec(line);
  if (multi) {
    return { marker: 'multi', answer: { text: multi[2].trim(), correct: multi[1] !== ' ' } };
  }
  const choice = CHOICE_LINE.exec(line);
  if (choice) {
    return { marker: 'choice', answer: { text: choice[3].trim(), correct: choice[1] === '*' } };
  }
  const short = SHORT_ANSWER_LINE.exec(line);
  if (short) {
    return { marker: 'short', answer: { text: short[1].trim(), correct: true } };
  }
  return undefined;
}

function isTrueFalse(answers: Answer[]): boolean {
  const texts = answers.map(a => a.text.toLowerCase());
  return texts.length === 2 && texts.includes('true') && texts.includes('false');
}

function finishQuestion(draft: QuestionDraft, points: number, sourcePath: string): Question {
  const stem = draft.stemLines.join('\n').trim();
  const fail = (problem: string): never => {
    throw new ValidationError(`Question ${draft.number} ${problem}`, sourcePath, [problem]);
  };

  if (!stem) {
    fail('has no text');
  }
  if (draft.markers.size === 0) {
    fail('has no answers');
  }
  if (draft.markers.size > 1) {
    fail(`mixes answer styles (${Array.from(draft.markers).join(', ')})`);
  }

  const [marker] = Array.from(draft.markers);
  let type: QuestionType;
  switch (marker) {
    case 'essay':
      type = 'essay';
      break;
    case 'upload':
      type = 'file_upload';
      break;
    case 'multi':
      type = 'multiple_answers';
      break;
    case 'short':
      type = 'short_answer';
      break;
    default:
      type = isTrueFalse(draft.answers) ? 'true_false' : 'multiple_choice';
  }

  if ((type === 'multiple_choice' || type === 'true_false' || type === 'multiple_answers') && !draft.answers.some(a => a.correct)) {
    fail('has no correct answer marked');
  }

  return { number: draft.number, stem, type, answers: draft.answers, points };
}

/**
 * Parse quiz text into a description and questions.
 * @throws ValidationError for a question without text, answers, or a correct choice,
 * and for text after a question's answers
 */
export function parseQuizText(text: string, options: QuizTextOptions = {}): ParsedQuizText {
  const points = options.pointsPerQuestion ?? 1;
  const sourcePath = options.sourcePath ?? '(quiz text)';
  const { description, questionText } = splitQuizDescription(text);
  const questions: Question[] = [];
  let draft: QuestionDraft | undefined;

  for (const line of questionText.split(/\r?\n/)) {
    const questionMatch = QUESTION_LINE.exec(line);
    if (questionMatch) {
      if (draft) {
        questions.push(finishQuestion(draft, points, sourcePath));
      }
      draft = {
        number: Number(questionMatch[1]),
        stemLines: [questionMatch[2]],
        answers: [],
        markers: new Set(),
      };
      continue;
    }
    if (!draft || line.trim() === '') {
      continue;
    }

    const classified = classifyLine(line);
    if (classified) {
      draft.markers.add(classified.marker);
      if (classified.answer) {
        draft.answers.push(classified.answer);
      }
    } else if (draft.answers.length === 0 && draft.markers.size === 0) {
      draft.stemLines.push(line);
    } else {
      throw new ValidationError(
        `Question ${draft.number} has text after its answers: "${line.trim()}"`,
        sourcePath,
        [`unexpected line: ${line.trim()}`]
      );
    }
  }
  if (draft) {
    questions.push(finishQuestion(draft, points, sourcePath));
  }

  return { description, questions };
}

function renderAnswers(question: Question): string[] {
  switch (question.type) {
    case 'essay':
      return ['####'];
    case 'file_upload':
      return ['^^^^'];
    case 'short_answer':
      return question.answers.map(a => `* ${a.text}`);
    case 'multiple_answers':
      return question.answers.map(a => `[${a.correct ? '*' : ' '}] ${a.text}`);
    default:
      return question.answers.map(
        (a, i) => `${a.correct ? '*' : ''}${String.fromCharCode(97 + (i % 26))}) ${a.text}`
      );
  }
}

/**
 * Render a description and questions back into quiz text.
 * Questions are renumbered from 1.
 */
export function renderQuizText(description: string, questions: Question[]): string {
  const blocks: string[] = [];
  if (description.trim()) {
    blocks.push(description.trim());
  }
  questions.forEach((question, index) => {
    blocks.push([`${index + 1}. ${question.stem}`, ...renderAnswers(question)].join('\n'));
  });
  return blocks.join('\n\n') + '\n';
}
