import { Question } from '../models/content.model';

import { QTI_NAMESPACE } from './package-layout';
import { decodeAssessment, encodeAssessment, mapQuestionType } from './qti-codec';

const QUESTIONS: Question[] = [
  {
    number: 1,
    stem: 'Pick the rivers',
    type: 'multiple_answers',
    answers: [
      { text: 'Nile', correct: true },
      { text: 'Alps', correct: false },
      { text: 'Amazon', correct: true },
    ],
    points: 2,
  },
  { number: 2, stem: 'Water boils at 100 C at sea level', type: 'true_false', answers: [{ text: 'True', correct: true }, { text: 'False', correct: false }], points: 1 },
  { number: 3, stem: 'Longest river?', type: 'short_answer', answers: [{ text: 'Nile', correct: true }, { text: 'nile', correct: true }], points: 1 },
  { number: 4, stem: 'Explain erosion & deposition', type: 'essay', answers: [], points: 5 },
];

describe('qti-codec', () => {
  it('should keep question types, answers and points through a quiz document', () => {
    // Arrange
    const xml = encodeAssessment({
      identifier: 'q1',
      title: 'Rivers',
      placement: 'inline',
      descriptionHtml: '<p>Read <em>chapter 2</em></p>',
      questions: QUESTIONS,
      metadata: { cc_maxattempts: 2, qmd_timelimit: undefined },
    });

    // Act
    const decoded = decodeAssessment(xml, 'q1.xml');

    // Assert
    expect(decoded.structure).toBe('assessment');
    expect(decoded.title).toBe('Rivers');
    expect(decoded.descriptionHtml).toBe('<p>Read <em>chapter 2</em></p>');
    expect(decoded.metadata).toEqual({ cc_maxattempts: '2', course_sync_placement: 'inline' });
    expect(decoded.questions).toEqual(QUESTIONS);
  });

  it('should write banks as object banks with their title in metadata', () => {
    const xml = encodeAssessment({ identifier: 'b1', title: 'Pool', placement: 'bank', questions: QUESTIONS.slice(3) });
    const decoded = decodeAssessment(xml, 'b1.xml.qti');

    expect(xml).toContain('<objectbank ident="b1">');
    expect(decoded.structure).toBe('bank');
    expect(decoded.title).toBe('Pool');
    expect(decoded.questions).toHaveLength(1);
  });

  it('should encode random draws as sections referencing the bank', () => {
    // Arrange
    const xml = encodeAssessment({
      identifier: 'q2',
      title: 'Draw',
      placement: 'inline',
      questions: [],
      groups: [{ bankId: 'b1', title: 'Pool', pick: 3, pointsPerQuestion: 2 }],
    });

    // Act
    const decoded = decodeAssessment(xml, 'q2.xml');

    // Assert
    expect(decoded.groups).toEqual([{ bankId: 'b1', title: 'Pool', pick: 3, pointsPerQuestion: 2 }]);
  });

  it('should drop items without a stem and renumber the rest', () => {
    // Arrange
    const item = (stem: string) =>
      `<item ident="x"><presentation><material><mattext>${stem}</mattext></material></presentation></item>`;
    const xml = `<questestinterop xmlns="${QTI_NAMESPACE}"><assessment ident="a" title="T"><section ident="s">${item('')}${item('&lt;b&gt;Second&lt;/b&gt;')}</section></assessment></questestinterop>`;

    const warnings: string[] = [];

    // Act
    const decoded = decodeAssessment(xml, 'a.xml', message => warnings.push(message));

    // Assert
    expect(decoded.questions.map(q => [q.number, q.stem, q.type])).toEqual([[1, 'Second', 'multiple_choice']]);
    expect(warnings).toEqual(['a.xml: item x has no question text and was skipped']);
  });

  it('should keep plain-text answers exactly as written', () => {
    // Arrange
    const question: Question = {
      number: 1,
      stem: 'Which is true when x < y?',
      type: 'multiple_choice',
      answers: [
        { text: 'x < y > z', correct: true },
        { text: 'a &amp; b', correct: false },
        { text: '<b>not bold</b>', correct: false },
      ],
      points: 1,
    };
    const xml = encodeAssessment({ identifier: 'q3', title: 'Symbols', placement: 'inline', questions: [question] });

    // Act
    const decoded = decodeAssessment(xml, 'q3.xml');

    // Assert
    expect(decoded.questions).toEqual([question]);
  });

  it('should refuse documents with neither root', () => {
    expect(() => decodeAssessment('<questestinterop/>', 'empty.xml')).toThrow(
      'empty.xml has neither an assessment nor an objectbank'
    );
  });

  it('should map platform and CC profile type names', () => {
    expect(mapQuestionType('multiple_answers_question')).toBe('multiple_answers');
    expect(mapQuestionType('cc.multiple_response.v0p1')).toBe('multiple_answers');
    expect(mapQuestionType('cc.fib.v0p1')).toBe('short_answer');
    expect(mapQuestionType('cc.multiple_choice.v0p1')).toBe('multiple_choice');
    expect(mapQuestionType('fill_in_multiple_blanks_question')).toBe('short_answer');
    expect(mapQuestionType('cc.essay.v0p1')).toBe('essay');
  });
});
