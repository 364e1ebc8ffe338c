/**
 * QTI 1.2 encoding and decoding for quizzes and question banks
 *
 * Quizzes are written as `<assessment>` documents, banks as `<objectbank>`.
 * Question stems and answers are plain text; the description travels as
 * HTML in `<objectives>`.
 */

import { Answer, Question, QuestionType } from '../models/content.model';
import {
  XML_NAMESPACES,
  childElements,
  findAll,
  findFirst,
  firstChild,
  isElement,
  parseXml,
  textOf,
} from '../parsers/xml-query';
import { escapeHtml, stripHtmlTags } from '../utils/text-formatters';

import { PLACEMENT_FIELD, Placement, QTI_NAMESPACE, XML_DECLARATION } from './package-layout';
import { element, emptyElement, textElement } from './xml-writer';

const QTI = XML_NAMESPACES.qti;

/** Platform names of question types */
export const QUESTION_TYPE_NAMES: Record<QuestionType, string> = {
  multiple_choice: 'multiple_choice_question',
  multiple_answers: 'multiple_answers_question',
  true_false: 'true_false_question',
  short_answer: 'short_answer_question',
  essay: 'essay_question',
  file_upload: 'file_upload_question',
};

/** A random draw from a bank, by bank identifier */
export interface EncodedQuestionGroup {
  bankId: string;
  title: string;
  pick: number;
  pointsPerQuestion: number;
}

export interface AssessmentDocument {
  identifier: string;
  title: string;
  placement: Placement;
  descriptionHtml?: string;
  questions: Question[];
  groups?: EncodedQuestionGroup[];
  metadata?: Record<string, string | number | undefined>;
}

export interface DecodedQuestionGroup {
  bankId?: string;
  title: string;
  pick: number;
  pointsPerQuestion: number;
}

export interface DecodedAssessment {
  /** `bank` when the document is an `<objectbank>` */
  structure: 'assessment' | 'bank';
  identifier: string;
  title: string;
  metadata: Record<string, string>;
  descriptionHtml: string;
  questions: Question[];
  groups: DecodedQuestionGroup[];
}

function metadataField(label: string, value: string | number): string {
  return element('qtimetadatafield', {}, [textElement('fieldlabel', label), textElement('fieldentry', value)]);
}

function metadataBlock(fields: Record<string, string | number | undefined>): string {
  const entries = Object.entries(fields).filter(
    (entry): entry is [string, string | number] => entry[1] !== undefined
  );
  return element('qtimetadata', {}, entries.map(([label, value]) => metadataField(label, value)));
}

function material(text: string, texttype: 'text/html' | 'text/plain'): string {
  return element('material', {}, [textElement('mattext', text, { texttype })]);
}

function correctCondition(conditions: string[]): string {
  return element('respcondition', { continue: 'No' }, [
    element('conditionvar', {}, conditions),
    textElement('setvar', 100, { action: 'Set', varname: 'SCORE' }),
  ]);
}

function encodeChoiceItem(question: Question, ident: string): string[] {
  const labelIds = question.answers.map((_, i) => `${ident}_a${i + 1}`);
  const cardinality = question.type === 'multiple_answers' ? 'Multiple' : 'Single';
  const presentation = element('response_lid', { ident: 'response1', rcardinality: cardinality }, [
    element(
      'render_choice',
      {},
      question.answers.map((answer, i) =>
        element('response_label', { ident: labelIds[i] }, [material(answer.text, 'text/plain')])
      )
    ),
  ]);

  const varequal = (id: string): string => textElement('varequal', id, { respident: 'response1' }) ?? '';
  let condition: string;
  if (question.type === 'multiple_answers') {
    condition = correctCondition([
      element(
        'and',
        {},
        question.answers.map((answer, i) =>
          answer.correct ? varequal(labelIds[i]) : element('not', {}, [varequal(labelIds[i])])
        )
      ),
    ]);
  } else {
    const correct = question.answers.findIndex(answer => answer.correct);
    condition = correct >= 0 ? correctCondition([varequal(labelIds[correct])]) : '';
  }
  return [presentation, condition];
}

function encodeItem(question: Question, ident: string): string {
  const stem = material(`<div><p>${escapeHtml(question.stem)}</p></div>`, 'text/html');
  let response: string | undefined;
  let processing: string | undefined;

  switch (question.type) {
    case 'multiple_choice':
    case 'multiple_answers':
    case 'true_false': {
      const [presentation, condition] = encodeChoiceItem(question, ident);
      response = presentation;
      processing = condition;
      break;
    }
    case 'short_answer':
      response = element('response_str', { ident: 'response1', rcardinality: 'Single' }, [
        element('render_fib', {}, [emptyElement('response_label', { ident: 'answer1', rshuffle: 'No' })]),
      ]);
      processing = correctCondition(
        question.answers.map(answer => textElement('varequal', answer.text, { respident: 'response1' }) ?? '')
      );
      break;
    case 'essay':
      response = element('response_str', { ident: 'response1', rcardinality: 'Single' }, [
        element('render_fib', {}, [emptyElement('response_label', { ident: 'answer1', rshuffle: 'No' })]),
      ]);
      break;
    case 'file_upload':
      break;
  }

  return element('item', { ident, title: `Question ${question.number}` }, [
    element('itemmetadata', {}, [
      metadataBlock({ question_type: QUESTION_TYPE_NAMES[question.type], points_possible: question.points }),
    ]),
    element('presentation', {}, [stem, response]),
    processing
      ? element('resprocessing', {}, [
          element('outcomes', {}, [
            emptyElement('decvar', { maxvalue: 100, minvalue: 0, varname: 'SCORE', vartype: 'Decimal' }),
          ]),
          processing,
        ])
      : undefined,
  ]);
}

function encodeGroup(group: EncodedQuestionGroup, index: number): string {
  return element('section', { ident: `group_${index + 1}`, title: group.title }, [
    element('selection_ordering', {}, [
      element('selection', {}, [
        textElement('sourcebank_ref', group.bankId),
        textElement('selection_number', group.pick),
        element('selection_extension', {}, [textElement('points_per_item', group.pointsPerQuestion)]),
      ]),
    ]),
  ]);
}

/**
 * Encode a quiz (`assessment`) or bank (`objectbank`) document.
 */
export function encodeAssessment(doc: AssessmentDocument): string {
  const items = doc.questions.map((q, i) => encodeItem(q, `${doc.identifier}_q${i + 1}`));
  const metadata = metadataBlock({ ...doc.metadata, [PLACEMENT_FIELD]: doc.placement });

  let body: string;
  if (doc.placement === 'bank') {
    body = element('objectbank', { ident: doc.identifier }, [
      metadataBlock({ bank_title: doc.title, [PLACEMENT_FIELD]: doc.placement }),
      ...items,
    ]);
  } else {
    body = element('assessment', { ident: doc.identifier, title: doc.title }, [
      metadata,
      doc.descriptionHtml ? element('objectives', {}, [material(doc.descriptionHtml, 'text/html')]) : undefined,
      element('section', { ident: 'root_section' }, [...(doc.groups ?? []).map(encodeGroup), ...items]),
    ]);
  }

  return `${XML_DECLARATION}\n${element('questestinterop', { xmlns: QTI_NAMESPACE }, [body])}\n`;
}

function readMetadata(container: Element): Record<string, string> {
  const fields: Record<string, string> = {};
  const block = firstChild(container, 'qtimetadata');
  if (!block) {
    return fields;
  }
  for (const field of childElements(block, 'qtimetadatafield')) {
    const label = textOf(firstChild(field, 'fieldlabel'));
    if (label) {
      fields[label] = textOf(firstChild(field, 'fieldentry'));
    }
  }
  return fields;
}

/** Question type from a platform name or a CC profile such as `cc.multiple_choice.v0p1` */
export function mapQuestionType(name: string): QuestionType {
  const lower = name.toLowerCase();
  if (lower.includes('multiple_answer') || lower.includes('multiple_response')) return 'multiple_answers';
  if (lower.includes('true_false')) return 'true_false';
  if (lower.includes('short_answer') || lower.includes('fill_in') || lower.includes('.fib.')) return 'short_answer';
  if (lower.includes('essay')) return 'essay';
  if (lower.includes('file_upload')) return 'file_upload';
  return 'multiple_choice';
}

function hasAncestor(el: Element, localName: string, stop: Element): boolean {
  for (let node = el.parentNode; node && node !== stop; node = node.parentNode) {
    if (isElement(node) && node.localName === localName) {
      return true;
    }
  }
  return false;
}

/** Ids a full-score condition accepts, ignoring negated ones */
function correctIds(item: Element): Set<string> {
  const ids = new Set<string>();
  for (const condition of findAll(item, 'respcondition', QTI)) {
    const score = textOf(findFirst(condition, 'setvar', QTI));
    if (Number(score) < 100) {
      continue;
    }
    for (const varequal of findAll(condition, 'varequal', QTI)) {
      if (!hasAncestor(varequal, 'not', condition)) {
        ids.add(textOf(varequal));
      }
    }
  }
  return ids;
}

/** Text of a `mattext`: plain text as written, anything else with its markup removed */
function mattextContent(mattext: Element | undefined): string {
  if (mattext?.getAttribute('texttype') === 'text/plain') {
    return textOf(mattext);
  }
  return stripHtmlTags(textOf(mattext));
}

/** Receives a message for each item the decoder drops */
export type DecodeWarning = (message: string) => void;

function decodeItem(item: Element, number: number, sourceName: string, warn: DecodeWarning): Question | undefined {
  const itemmetadata = firstChild(item, 'itemmetadata');
  const metadata = itemmetadata ? readMetadata(itemmetadata) : {};
  const typeName = metadata.question_type ?? metadata.cc_profile ?? '';
  const type = mapQuestionType(typeName);

  const presentation = findFirst(item, 'presentation', QTI);
  const stemText = presentation ? findFirst(presentation, 'mattext', QTI) : undefined;
  const stem = mattextContent(stemText);
  if (!stem) {
    warn(`${sourceName}: item ${item.getAttribute('ident') || number} has no question text and was skipped`);
    return undefined;
  }

  const pointsText = metadata.points_possible ?? metadata.cc_weighting;
  const points = pointsText !== undefined && Number.isFinite(Number(pointsText)) ? Number(pointsText) : 1;

  let answers: Answer[] = [];
  if (type === 'short_answer') {
    answers = Array.from(correctIds(item)).map(text => ({ text, correct: true }));
  } else if (type !== 'essay' && type !== 'file_upload') {
    const correct = correctIds(item);
    answers = findAll(item, 'response_label', QTI).flatMap(label => {
      const text = mattextContent(findFirst(label, 'mattext', QTI));
      return text ? [{ text, correct: correct.has(label.getAttribute('ident') ?? '') }] : [];
    });
  }

  return { number, stem, type, answers, points };
}

function decodeGroups(section: Element): DecodedQuestionGroup[] {
  return childElements(section, 'section').flatMap(group => {
    const selection = findFirst(group, 'selection', QTI);
    if (!selection) {
      return [];
    }
    const pick = Number(textOf(firstChild(selection, 'selection_number')));
    const perItem = Number(textOf(findFirst(selection, 'points_per_item', QTI)));
    return [
      {
        bankId: textOf(firstChild(selection, 'sourcebank_ref')) || undefined,
        title: group.getAttribute('title') ?? '',
        pick: Number.isFinite(pick) && pick > 0 ? pick : 1,
        pointsPerQuestion: Number.isFinite(perItem) && perItem > 0 ? perItem : 1,
      },
    ];
  });
}

/**
 * Decode an assessment or object bank document. Throws on malformed XML
 * or when neither root is present.
 */
export function decodeAssessment(
  xml: string,
  sourceName: string,
  warn: DecodeWarning = () => undefined
): DecodedAssessment {
  const doc = parseXml(xml, sourceName);
  const bank = findFirst(doc, 'objectbank', QTI);
  const assessment = findFirst(doc, 'assessment', QTI);
  const root = assessment ?? bank;
  if (!root) {
    throw new Error(`${sourceName} has neither an assessment nor an objectbank`);
  }

  const metadata = readMetadata(root);
  const items = findAll(root, 'item', QTI);
  const questions = items
    .map((item, i) => decodeItem(item, i + 1, sourceName, warn))
    .filter((q): q is Question => q !== undefined)
    .map((q, i) => ({ ...q, number: i + 1 }));

  const objectives = firstChild(root, 'objectives');
  const section = firstChild(root, 'section');

  return {
    structure: assessment ? 'assessment' : 'bank',
    identifier: root.getAttribute('ident') ?? '',
    title: root.getAttribute('title') || metadata.bank_title || '',
    metadata,
    descriptionHtml: objectives ? textOf(findFirst(objectives, 'mattext', QTI)) : '',
    questions,
    groups: section ? decodeGroups(section) : [],
  };
}
