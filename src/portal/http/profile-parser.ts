/**
 * Profile Page Parser
 *
 * The profile page lists the student's data as pairs of spans:
 *
 * ```html
 * <div class="person_name"><h3>Иванов Иван Иванович</h3></div>
 * <span class="person__label">Курс:</span>
 * <span class="person__value">3</span>
 * ```
 */

import * as cheerio from 'cheerio';
import { ParseError, toPortalError } from '../../shared/errors.js';
import { Helpers } from '../../shared/utils/helpers.js';
import {
  createProfileRecord,
  REQUIRED_PROFILE_FIELDS,
  type ProfileField,
  type ProfileRecord,
  type ProfileRecordInput
} from '../models/student-info.js';

export type LabeledProfileField = Exclude<ProfileField, 'fullName'>;

/** Label caption for every field except the name, which has its own block */
export const PROFILE_LABELS: ReadonlyArray<readonly [LabeledProfileField, string]> = [
  ['recordBookNumber', 'Номер зачетки:'],
  ['studyForm', 'Форма обучения:'],
  ['preparationLevel', 'Уровень подготовки:'],
  ['specialization', 'Специализация:'],
  ['specialty', 'Специальность:'],
  ['faculty', 'Факультет:'],
  ['course', 'Курс:'],
  ['group', 'Группа:'],
  ['financingForm', 'Форма финансирования:'],
  ['dormitory', 'Общежитие:'],
  ['endDate', 'Дата окончания:'],
  ['personalEmail', 'Личная почта:'],
  ['personalPhone', 'Личный номер телефона:'],
  ['corporateEmail', 'Корпоративная почта:']
];

const SELECTORS = {
  NAME_BLOCK: 'div.person_name',
  NAME_HEADING: 'h3',
  LABEL: 'span.person__label',
  VALUE: 'span.person__value'
};

/**
 * Collect raw field values; a field is null when its markup is missing.
 */
export function extractProfileFields(html: string): ProfileRecordInput {
  const $ = cheerio.load(html);
  const fields: ProfileRecordInput = {};

  const nameBlock = $(SELECTORS.NAME_BLOCK).first();
  if (nameBlock.length > 0) {
    const heading = nameBlock.find(SELECTORS.NAME_HEADING).first();
    fields.fullName = heading.length > 0 ? Helpers.normalizeText(heading.text()) : '';
  } else {
    fields.fullName = null;
  }

  const labels = $(SELECTORS.LABEL);

  const extractValue = (caption: string): string | null => {
    const label = labels.filter((_, el) => $(el).text().includes(caption)).first();
    if (label.length === 0) return null;

    const value = label.nextAll(SELECTORS.VALUE).first();
    if (value.length === 0) return null;

    return Helpers.normalizeText(value.text());
  };

  for (const [field, caption] of PROFILE_LABELS) {
    fields[field] = extractValue(caption);
  }

  return fields;
}

/**
 * Parse the profile page into a validated record.
 *
 * @throws ParseError naming the first required field whose markup is missing
 * @throws ValidationError when a present value is rejected by the record
 */
export function parseProfile(html: string): ProfileRecord {
  try {
    const fields = extractProfileFields(html);

    for (const field of REQUIRED_PROFILE_FIELDS) {
      if (fields[field] === null || fields[field] === undefined) {
        throw new ParseError(`Required field '${field}' not found`, { field });
      }
    }

    return createProfileRecord(fields);
  } catch (error: unknown) {
    throw toPortalError(error, 'parse', ['parse', 'validation'], 'Failed to parse student profile');
  }
}
