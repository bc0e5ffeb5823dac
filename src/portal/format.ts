/**
 * Human-readable and JSON rendering of a profile record.
 */

import type { ProfileRecord } from './models/student-info.js';

export type OutputFormat = 'text' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'text' || value === 'json';
}

const SEPARATOR = '='.repeat(50);

/**
 * Labelled lines; optional fields appear only when present.
 */
export function formatStudentInfoText(info: ProfileRecord): string {
  const lines: string[] = [
    SEPARATOR,
    'ИНФОРМАЦИЯ О СТУДЕНТЕ',
    SEPARATOR,
    `ФИО: ${info.fullName}`,
    `Номер зачетки: ${info.recordBookNumber}`,
    `Форма обучения: ${info.studyForm}`,
    `Уровень подготовки: ${info.preparationLevel}`
  ];

  if (info.specialization) {
    lines.push(`Специализация: ${info.specialization}`);
  }

  lines.push(
    `Специальность: ${info.specialty}`,
    `Факультет: ${info.faculty}`,
    `Курс: ${info.course}`,
    `Группа: ${info.group}`,
    `Форма финансирования: ${info.financingForm}`,
    `Общежитие: ${info.dormitory}`,
    `Дата окончания: ${info.endDate}`
  );

  if (info.personalEmail) {
    lines.push(`Личная почта: ${info.personalEmail}`);
  }
  if (info.personalPhone) {
    lines.push(`Личный телефон: ${info.personalPhone}`);
  }
  if (info.corporateEmail) {
    lines.push(`Корпоративная почта: ${info.corporateEmail}`);
  }

  lines.push(SEPARATOR);
  return lines.join('\n');
}

export function formatStudentInfoJson(info: ProfileRecord): string {
  return JSON.stringify(info, null, 2);
}

export function formatStudentInfo(info: ProfileRecord, format: OutputFormat): string {
  return format === 'json' ? formatStudentInfoJson(info) : formatStudentInfoText(info);
}
