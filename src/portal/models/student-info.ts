/**
 * Student profile record
 *
 * Built from the label/value pairs of the profile page. Construction
 * validates every field at once and yields a frozen record.
 */

import { ValidationError } from '../../shared/errors.js';
import { IssueCollector, type ValidationResult } from './validation.js';

export const REQUIRED_PROFILE_FIELDS = [
  'fullName',
  'recordBookNumber',
  'studyForm',
  'preparationLevel',
  'specialty',
  'faculty',
  'course',
  'group',
  'financingForm',
  'dormitory',
  'endDate'
] as const;

export const OPTIONAL_PROFILE_FIELDS = [
  'specialization',
  'personalEmail',
  'personalPhone',
  'corporateEmail'
] as const;

export type RequiredProfileField = typeof REQUIRED_PROFILE_FIELDS[number];
export type OptionalProfileField = typeof OPTIONAL_PROFILE_FIELDS[number];
export type ProfileField = RequiredProfileField | OptionalProfileField;

export type ProfileRecord = Readonly<
  Record<RequiredProfileField, string> & Record<OptionalProfileField, string | null>
>;

/** Raw values as scraped; anything may be missing */
export type ProfileRecordInput = Partial<Record<ProfileField, string | null>>;

export function validateProfileRecord(input: ProfileRecordInput): ValidationResult<ProfileRecord> {
  const issues = new IssueCollector();

  return issues.result<ProfileRecord>({
    fullName: issues.requiredText('fullName', input.fullName),
    recordBookNumber: issues.requiredText('recordBookNumber', input.recordBookNumber),
    studyForm: issues.requiredText('studyForm', input.studyForm),
    preparationLevel: issues.requiredText('preparationLevel', input.preparationLevel),
    specialization: issues.optionalText(input.specialization),
    specialty: issues.requiredText('specialty', input.specialty),
    faculty: issues.requiredText('faculty', input.faculty),
    course: issues.requiredText('course', input.course),
    group: issues.requiredText('group', input.group),
    financingForm: issues.requiredText('financingForm', input.financingForm),
    dormitory: issues.requiredText('dormitory', input.dormitory),
    endDate: issues.requiredText('endDate', input.endDate),
    personalEmail: issues.optionalEmail('personalEmail', input.personalEmail),
    personalPhone: issues.optionalText(input.personalPhone),
    corporateEmail: issues.optionalEmail('corporateEmail', input.corporateEmail)
  });
}

/**
 * @throws ValidationError listing every field that failed
 */
export function createProfileRecord(input: ProfileRecordInput): ProfileRecord {
  const result = validateProfileRecord(input);
  if (!result.ok) {
    throw new ValidationError(result.issues);
  }
  return Object.freeze(result.value);
}
