/**
 * Field validators used by the portal models.
 *
 * Each validator checks one raw value and either returns the normalized
 * value or records an issue; models collect every issue before deciding.
 */

import type { ValidationIssue } from '../../shared/errors.js';

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; issues: ValidationIssue[] };

export class IssueCollector {
  readonly issues: ValidationIssue[] = [];

  add(field: string, message: string): void {
    this.issues.push({ field, message });
  }

  /** Trimmed value, or an issue when missing or blank */
  requiredText(field: string, value: string | null | undefined): string {
    const trimmed = value?.trim() ?? '';
    if (!trimmed) {
      this.add(field, 'must not be empty');
    }
    return trimmed;
  }

  /** Trimmed value; blank or missing becomes null */
  optionalText(value: string | null | undefined): string | null {
    const trimmed = value?.trim() ?? '';
    return trimmed || null;
  }

  /** Like {@link optionalText}, and a present value must contain "@" */
  optionalEmail(field: string, value: string | null | undefined): string | null {
    const email = this.optionalText(value);
    if (email !== null && !email.includes('@')) {
      this.add(field, 'invalid email format');
    }
    return email;
  }

  result<T>(value: T): ValidationResult<T> {
    return this.issues.length === 0
      ? { ok: true, value }
      : { ok: false, issues: [...this.issues] };
  }
}
