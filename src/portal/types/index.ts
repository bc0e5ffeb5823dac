// Centralized types and constants for the MISIS portal

export type { Credentials, CredentialsInput } from '../models/credentials.js';
export type { Session } from '../models/session.js';
export type {
  ProfileRecord,
  ProfileRecordInput,
  RequiredProfileField,
  OptionalProfileField,
  ProfileField
} from '../models/student-info.js';

// MISIS URLs and constants
export const MISIS_URLS = {
  BASE: 'https://lk.misis.ru',
  SIGN_IN_PATH: '/ru/users/sign_in',
  /** Profile page path for an account id */
  profilePath: (accountId: string): string => `/ru/${encodeURIComponent(accountId)}/profile`
};

/** Statuses accepted from the sign-in POST; 200 has not been observed in practice */
const ACCEPTED_SIGN_IN_STATUSES: readonly number[] = [302, 200];

export const MISIS_CONFIG = {
  /** Path fragment that marks the sign-in page in any URL */
  SIGN_IN_MARKER: 'sign_in',
  /** Prefix of every localized portal path; the account id follows it */
  LOCALE_PREFIX: '/ru/',
  /** Student account ids start with this marker */
  ACCOUNT_MARKER: 's',
  /** Shown on a rejected sign-in that still answers with a normal page */
  FAILURE_PHRASE: 'Неверный логин или пароль',
  CSRF_META_NAME: 'csrf-token',
  CSRF_FORM_FIELD: 'authenticity_token',
  COMMIT_LABEL: 'Войти',
  UTF8_MARK: '✓',
  ACCEPTED_SIGN_IN_STATUSES
} as const;

export interface MisisClientConfig {
  /** Portal base URL (default: https://lk.misis.ru) */
  baseUrl?: string;
  /** Request timeout in ms (default: 30000) */
  timeout?: number;
  /** Total attempts per request (default: 3) */
  maxRetries?: number;
  /** Backoff unit in ms (default: 1000) */
  backoffBaseMs?: number;
}
