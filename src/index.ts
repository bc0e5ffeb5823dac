/**
 * MISIS ID - client for the MISIS student personal account
 *
 * Signs in to https://lk.misis.ru over plain HTTP and reads the student's
 * profile into a validated record.
 *
 * @example
 * ```typescript
 * import { createMisisClient } from 'misis-id';
 *
 * const client = createMisisClient();
 * try {
 *   await client.authenticate('student_login', 'student_password');
 *   const info = await client.getStudentInfo();
 *   console.log(info.fullName, info.group);
 * } finally {
 *   await client.close();
 * }
 * ```
 */

// ============================================================================
// Portal client
// ============================================================================

// Main client (recommended)
export {
  MisisClient,
  createMisisClient,
  withMisisClient,
  type MisisClientOptions,
  type AuthenticateOptions,
} from './portal/client.js';

// Advanced: sign-in flow and page parsers
export { MisisAuth, parseAccountLocation, type MisisAuthConfig } from './portal/auth/misis-auth.js';
export { extractToken } from './portal/http/token-extractor.js';
export { parseProfile, extractProfileFields, PROFILE_LABELS } from './portal/http/profile-parser.js';

// Models
export {
  createProfileRecord,
  validateProfileRecord,
  REQUIRED_PROFILE_FIELDS,
  OPTIONAL_PROFILE_FIELDS,
} from './portal/models/student-info.js';
export { createCredentials, validateCredentials } from './portal/models/credentials.js';
export { createSession } from './portal/models/session.js';
export type { ValidationResult } from './portal/models/validation.js';

export type {
  Credentials,
  CredentialsInput,
  Session,
  ProfileRecord,
  ProfileRecordInput,
  ProfileField,
  RequiredProfileField,
  OptionalProfileField,
  MisisClientConfig,
} from './portal/types/index.js';

export { MISIS_URLS, MISIS_CONFIG } from './portal/types/index.js';

// Output
export {
  formatStudentInfo,
  formatStudentInfoText,
  formatStudentInfoJson,
  type OutputFormat,
} from './portal/format.js';

// ============================================================================
// Shared infrastructure (advanced)
// ============================================================================

export {
  PortalError,
  NetworkError,
  AuthenticationError,
  ParseError,
  SessionExpiredError,
  ValidationError,
  isPortalError,
  toPortalError,
  settle,
  type PortalErrorKind,
  type PortalResult,
  type ValidationIssue,
} from './shared/errors.js';

export {
  CookieFetch,
  createCookieFetch,
  type HttpClientConfig,
  type HttpResponse,
  type RequestOptions,
  type FetchLike,
} from './shared/utils/http-client.js';

export {
  Logger,
  createLogger,
  redactSensitive,
  truncateForLog,
  type LogLevel,
  type LoggerConfig,
  type LogSink,
} from './shared/utils/logger.js';

export { loadConfig, loadEnv, type AppConfig } from './shared/config.js';
