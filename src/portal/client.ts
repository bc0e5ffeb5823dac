/**
 * MisisClient - Session Client
 *
 * The recommended way to talk to the MISIS personal account.
 *
 * ## Session states
 *
 * - **Unauthenticated** - initial state; `getStudentInfo()` throws `SessionExpiredError`
 * - **Authenticated** - after a successful `authenticate()`
 * - back to **Unauthenticated** when a profile request lands on the sign-in page
 *
 * There is no automatic re-login: call `authenticate()` again, which always
 * starts over with a fresh token.
 *
 * ## Resources
 *
 * The client owns one HTTP transport (cookie jar), created on first use or
 * by `open()` and released by `close()`. Use {@link withMisisClient} to make
 * sure `close()` runs.
 *
 * @example
 * ```typescript
 * import { withMisisClient } from 'misis-id';
 *
 * const info = await withMisisClient({}, async client => {
 *   await client.authenticate('student_login', 'student_password');
 *   return client.getStudentInfo();
 * });
 * console.log(info.fullName);
 * ```
 *
 * @see {@link MisisAuth} - Sign-in flow
 * @see {@link parseProfile} - Profile page parser
 */

import { SessionExpiredError, toPortalError } from '../shared/errors.js';
import { CookieFetch, createCookieFetch, type FetchLike } from '../shared/utils/http-client.js';
import { createLogger, type Logger } from '../shared/utils/logger.js';
import { MisisAuth } from './auth/misis-auth.js';
import { parseProfile } from './http/profile-parser.js';
import type { Session } from './models/session.js';
import type { ProfileRecord } from './models/student-info.js';
import { MISIS_CONFIG, MISIS_URLS, type MisisClientConfig } from './types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface MisisClientOptions extends MisisClientConfig {
  /** Logger handle (default: warn-level logger) */
  logger?: Logger;
  /**
   * Existing transport to use. The client never closes a transport it did
   * not create.
   */
  http?: CookieFetch;
  /** fetch implementation for the transport the client creates */
  fetch?: FetchLike;
  /** Sleep between retry attempts for the transport the client creates */
  sleep?: (ms: number) => Promise<void>;
}

export interface AuthenticateOptions {
  rememberMe?: boolean;
}

// ============================================================================
// MisisClient
// ============================================================================

export class MisisClient {
  private options: MisisClientOptions;
  private baseUrl: string;
  private logger: Logger;
  private http: CookieFetch | null;
  private readonly ownsHttp: boolean;
  private sessionInfo: Session | null = null;

  constructor(options: MisisClientOptions = {}) {
    this.options = options;
    this.baseUrl = options.baseUrl ?? MISIS_URLS.BASE;
    this.logger = options.logger ?? createLogger('MisisClient');
    this.http = options.http ?? null;
    this.ownsHttp = options.http === undefined;
  }

  /**
   * Acquire the transport now instead of on first request
   */
  open(): this {
    this.getHttp();
    return this;
  }

  /**
   * Drop the session and release the transport
   */
  async close(): Promise<void> {
    this.sessionInfo = null;

    if (this.http && this.ownsHttp) {
      await this.http.clearCookies();
      this.http = null;
      this.logger.debug('Transport released');
    }
  }

  /**
   * Sign in; any previous session is discarded first.
   *
   * @throws ValidationError / AuthenticationError / NetworkError / ParseError
   */
  async authenticate(login: string, password: string, options: AuthenticateOptions = {}): Promise<Readonly<Session>> {
    this.sessionInfo = null;

    const auth = new MisisAuth(this.getHttp(), {
      baseUrl: this.baseUrl,
      logger: this.logger.child('MisisAuth')
    });

    this.sessionInfo = await auth.authenticate({ login, password, rememberMe: options.rememberMe });
    return snapshot(this.sessionInfo);
  }

  /**
   * Fetch and parse the student's profile page.
   *
   * @throws SessionExpiredError when not authenticated or the portal ended the session
   * @throws NetworkError / ParseError / ValidationError
   */
  async getStudentInfo(): Promise<ProfileRecord> {
    const session = this.sessionInfo;
    if (!session || !session.authenticated) {
      throw new SessionExpiredError('Authentication required');
    }

    try {
      const profileUrl = new URL(MISIS_URLS.profilePath(session.accountId), this.baseUrl).toString();
      const response = await this.getHttp().request('GET', profileUrl);

      if (response.url.includes(MISIS_CONFIG.SIGN_IN_MARKER)) {
        session.authenticated = false;
        this.logger.warn('Profile request redirected to sign-in, session expired');
        throw new SessionExpiredError();
      }

      const info = parseProfile(response.body);
      this.logger.info(`Student info received: ${info.fullName}`);
      return info;

    } catch (error: unknown) {
      throw toPortalError(
        error,
        'parse',
        ['session_expired', 'network', 'parse', 'validation'],
        'Failed to get student info'
      );
    }
  }

  get isAuthenticated(): boolean {
    return this.sessionInfo !== null && this.sessionInfo.authenticated;
  }

  /** Frozen copy; the client alone moves a session between states */
  get session(): Readonly<Session> | null {
    return this.sessionInfo ? snapshot(this.sessionInfo) : null;
  }

  private getHttp(): CookieFetch {
    if (!this.http) {
      this.http = createCookieFetch({
        timeout: this.options.timeout,
        maxRetries: this.options.maxRetries,
        backoffBaseMs: this.options.backoffBaseMs,
        logger: this.logger.child('HTTP'),
        fetch: this.options.fetch,
        sleep: this.options.sleep
      });
      this.logger.debug('Transport acquired');
    }
    return this.http;
  }
}

function snapshot(session: Session): Readonly<Session> {
  return Object.freeze({ ...session });
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a new MisisClient instance
 */
export function createMisisClient(options?: MisisClientOptions): MisisClient {
  return new MisisClient(options);
}

/**
 * Run `fn` with a fresh client and close it afterwards, even on error.
 */
export async function withMisisClient<T>(
  options: MisisClientOptions,
  fn: (client: MisisClient) => Promise<T>
): Promise<T> {
  const client = createMisisClient(options).open();
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
