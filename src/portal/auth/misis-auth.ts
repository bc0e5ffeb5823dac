/**
 * MISIS Sign-in
 *
 * Authentication flow:
 * 1. GET `/ru/users/sign_in` - load the form, read the CSRF meta token
 * 2. POST `/ru/users/sign_in` - submit login, password and token, no redirect following
 * 3. Inspect the redirect - `Location: /ru/s<...>/...` means success
 *
 * The account id from step 3 addresses every page of the personal account.
 */

import { AuthenticationError, toPortalError } from '../../shared/errors.js';
import type { CookieFetch } from '../../shared/utils/http-client.js';
import { createLogger, truncateForLog, type Logger } from '../../shared/utils/logger.js';
import { createCredentials, type CredentialsInput } from '../models/credentials.js';
import { createSession, type Session } from '../models/session.js';
import { extractToken } from '../http/token-extractor.js';
import { MISIS_CONFIG, MISIS_URLS } from '../types/index.js';

export interface MisisAuthConfig {
  /** Portal base URL (default: https://lk.misis.ru) */
  baseUrl?: string;
  logger?: Logger;
}

const INVALID_CREDENTIALS = 'Invalid login or password';

/**
 * Pull the account id out of a post-sign-in `Location` header.
 *
 * Accepts `/ru/<id>` and `/ru/<id>/<rest>`, absolute or relative, where the
 * id starts with the account marker. Nothing pointing back at the sign-in
 * page is accepted.
 *
 * @returns The account id, or null when the location is not an account page
 */
export function parseAccountLocation(location: string, baseUrl: string = MISIS_URLS.BASE): string | null {
  if (location.includes(MISIS_CONFIG.SIGN_IN_MARKER)) {
    return null;
  }

  let pathname: string;
  try {
    pathname = new URL(location, baseUrl).pathname;
  } catch {
    return null;
  }

  if (!pathname.startsWith(MISIS_CONFIG.LOCALE_PREFIX)) {
    return null;
  }

  const [accountId] = pathname.slice(MISIS_CONFIG.LOCALE_PREFIX.length).split('/');
  if (!accountId || !accountId.startsWith(MISIS_CONFIG.ACCOUNT_MARKER)) {
    return null;
  }

  return decodeURIComponent(accountId);
}

export class MisisAuth {
  private http: CookieFetch;
  private baseUrl: string;
  private logger: Logger;

  constructor(http: CookieFetch, config: MisisAuthConfig = {}) {
    this.http = http;
    this.baseUrl = config.baseUrl ?? MISIS_URLS.BASE;
    this.logger = config.logger ?? createLogger('MisisAuth');
  }

  get signInUrl(): string {
    return new URL(MISIS_URLS.SIGN_IN_PATH, this.baseUrl).toString();
  }

  /**
   * Sign in and build an authenticated session.
   *
   * @throws ValidationError for a blank login or empty password, before any request
   * @throws AuthenticationError when the portal rejects the credentials
   * @throws NetworkError / ParseError from the lower layers, unchanged
   */
  async authenticate(input: CredentialsInput): Promise<Session> {
    const credentials = createCredentials(input);

    try {
      this.logger.debug(`Step 1: loading sign-in page for ${truncateForLog(credentials.login)}`);
      const csrfToken = await this.fetchToken();

      this.logger.debug('Step 2: submitting credentials');
      const result = await this.http.postForm(
        this.signInUrl,
        {
          'user[login]': credentials.login,
          'user[password]': credentials.password,
          'user[remember_me]': credentials.rememberMe ? '1' : '0',
          'commit': MISIS_CONFIG.COMMIT_LABEL,
          'utf8': MISIS_CONFIG.UTF8_MARK,
          [MISIS_CONFIG.CSRF_FORM_FIELD]: csrfToken
        },
        { 'Referer': this.signInUrl }
      );

      this.logger.debug(`Step 3: response ${result.response.status}, location ${result.location ?? 'none'}`);

      const accountId = result.location ? parseAccountLocation(result.location, this.baseUrl) : null;
      if (accountId === null) {
        throw new AuthenticationError(INVALID_CREDENTIALS);
      }

      if (!MISIS_CONFIG.ACCEPTED_SIGN_IN_STATUSES.includes(result.response.status)) {
        throw new AuthenticationError(`Unexpected response status: ${result.response.status}`);
      }

      if (result.html.includes(MISIS_CONFIG.FAILURE_PHRASE)) {
        throw new AuthenticationError(INVALID_CREDENTIALS);
      }

      const session = createSession(accountId, csrfToken);
      this.logger.info(`Authenticated user ${truncateForLog(credentials.login)}`);
      return session;

    } catch (error: unknown) {
      throw toPortalError(
        error,
        'authentication',
        ['authentication', 'network', 'parse', 'validation'],
        'Authentication failed'
      );
    }
  }

  private async fetchToken(): Promise<string> {
    try {
      const html = await this.http.getHtml(this.signInUrl);
      this.logger.debug(`   Got sign-in page (${html.length} chars)`);
      return extractToken(html);
    } catch (error: unknown) {
      throw toPortalError(error, 'parse', ['network', 'parse'], 'Failed to obtain CSRF token');
    }
  }
}
