import { ValidationError } from '../../shared/errors.js';
import { IssueCollector } from './validation.js';

/**
 * Authenticated access to one account.
 *
 * `authenticated` is the only mutable part: the client flips it to false
 * when the portal bounces a request back to the sign-in page.
 */
export interface Session {
  readonly accountId: string;
  readonly csrfToken: string;
  authenticated: boolean;
}

/**
 * @throws ValidationError when the account id or token is blank
 */
export function createSession(accountId: string, csrfToken: string): Session {
  const issues = new IssueCollector();
  const id = issues.requiredText('accountId', accountId);
  const token = issues.requiredText('csrfToken', csrfToken);

  const result = issues.result<Session>({ accountId: id, csrfToken: token, authenticated: true });
  if (!result.ok) {
    throw new ValidationError(result.issues);
  }
  return result.value;
}
