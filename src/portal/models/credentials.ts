import { ValidationError } from '../../shared/errors.js';
import { IssueCollector, type ValidationResult } from './validation.js';

export interface CredentialsInput {
  login: string;
  password: string;
  rememberMe?: boolean;
}

/** Sign-in credentials; only lives for the duration of one authenticate call */
export interface Credentials {
  readonly login: string;
  readonly password: string;
  readonly rememberMe: boolean;
}

export function validateCredentials(input: CredentialsInput): ValidationResult<Credentials> {
  const issues = new IssueCollector();

  const login = issues.requiredText('login', input.login);
  // passwords are sent as typed, so only emptiness is checked
  if (!input.password) {
    issues.add('password', 'must not be empty');
  }

  return issues.result<Credentials>({
    login,
    password: input.password,
    rememberMe: input.rememberMe ?? false
  });
}

/**
 * @throws ValidationError when the login is blank or the password empty
 */
export function createCredentials(input: CredentialsInput): Credentials {
  const result = validateCredentials(input);
  if (!result.ok) {
    throw new ValidationError(result.issues);
  }
  return Object.freeze(result.value);
}
