/**
 * Anti-forgery token extraction for the sign-in form.
 */

import * as cheerio from 'cheerio';
import { ParseError } from '../../shared/errors.js';
import { MISIS_CONFIG } from '../types/index.js';

/**
 * Read the CSRF token from `<meta name="csrf-token" content="...">`.
 *
 * @returns The token exactly as it appears in the page
 * @throws ParseError when the tag is missing or its content is blank
 *
 * @example
 * ```typescript
 * const html = await http.getHtml('https://lk.misis.ru/ru/users/sign_in');
 * const token = extractToken(html);
 * ```
 */
export function extractToken(html: string): string {
  const $ = cheerio.load(html);
  const meta = $(`meta[name="${MISIS_CONFIG.CSRF_META_NAME}"]`).first();

  if (meta.length === 0) {
    throw new ParseError('CSRF token not found on the page');
  }

  const token = meta.attr('content');
  if (!token || !token.trim()) {
    throw new ParseError('CSRF token is empty');
  }

  return token;
}
