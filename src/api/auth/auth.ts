import { Request } from 'express';
import bcrypt from 'bcrypt';
import jwt from 'jsonwebtoken';
import type { BudgetConfig } from '../../utils/config/config';
import { err, warn } from '../../utils/log';
import { getBody } from '../../utils/net/request';
import { isRecord } from '../../utils/net/validate';

export const INVALID_TOKEN = 'INVALID';
const TOKEN_LIFETIME = '30d';
const USER_ID = 1;

/**
 * Verifies a token signed with the configured secret.
 * @returns The user id it carries, or false when the token is missing or invalid
 */
export function isTokenValid(token: string | undefined, secret: string): number | false {
  if (!token || !secret) {
    return false;
  }
  try {
    const decoded = jwt.verify(token, secret);
    return typeof decoded === 'object' && typeof decoded.userId === 'number' ? decoded.userId : false;
  } catch {
    return false;
  }
}

/**
 * Exchanges the budget password for a token. The password is checked with bcrypt against
 * `BUDGET_PASSWORD_HASH`; a wrong password answers with the token `INVALID`.
 */
export async function createToken(request: Request, config: BudgetConfig): Promise<{ token: string }> {
  const body = getBody(request);
  const password = isRecord(body) && typeof body.password === 'string' ? body.password : '';
  if (!config.passwordHash || !config.jwtSecret) {
    warn('Token requested but no password hash or JWT secret is configured');
    return { token: INVALID_TOKEN };
  }

  try {
    if (!(await bcrypt.compare(password, config.passwordHash))) {
      return { token: INVALID_TOKEN };
    }
  } catch (e) {
    err('Password check failed', { error: e instanceof Error ? e.message : String(e) });
    return { token: INVALID_TOKEN };
  }
  return { token: jwt.sign({ userId: USER_ID }, config.jwtSecret, { expiresIn: TOKEN_LIFETIME }) };
}
