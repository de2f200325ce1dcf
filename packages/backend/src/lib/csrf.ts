import { createHmac, randomBytes, timingSafeEqual } from 'crypto';

export const CSRF_TOKEN_TTL_MS = 60 * 60 * 1000;

export function generateSessionId(): string {
  return randomBytes(24).toString('base64url');
}

function sign(secret: string, sessionId: string, issuedAt: number): string {
  return createHmac('sha256', secret).update(`${sessionId}.${issuedAt}`).digest('base64url');
}

/**
 * Issue a token bound to `sessionId`.
 * Format: `<issuedAt ms>.<base64url HMAC-SHA256(secret, "sessionId.issuedAt")>`
 */
export function createCsrfToken(secret: string, sessionId: string, now: number = Date.now()): string {
  return `${now}.${sign(secret, sessionId, now)}`;
}

export function verifyCsrfToken(
  secret: string,
  sessionId: string,
  token: string,
  now: number = Date.now(),
): boolean {
  const parts = token.split('.');
  if (parts.length !== 2) return false;

  const [issuedAtRaw, signature] = parts;
  if (!/^\d+$/.test(issuedAtRaw)) return false;
  const issuedAt = Number(issuedAtRaw);
  if (!Number.isSafeInteger(issuedAt) || issuedAt > now || now - issuedAt > CSRF_TOKEN_TTL_MS) {
    return false;
  }

  const expected = Buffer.from(sign(secret, sessionId, issuedAt));
  const actual = Buffer.from(signature);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}
