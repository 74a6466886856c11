import { createHmac, randomBytes, timingSafeEqual } from 'node:crypto';
import { asNumber, asRecord, asString } from '../../common/utils/object.util';

export const UNSUBSCRIBE_TOKEN_TTL_DAYS = 365;
export const VERIFICATION_TOKEN_TTL_HOURS = 48;

export interface UnsubscribePayload {
  subscriberId: number;
  newsletterId: number;
  expiresAt: string;
}

function base64url(value: string): string {
  return Buffer.from(value, 'utf-8').toString('base64url');
}

function sign(secret: string, payload: string): string {
  return createHmac('sha256', secret).update(payload).digest('hex');
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

function decodePayload(
  token: string,
  secret: string,
  signatureLength?: number,
): Record<string, unknown> | null {
  if (!token) {
    return null;
  }
  const parts = token.split('.');
  if (parts.length !== 2) {
    return null;
  }
  const [payloadB64 = '', signature = ''] = parts;
  const full = sign(secret, payloadB64);
  const expected = signatureLength ? full.slice(0, signatureLength) : full;
  if (!safeEqual(signature, expected)) {
    return null;
  }

  let payload: Record<string, unknown> | null;
  try {
    const decoded: unknown = JSON.parse(
      Buffer.from(payloadB64, 'base64url').toString('utf-8'),
    );
    payload = asRecord(decoded);
  } catch {
    return null;
  }
  if (!payload) {
    return null;
  }

  const exp = new Date(asString(payload.exp));
  if (Number.isNaN(exp.getTime()) || exp.getTime() < Date.now()) {
    return null;
  }
  return payload;
}

/** `base64url(json).sig`, sig being the first 16 hex chars of the HMAC. */
export function generateUnsubscribeToken(
  secret: string,
  subscriberId: number,
  newsletterId: number,
  now: Date = new Date(),
): string {
  const exp = new Date(
    now.getTime() + UNSUBSCRIBE_TOKEN_TTL_DAYS * 24 * 3600 * 1000,
  );
  const payloadB64 = base64url(
    JSON.stringify({
      sub_id: subscriberId,
      news_id: newsletterId,
      exp: exp.toISOString(),
      nonce: randomBytes(8).toString('hex'),
    }),
  );
  return `${payloadB64}.${sign(secret, payloadB64).slice(0, 16)}`;
}

export function validateUnsubscribeToken(
  secret: string,
  token: string,
): UnsubscribePayload | null {
  const payload = decodePayload(token, secret, 16);
  if (!payload) {
    return null;
  }
  const subscriberId = asNumber(payload.sub_id);
  const newsletterId = asNumber(payload.news_id);
  if (subscriberId == null || newsletterId == null) {
    return null;
  }
  return { subscriberId, newsletterId, expiresAt: asString(payload.exp) };
}

export function generateVerificationToken(
  secret: string,
  email: string,
  now: Date = new Date(),
): string {
  const exp = new Date(
    now.getTime() + VERIFICATION_TOKEN_TTL_HOURS * 3600 * 1000,
  );
  const payloadB64 = base64url(
    JSON.stringify({
      email,
      exp: exp.toISOString(),
      nonce: randomBytes(16).toString('hex'),
    }),
  );
  return `${payloadB64}.${sign(secret, payloadB64)}`;
}

/** Returns the email the token was issued for, or null. */
export function validateVerificationToken(
  secret: string,
  token: string,
): string | null {
  const payload = decodePayload(token, secret);
  const email = asString(payload?.email);
  return email || null;
}
