import { createHmac, timingSafeEqual } from 'node:crypto';
import { asNumber, asRecord, asString } from '../../common/utils/object.util';

export interface JwtClaims {
  sub: string;
  uid: number;
  iat: number;
  exp: number;
}

const HEADER = Buffer
  .from(JSON.stringify({ alg: 'HS256', typ: 'JWT' }))
  .toString(
  'base64url',
);

function signature(secret: string, data: string): string {
  return createHmac('sha256', secret).update(data).digest('base64url');
}

export function signJwt(
  secret: string,
  subject: { username: string; userId: number },
  expiresInSec: number,
  now: Date = new Date(),
): string {
  const iat = Math.floor(now.getTime() / 1000);
  const claims: JwtClaims = {
    sub: subject.username,
    uid: subject.userId,
    iat,
    exp: iat + expiresInSec,
  };
  const body = Buffer.from(JSON.stringify(claims)).toString('base64url');
  const data = `${HEADER}.${body}`;
  return `${data}.${signature(secret, data)}`;
}

export function verifyJwt(
  secret: string,
  token: string,
  now: Date = new Date(),
): JwtClaims | null {
  const parts = token.split('.');
  if (parts.length !== 3) {
    return null;
  }
  const [header = '', body = '', sig = ''] = parts;
  if (header !== HEADER) {
    return null;
  }

  const expected = Buffer.from(signature(secret, `${header}.${body}`));
  const actual = Buffer.from(sig);
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    return null;
  }

  let payload: Record<string, unknown> | null;
  try {
    const decoded: unknown = JSON.parse(
      Buffer.from(body, 'base64url').toString('utf-8'),
    );
    payload = asRecord(decoded);
  } catch {
    return null;
  }

  const sub = asString(payload?.sub);
  const uid = asNumber(payload?.uid);
  const iat = asNumber(payload?.iat);
  const exp = asNumber(payload?.exp);
  if (!sub || uid == null || iat == null || exp == null) {
    return null;
  }
  if (exp <= Math.floor(now.getTime() / 1000)) {
    return null;
  }
  return { sub, uid, iat, exp };
}
