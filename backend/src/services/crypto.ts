import crypto from 'node:crypto';

// Password hashes are stored as scrypt$<salt>$<hash>, both base64url.
const KEY_LENGTH = 64;

export function b64urlEncode(data: string | Buffer): string {
  return Buffer.from(data).toString('base64url');
}

export function b64urlDecode(value: string): string {
  return Buffer.from(value, 'base64url').toString('utf8');
}

export function constantTimeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) return false;
  return crypto.timingSafeEqual(left, right);
}

export function hmacSha256(key: string, data: string): string {
  return crypto.createHmac('sha256', key).update(data).digest('base64url');
}

export function hashPassword(password: string): string {
  const salt = crypto.randomBytes(16);
  const hash = crypto.scryptSync(password, salt, KEY_LENGTH);
  return `scrypt$${salt.toString('base64url')}$${hash.toString('base64url')}`;
}

export function verifyPassword(password: string, stored: string): boolean {
  const [scheme, salt, hash] = stored.split('$');
  if (scheme !== 'scrypt' || !salt || !hash) return false;
  const expected = Buffer.from(hash, 'base64url');
  const actual = crypto.scryptSync(password, Buffer.from(salt, 'base64url'), expected.length);
  return expected.length === actual.length && crypto.timingSafeEqual(expected, actual);
}

const PASSWORD_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz23456789';

export function randomPassword(length = 12): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += PASSWORD_ALPHABET[crypto.randomInt(PASSWORD_ALPHABET.length)];
  }
  return out;
}

interface TokenPayload {
  sub: number;
  exp: number; // epoch seconds
}

/** <payload>.<signature>; the payload is {sub, exp} as base64url JSON */
export function signAccessToken(userId: number, secret: string, ttlHours: number): string {
  const payload: TokenPayload = {
    sub: userId,
    exp: Math.floor(Date.now() / 1000) + ttlHours * 3600
  };
  const body = b64urlEncode(JSON.stringify(payload));
  return `${body}.${hmacSha256(secret, body)}`;
}

/** Returns the user id, or null for a malformed, forged or expired token. */
export function verifyAccessToken(token: string, secret: string): number | null {
  const parts = token.split('.');
  if (parts.length !== 2) return null;
  const [body, signature] = parts;
  if (!constantTimeEqual(hmacSha256(secret, body), signature)) return null;

  let payload: unknown;
  try {
    payload = JSON.parse(b64urlDecode(body));
  } catch {
    return null;
  }
  if (typeof payload !== 'object' || payload === null) return null;
  const sub: unknown = Reflect.get(payload, 'sub');
  const exp: unknown = Reflect.get(payload, 'exp');
  if (typeof sub !== 'number' || typeof exp !== 'number') return null;
  if (Math.floor(Date.now() / 1000) >= exp) return null;
  return sub;
}

// Password reset links: uid = base64url(id), token = <expiry base36>-<hmac>
const RESET_TTL_SECONDS = 3 * 24 * 3600;

export function resetUid(userId: number): string {
  return b64urlEncode(String(userId));
}

export function resetUserId(uid: string): number | null {
  const decoded = b64urlDecode(uid);
  if (!/^\d+$/.test(decoded)) return null;
  return Number(decoded);
}

export function makeResetToken(userId: number, passwordHash: string, secret: string): string {
  const expires = (Math.floor(Date.now() / 1000) + RESET_TTL_SECONDS).toString(36);
  return `${expires}-${hmacSha256(secret, `${userId}|${passwordHash}|${expires}`)}`;
}

/** Tied to the current password hash, so changing the password invalidates it. */
export function checkResetToken(
  userId: number,
  passwordHash: string,
  token: string,
  secret: string
): boolean {
  const dash = token.indexOf('-');
  if (dash <= 0) return false;
  const expires = token.slice(0, dash);
  const signature = token.slice(dash + 1);
  const expiresAt = Number.parseInt(expires, 36);
  if (!Number.isFinite(expiresAt) || Math.floor(Date.now() / 1000) >= expiresAt) return false;
  return constantTimeEqual(hmacSha256(secret, `${userId}|${passwordHash}|${expires}`), signature);
}
