import {
  b64urlEncode,
  checkResetToken,
  hashPassword,
  makeResetToken,
  randomPassword,
  resetUid,
  resetUserId,
  signAccessToken,
  verifyAccessToken,
  verifyPassword
} from '../services/crypto';

describe('password hashing', () => {
  test('scrypt hashes verify only the password they were made from', () => {
    const stored = hashPassword('segredo-123');
    expect(stored.startsWith('scrypt$')).toBe(true);
    expect(stored.split('$')).toHaveLength(3);
    expect(verifyPassword('segredo-123', stored)).toBe(true);
    expect(verifyPassword('segredo-124', stored)).toBe(false);
    expect(verifyPassword('segredo-123', 'md5$abc$def')).toBe(false);
  });

  test('two hashes of the same password differ by salt', () => {
    expect(hashPassword('segredo-123')).not.toBe(hashPassword('segredo-123'));
  });

  test('randomPassword draws from the unambiguous alphabet', () => {
    const password = randomPassword();
    expect(password).toHaveLength(12);
    expect(password).toMatch(/^[A-HJ-NP-Za-km-z2-9]+$/);
  });
});

describe('access tokens', () => {
  test('round trip with the same secret', () => {
    const token = signAccessToken(7, 'test-secret', 1);
    expect(verifyAccessToken(token, 'test-secret')).toBe(7);
  });

  test('wrong secret, tampering and expiry are rejected', () => {
    const token = signAccessToken(7, 'test-secret', 1);
    expect(verifyAccessToken(token, 'other-secret')).toBeNull();

    const [, signature] = token.split('.');
    const forged = `${b64urlEncode(JSON.stringify({ sub: 1, exp: 9999999999 }))}.${signature}`;
    expect(verifyAccessToken(forged, 'test-secret')).toBeNull();

    expect(verifyAccessToken(signAccessToken(7, 'test-secret', 0), 'test-secret')).toBeNull();
    expect(verifyAccessToken('not-a-token', 'test-secret')).toBeNull();
  });
});

describe('password reset links', () => {
  test('uid encodes the user id', () => {
    expect(resetUserId(resetUid(42))).toBe(42);
    expect(resetUserId(b64urlEncode('abc'))).toBeNull();
  });

  test('token is bound to the current password hash', () => {
    const token = makeResetToken(42, 'hash-a', 'test-secret');
    expect(checkResetToken(42, 'hash-a', token, 'test-secret')).toBe(true);
    expect(checkResetToken(42, 'hash-b', token, 'test-secret')).toBe(false);
    expect(checkResetToken(43, 'hash-a', token, 'test-secret')).toBe(false);
    expect(checkResetToken(42, 'hash-a', 'garbage', 'test-secret')).toBe(false);
  });
});
