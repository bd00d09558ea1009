import { TokenExpiredError, TokenInvalidSignatureError } from '../../lib/errors';
import { JwtTokenService } from '../token.service';

const ISSUED_AT_MS = 1_700_000_000_000;
const WINDOW_MS = 60 * 60 * 1000;
const SECRET = 'test-secret-for-tokens';
const SUBJECT = { userId: 'user-1', username: 'alice' };

function serviceAt(nowMs: () => number, secretKey = SECRET): JwtTokenService {
  return new JwtTokenService({ secretKey, expireMinutes: 60, now: nowMs });
}

function encodeSegment(value: object): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

describe('JwtTokenService', () => {
  let now: number;
  let service: JwtTokenService;

  beforeEach(() => {
    now = ISSUED_AT_MS;
    service = serviceAt(() => now);
  });

  it('issues a token describing its validity window', () => {
    const issued = service.issue(SUBJECT);

    expect(issued.issuedAt).toEqual(new Date(ISSUED_AT_MS));
    expect(issued.expiresAt).toEqual(new Date(ISSUED_AT_MS + WINDOW_MS));
    expect(issued.expiresIn).toBe(3600);
    expect(issued.token.split('.')).toHaveLength(3);
  });

  it('verifies a token back to its subject', () => {
    const { token } = service.issue(SUBJECT);

    expect(service.verify(token)).toEqual(SUBJECT);
  });

  it('accepts a token until the last moment before expiry', () => {
    const { token } = service.issue(SUBJECT);

    now = ISSUED_AT_MS + WINDOW_MS - 1;
    expect(service.verify(token)).toEqual(SUBJECT);
  });

  it('rejects a token from the instant it expires', () => {
    const { token } = service.issue(SUBJECT);

    now = ISSUED_AT_MS + WINDOW_MS;
    expect(() => service.verify(token)).toThrow(TokenExpiredError);
    expect(() => service.verify(token)).toThrow('Token has expired');
  });

  it('counts the window from the whole second a token was issued in', () => {
    now = ISSUED_AT_MS + 700;
    const issued = service.issue(SUBJECT);

    expect(issued.issuedAt).toEqual(new Date(ISSUED_AT_MS));
    expect(issued.expiresAt).toEqual(new Date(ISSUED_AT_MS + WINDOW_MS));

    now = ISSUED_AT_MS + WINDOW_MS - 1;
    expect(service.verify(issued.token)).toEqual(SUBJECT);

    // 100ms short of a full window measured from the wall-clock issue time
    now = ISSUED_AT_MS + 700 + WINDOW_MS - 100;
    expect(() => service.verify(issued.token)).toThrow(TokenExpiredError);
  });

  it('rejects a token signed with another secret', () => {
    const { token } = serviceAt(() => now, 'another-test-secret').issue(SUBJECT);

    expect(() => service.verify(token)).toThrow(TokenInvalidSignatureError);
  });

  it('rejects a token whose claims were altered', () => {
    const { token } = service.issue(SUBJECT);
    const [header, , signature] = token.split('.');
    const forged = encodeSegment({
      sub: 'user-2',
      username: 'mallory',
      iat: ISSUED_AT_MS / 1000,
      exp: ISSUED_AT_MS / 1000 + 3600,
    });

    expect(() => service.verify(`${header}.${forged}.${signature}`)).toThrow(TokenInvalidSignatureError);
  });

  it('rejects unsigned and malformed tokens', () => {
    const unsigned = `${encodeSegment({ alg: 'none', typ: 'JWT' })}.${encodeSegment({
      sub: 'user-1',
      username: 'alice',
      exp: ISSUED_AT_MS / 1000 + 3600,
    })}.`;

    expect(() => service.verify(unsigned)).toThrow(TokenInvalidSignatureError);
    expect(() => service.verify('not-a-token')).toThrow(TokenInvalidSignatureError);
    expect(() => service.verify('')).toThrow(TokenInvalidSignatureError);
  });
});
