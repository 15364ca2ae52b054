import jwt from 'jsonwebtoken';

// Zoom JWT apps accept short-lived tokens; a fresh one is signed for every request.
export const TOKEN_LIFETIME_SECONDS = 40;

export function signToken(keyId: string, secret: string, nowEpoch: number): string {
  return jwt.sign({ iss: keyId, exp: nowEpoch + TOKEN_LIFETIME_SECONDS }, secret, {
    algorithm: 'HS256',
    noTimestamp: true
  });
}

export function nowEpoch(): number {
  return Math.floor(Date.now() / 1000);
}
