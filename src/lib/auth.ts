import jwt from 'jsonwebtoken';

const DEFAULT_ACCESS_TOKEN_TTL_SECONDS = 15 * 60;

export type AccessTokenPayload = {
  sub: string;
  role: string;
};

function getJwtSecret(): string {
  const secret = process.env.JWT_SECRET ?? '';
  if (!secret) {
    throw new Error('JWT_SECRET must be set to sign or verify access tokens');
  }
  return secret;
}

function accessTokenTtlSeconds(): number {
  const parsed = Number(process.env.ACCESS_TOKEN_TTL_SECONDS);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_ACCESS_TOKEN_TTL_SECONDS;
}

export function signAccessToken(payload: AccessTokenPayload, expiresInSeconds: number = accessTokenTtlSeconds()) {
  return jwt.sign({ role: payload.role }, getJwtSecret(), {
    subject: payload.sub,
    expiresIn: expiresInSeconds
  });
}

/** The `sub` claim is the actor id recorded on movements; the core never interprets it. */
export function verifyAccessToken(token: string): AccessTokenPayload {
  const decoded = jwt.verify(token, getJwtSecret());
  if (typeof decoded === 'string' || typeof decoded.sub !== 'string' || !decoded.sub) {
    throw new Error('INVALID_ACCESS_TOKEN');
  }
  const role: unknown = decoded.role;
  return {
    sub: decoded.sub,
    role: typeof role === 'string' ? role : 'user'
  };
}
