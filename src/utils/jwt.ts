import { SignJWT, jwtVerify } from 'jose';
import { config } from '../config/index.js';

const secret = new TextEncoder().encode(config.JWT_SECRET);

export const TOKEN_AUDIENCE = 'chat-server';
export const TOKEN_TTL = '7d';

export interface AccessTokenPayload {
  sub: string;
}

export async function signAccessToken(userId: string): Promise<string> {
  return new SignJWT({})
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(userId)
    .setIssuedAt()
    .setAudience(TOKEN_AUDIENCE)
    .setExpirationTime(TOKEN_TTL)
    .sign(secret);
}

export async function verifyAccessToken(token: string): Promise<AccessTokenPayload> {
  const { payload } = await jwtVerify(token, secret, { audience: TOKEN_AUDIENCE });
  if (!payload.sub) {
    throw new Error('Token has no subject');
  }
  return { sub: payload.sub };
}
