import { UnauthorizedException } from '@nestjs/common';
import { createHmac, timingSafeEqual } from 'crypto';
import { z } from 'zod';
import { USER_ROLES } from '../user/user.types';
import type { SessionPayload } from './session.types';

const TOKEN_HEADER = { alg: 'HS256', typ: 'JWT' } as const;

const headerSchema = z.object({
  alg: z.string(),
  typ: z.string().optional(),
});

const payloadSchema = z.object({
  sub: z.string().min(1),
  sid: z.string().min(1),
  role: z.enum(USER_ROLES),
  iat: z.number().int(),
  exp: z.number().int(),
});

const base64urlEncode = (input: string | Buffer): string =>
  Buffer.from(input).toString('base64url');

const base64urlDecode = (input: string): Buffer =>
  Buffer.from(input, 'base64url');

const sign = (signingInput: string, secret: string): Buffer =>
  createHmac('sha256', secret).update(signingInput).digest();

const decodeSegment = <T>(segment: string, schema: z.ZodType<T>): T => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(base64urlDecode(segment).toString('utf8'));
  } catch {
    throw new UnauthorizedException('Invalid session token format');
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new UnauthorizedException('Invalid session token format');
  }
  return result.data;
};

export function signSessionToken(
  payload: SessionPayload,
  secret: string,
): string {
  const encodedHeader = base64urlEncode(JSON.stringify(TOKEN_HEADER));
  const encodedPayload = base64urlEncode(JSON.stringify(payload));
  const signingInput = `${encodedHeader}.${encodedPayload}`;
  return `${signingInput}.${base64urlEncode(sign(signingInput, secret))}`;
}

/**
 * 署名と有効期限のみを検証する。セッションが失効していないかは
 * SessionService 側で session テーブルを見て判定する。
 */
export function verifySessionToken(
  token: string,
  secret: string,
  now: number = Date.now(),
): SessionPayload {
  const segments = token.split('.');
  if (segments.length !== 3) {
    throw new UnauthorizedException('Invalid session token format');
  }

  const [encodedHeader, encodedPayload, encodedSignature] = segments;
  const header = decodeSegment(encodedHeader, headerSchema);
  if (header.alg !== TOKEN_HEADER.alg) {
    throw new UnauthorizedException('Unsupported session token alg');
  }

  const signature = base64urlDecode(encodedSignature);
  const expected = sign(`${encodedHeader}.${encodedPayload}`, secret);
  if (
    expected.length !== signature.length ||
    !timingSafeEqual(expected, signature)
  ) {
    throw new UnauthorizedException('Session token signature invalid');
  }

  const payload = decodeSegment(encodedPayload, payloadSchema);
  if (now >= payload.exp * 1000) {
    throw new UnauthorizedException('Session expired');
  }
  return payload;
}
