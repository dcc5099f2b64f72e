/**
 * Resolves the anonymous cart session carried in the `cart_session` cookie.
 */
import { randomUUID } from 'node:crypto';
import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Request, Response } from 'express';
import type { RequestState } from '@app/common/tracing/request-trace';

export const CART_SESSION_COOKIE = 'cart_session';

const SESSION_ID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

type RequestWithSession = Request & RequestState;

/**
 * Returns the caller's cart session id, issuing a new cookie on first use.
 * Guests and signed-in buyers are treated alike.
 */
export function resolveCartSession(req: RequestWithSession, res: Response): string {
  if (req.cartSessionId) {
    return req.cartSessionId;
  }

  const cookies: Record<string, unknown> = req.cookies ?? {};
  const raw = cookies[CART_SESSION_COOKIE];
  if (typeof raw === 'string' && SESSION_ID_PATTERN.test(raw)) {
    req.cartSessionId = raw;
    return raw;
  }

  const sessionId = randomUUID();
  res.cookie(CART_SESSION_COOKIE, sessionId, {
    httpOnly: true,
    sameSite: 'lax',
    secure: (process.env.NODE_ENV || '').toLowerCase() === 'production',
    path: '/',
  });
  req.cartSessionId = sessionId;
  return sessionId;
}

export const CartSession = createParamDecorator(
  (_data: unknown, context: ExecutionContext): string => {
    const http = context.switchToHttp();
    return resolveCartSession(
      http.getRequest<RequestWithSession>(),
      http.getResponse<Response>(),
    );
  },
);
