import { Inject, Injectable } from '@nestjs/common';
import type { JwtPayload, Secret, SignOptions, VerifyOptions } from 'jsonwebtoken';
import { sign, verify } from 'jsonwebtoken';
import {
  ADDON_UPLOADS_CONFIG,
  type AddonUploadsConfig,
} from '@app/addon-uploads/addon-uploads.tokens';

export interface FormTokenPayload extends JwtPayload {
  sid: string;
  act: string;
  typ: 'form';
}

const isFormTokenPayload = (
  decoded: string | JwtPayload,
): decoded is FormTokenPayload =>
  typeof decoded === 'object' &&
  decoded.typ === 'form' &&
  typeof decoded.sid === 'string' &&
  typeof decoded.act === 'string';

/**
 * Anti-forgery tokens for the product-page upload field.
 *
 * A token is bound to one form action and one cart session and stays valid for
 * the configured window. It is deliberately not single-use: the same token
 * verifies for every submission inside the window.
 */
@Injectable()
export class FormTokenService {
  private readonly secret: Secret;
  private readonly ttlSeconds: number;

  constructor(@Inject(ADDON_UPLOADS_CONFIG) cfg: AddonUploadsConfig) {
    this.secret = cfg.formToken.secret;
    this.ttlSeconds = cfg.formToken.ttlSeconds;
  }

  issue(action: string, sessionId: string): string {
    const payload: FormTokenPayload = { sid: sessionId, act: action, typ: 'form' };
    const opts: SignOptions = {
      algorithm: 'HS256',
      expiresIn: this.ttlSeconds,
    };
    return sign(payload, this.secret, opts);
  }

  /** false for missing, malformed, expired or foreign tokens */
  verify(token: string | null | undefined, action: string, sessionId: string): boolean {
    if (!token) {
      return false;
    }
    const opts: VerifyOptions = { algorithms: ['HS256'] };
    let decoded: string | JwtPayload;
    try {
      decoded = verify(token, this.secret, opts);
    } catch {
      return false;
    }
    return (
      isFormTokenPayload(decoded) &&
      decoded.act === action &&
      decoded.sid === sessionId
    );
  }
}
