import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import { TokenInvalidError } from './errors.js';

export interface TokenClaims {
  subject: number;
  role: string;
}

const payloadSchema = z.object({
  sub: z.string().regex(/^[1-9]\d*$/),
  role: z.string(),
});

/**
 * Issues and verifies stateless HS256 bearer tokens.
 *
 * One shared secret for the whole process. There is no revocation list and
 * no key rotation: a token stays valid until `exp`.
 */
export class TokenIssuer {
  constructor(
    private readonly secret: string,
    private readonly clock: () => number = Date.now
  ) {
    if (secret.length === 0) {
      throw new Error('Token signing secret must not be empty');
    }
  }

  issue(subject: number, role: string, ttlSeconds: number): string {
    // jsonwebtoken derives exp from the payload's iat when one is given
    return jwt.sign(
      { sub: String(subject), role, iat: this.nowSeconds() },
      this.secret,
      { algorithm: 'HS256', expiresIn: ttlSeconds }
    );
  }

  verify(token: string): TokenClaims {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, {
        algorithms: ['HS256'],
        clockTimestamp: this.nowSeconds(),
      });
    } catch {
      throw new TokenInvalidError();
    }

    const parsed = payloadSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new TokenInvalidError();
    }

    return {
      subject: Number(parsed.data.sub),
      role: parsed.data.role,
    };
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / 1000);
  }
}
