import jwt from 'jsonwebtoken';
import { loadConfig } from '../config';

/** Claims carried by bearer tokens. Tokens are issued by the identity service. */
export interface JwtPayload {
  userId: string;
  branchId: string | null;
  name: string;
}

function readClaim(decoded: jwt.JwtPayload, key: string): string | null {
  const value: unknown = decoded[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

export class AuthService {
  private get secret(): string {
    const { jwtSecret } = loadConfig();
    if (!jwtSecret) throw new Error('JWT_SECRET is not configured');
    return jwtSecret;
  }

  verifyToken(token: string): JwtPayload {
    const decoded = jwt.verify(token, this.secret);
    if (typeof decoded === 'string') throw new Error('Unexpected token payload');

    const userId = readClaim(decoded, 'userId') ?? readClaim(decoded, 'sub');
    if (!userId) throw new Error('Token has no user id');

    return {
      userId,
      branchId: readClaim(decoded, 'branchId'),
      name: readClaim(decoded, 'name') ?? '',
    };
  }

  /** Used by tooling and tests; production tokens come from the identity service. */
  signToken(payload: JwtPayload, expiresIn: number = 60 * 60): string {
    return jwt.sign(payload, this.secret, { expiresIn });
  }
}

export const authService = new AuthService();
