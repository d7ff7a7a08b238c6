/**
 * Token Service
 *
 * Access and refresh tokens are HS256 JWTs. Refresh tokens carry a `jti` whose
 * SHA-256 hash is what the server persists; password-reset and email
 * verification tokens are opaque random strings stored the same way.
 */

import { createHash, randomBytes } from 'node:crypto'
import jwt, { type JwtPayload } from 'jsonwebtoken'
import type { AuthConfig } from '../config.js'
import { InvalidTokenError, TokenExpiredError, UnauthorizedError } from '../errors.js'

export type TokenType = 'access' | 'refresh'

export interface SignedToken {
  token: string
  expiresAt: Date
}

export interface VerifiedRefreshToken {
  teacherId: string
  jti: string
  expiresAt: Date
}

type Clock = () => number

const ALGORITHM = 'HS256'

export function hashToken(value: string): string {
  return createHash('sha256').update(value).digest('hex')
}

/** 256 bits of randomness, URL-safe */
export function generateOpaqueToken(): string {
  return randomBytes(32).toString('base64url')
}

export class TokenService {
  private readonly secret: string
  private readonly accessTtl: number
  private readonly refreshTtl: number
  private readonly now: Clock

  constructor(config: Pick<AuthConfig, 'jwtSecret' | 'accessTokenTtlSeconds' | 'refreshTokenTtlSeconds'>, clock: Clock = Date.now) {
    this.secret = config.jwtSecret
    this.accessTtl = config.accessTokenTtlSeconds
    this.refreshTtl = config.refreshTokenTtlSeconds
    this.now = clock
  }

  get accessTokenTtlSeconds(): number {
    return this.accessTtl
  }

  signAccessToken(teacherId: string): SignedToken {
    return this.sign(teacherId, 'access', this.accessTtl)
  }

  signRefreshToken(teacherId: string, jti: string): SignedToken {
    return this.sign(teacherId, 'refresh', this.refreshTtl, jti)
  }

  /**
   * Resolve the teacher id of an access token.
   * Expired tokens surface as TOKEN_EXPIRED, everything else as UNAUTHORIZED.
   */
  verifyAccessToken(token: string): string {
    let payload: JwtPayload
    try {
      payload = this.decode(token)
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) throw new TokenExpiredError()
      throw new UnauthorizedError('Invalid access token')
    }
    if (payload.typ !== 'access' || typeof payload.sub !== 'string') {
      throw new UnauthorizedError('Invalid access token')
    }
    return payload.sub
  }

  verifyRefreshToken(token: string): VerifiedRefreshToken {
    let payload: JwtPayload
    try {
      payload = this.decode(token)
    } catch {
      throw new InvalidTokenError()
    }
    if (
      payload.typ !== 'refresh' ||
      typeof payload.sub !== 'string' ||
      typeof payload.jti !== 'string' ||
      typeof payload.exp !== 'number'
    ) {
      throw new InvalidTokenError()
    }
    return { teacherId: payload.sub, jti: payload.jti, expiresAt: new Date(payload.exp * 1000) }
  }

  private sign(teacherId: string, typ: TokenType, ttlSeconds: number, jti?: string): SignedToken {
    const iat = Math.floor(this.now() / 1000)
    const token = jwt.sign({ sub: teacherId, typ, iat }, this.secret, {
      algorithm: ALGORITHM,
      expiresIn: ttlSeconds,
      ...(jti ? { jwtid: jti } : {}),
    })
    return { token, expiresAt: new Date((iat + ttlSeconds) * 1000) }
  }

  private decode(token: string): JwtPayload {
    const decoded = jwt.verify(token, this.secret, {
      algorithms: [ALGORITHM],
      clockTimestamp: Math.floor(this.now() / 1000),
    })
    if (typeof decoded === 'string') {
      throw new jwt.JsonWebTokenError('Unexpected string payload')
    }
    return decoded
  }
}
