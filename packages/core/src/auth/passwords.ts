import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto'

/** scrypt cost parameters; stored with each hash so they can change later */
const N = 16384
const R = 8
const P = 1
const KEY_LENGTH = 64
const SALT_BYTES = 16

export const PASSWORD_MIN_LENGTH = 8
export const PASSWORD_MAX_LENGTH = 128

function derive(password: string, salt: Buffer, n: number, r: number, p: number, keyLength: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, keyLength, { N: n, r, p, maxmem: 128 * n * r * 2 }, (err, key) => {
      if (err) reject(err)
      else resolve(key)
    })
  })
}

/**
 * Hash a password as `scrypt$N$r$p$salt$hash` (salt and hash base64).
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SALT_BYTES)
  const key = await derive(password, salt, N, R, P, KEY_LENGTH)
  return ['scrypt', N, R, P, salt.toString('base64'), key.toString('base64')].join('$')
}

/**
 * Constant-time comparison against a stored hash.
 * A malformed stored value never matches.
 */
export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const parts = stored.split('$')
  if (parts.length !== 6 || parts[0] !== 'scrypt') return false
  const [, nRaw, rRaw, pRaw, saltRaw, hashRaw] = parts
  const n = Number(nRaw)
  const r = Number(rRaw)
  const p = Number(pRaw)
  if (![n, r, p].every((v) => Number.isInteger(v) && v > 0)) return false

  const expected = Buffer.from(hashRaw, 'base64')
  if (expected.length === 0) return false
  const actual = await derive(password, Buffer.from(saltRaw, 'base64'), n, r, p, expected.length)
  return timingSafeEqual(actual, expected)
}

/**
 * Strength rules for new passwords.
 * Returns the list of problems, empty when acceptable.
 */
export function passwordProblems(password: string): string[] {
  const problems: string[] = []
  if (password.length < PASSWORD_MIN_LENGTH) {
    problems.push(`Password must be at least ${PASSWORD_MIN_LENGTH} characters`)
  }
  if (password.length > PASSWORD_MAX_LENGTH) {
    problems.push(`Password must be at most ${PASSWORD_MAX_LENGTH} characters`)
  }
  if (!/[A-Za-z]/.test(password)) {
    problems.push('Password must contain a letter')
  }
  if (!/\d/.test(password)) {
    problems.push('Password must contain a digit')
  }
  return problems
}
