import { scrypt, randomBytes, timingSafeEqual } from 'node:crypto';

// ── Constants ────────────────────────────────────────────────────

const SCRYPT_KEYLEN = 64;
const SALT_BYTES = 16;
const SCRYPT_COST = 16384;  // N = 2^14
const SCRYPT_BLOCK_SIZE = 8;
const SCRYPT_PARALLELIZATION = 1;

// Format: $scrypt$N$r$p$hash (hash base64). The per-account salt is stored
// beside the hash; the deployment-wide salt from config is appended to it.

interface ScryptParams {
  readonly N: number;
  readonly r: number;
  readonly p: number;
}

// ── generateSalt ─────────────────────────────────────────────────

export function generateSalt(): string {
  return randomBytes(SALT_BYTES).toString('base64');
}

// ── hashPassword ─────────────────────────────────────────────────

export async function hashPassword(
  plain: string,
  salt: string,
  globalSalt: string,
): Promise<string> {
  const params = { N: SCRYPT_COST, r: SCRYPT_BLOCK_SIZE, p: SCRYPT_PARALLELIZATION };
  const derivedKey = await derive(plain, salt, globalSalt, SCRYPT_KEYLEN, params);

  return [
    '$scrypt',
    params.N,
    params.r,
    params.p,
    derivedKey.toString('base64'),
  ].join('$');
}

// ── verifyPassword ───────────────────────────────────────────────

export async function verifyPassword(
  plain: string,
  salt: string,
  globalSalt: string,
  hash: string,
): Promise<boolean> {
  const parts = hash.split('$');
  // parts: ['', 'scrypt', N, r, p, hash]
  if (parts.length !== 6 || parts[1] !== 'scrypt') return false;

  const params = { N: Number(parts[2]), r: Number(parts[3]), p: Number(parts[4]) };
  if (![params.N, params.r, params.p].every(Number.isInteger)) return false;

  const expected = Buffer.from(parts[5] ?? '', 'base64');
  if (expected.length === 0) return false;

  const derivedKey = await derive(plain, salt, globalSalt, expected.length, params);
  return timingSafeEqual(derivedKey, expected);
}

// ── derive ───────────────────────────────────────────────────────

function derive(
  plain: string,
  salt: string,
  globalSalt: string,
  keylen: number,
  params: ScryptParams,
): Promise<Buffer> {
  const combinedSalt = Buffer.concat([
    Buffer.from(salt, 'base64'),
    Buffer.from(globalSalt, 'utf8'),
  ]);

  return new Promise((resolve, reject) => {
    scrypt(plain, combinedSalt, keylen, params, (err, derivedKey) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(derivedKey);
    });
  });
}
