import crypto from 'crypto';
import { promisify } from 'util';

const scrypt = promisify<crypto.BinaryLike, crypto.BinaryLike, number, Buffer>(crypto.scrypt);

const KEY_LENGTH = 64;
const SALT_BYTES = 16;
const SCHEME = 'scrypt';

/** `scrypt$<salt b64>$<hash b64>`, salted per hash. */
export async function hashPassword(password: string): Promise<string> {
  const salt = crypto.randomBytes(SALT_BYTES);
  const derived = await scrypt(password, salt, KEY_LENGTH);
  return [SCHEME, salt.toString('base64'), derived.toString('base64')].join('$');
}

export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const [scheme, saltB64, hashB64] = stored.split('$');
  if (scheme !== SCHEME || !saltB64 || !hashB64) return false;
  const expected = Buffer.from(hashB64, 'base64');
  const derived = await scrypt(password, Buffer.from(saltB64, 'base64'), expected.length);
  return derived.length === expected.length && crypto.timingSafeEqual(derived, expected);
}

/** 32 random bytes, URL-safe. */
export function generateToken(): string {
  return crypto.randomBytes(32).toString('base64url');
}

export function newId(): string {
  return crypto.randomUUID();
}
