import { createHmac, timingSafeEqual } from 'node:crypto';

export function hmac(
  algorithm: 'sha1' | 'sha256',
  secret: string,
  payload: string,
  encoding: 'hex' | 'base64',
): string {
  return createHmac(algorithm, secret).update(payload, 'utf8').digest(encoding);
}

export function constantTimeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  return left.length === right.length && timingSafeEqual(left, right);
}

/** Case-insensitive header lookup over a plain record. */
export function headerValue(headers: Record<string, string>, name: string): string | null {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return null;
}
