import crypto from 'crypto'

export const SIGNATURE_HEADER = 'x-webhook-signature'
const PREFIX = 'sha256='

/** HMAC-SHA256 over the raw body, hex encoded and prefixed with the algorithm. */
export function signPayload(body: string, secret: string): string {
  return PREFIX + crypto.createHmac('sha256', secret).update(body, 'utf8').digest('hex')
}

/** Constant-time check of a received signature header against the raw body. */
export function verifySignature(body: string, header: string | undefined, secret: string): boolean {
  if (!header || !header.startsWith(PREFIX)) return false
  const expected = Buffer.from(signPayload(body, secret), 'utf8')
  const received = Buffer.from(header.trim(), 'utf8')
  if (expected.length !== received.length) return false
  return crypto.timingSafeEqual(expected, received)
}
