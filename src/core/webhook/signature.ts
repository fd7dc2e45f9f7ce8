import { createHmac, timingSafeEqual } from 'crypto';

export const SIGNATURE_PREFIX = 'sha1=';

export type VerifyOutcome =
  | { kind: 'allowed'; verified: true }
  | { kind: 'allowed'; verified: false }
  | { kind: 'rejected'; reason: 'forbidden' | 'internal-error'; message: string };

/**
 * Compute the `X-Hub-Signature` value GitHub sends for a body.
 */
export function computeSignature(secret: string, rawBody: Buffer | string): string {
  const digest = createHmac('sha1', secret).update(rawBody).digest('hex');
  return `${SIGNATURE_PREFIX}${digest}`;
}

function safeEqual(left: string, right: string): boolean {
  const leftBuffer = Buffer.from(left, 'utf8');
  const rightBuffer = Buffer.from(right, 'utf8');
  if (leftBuffer.length !== rightBuffer.length) {
    return false;
  }
  return timingSafeEqual(leftBuffer, rightBuffer);
}

/**
 * Check a webhook body against its `X-Hub-Signature` header.
 *
 * A configured secret makes the header mandatory. A header with no secret to
 * check it against is a server-side misconfiguration, not a client error.
 */
export function verifySignature(
  rawBody: Buffer | string,
  signatureHeader: string | undefined,
  secret: string | undefined
): VerifyOutcome {
  if (signatureHeader === undefined) {
    if (secret) {
      return { kind: 'rejected', reason: 'forbidden', message: 'Missing X-Hub-Signature' };
    }
    return { kind: 'allowed', verified: false };
  }

  if (!secret) {
    return {
      kind: 'rejected',
      reason: 'internal-error',
      message: 'Received X-Hub-Signature but no secret is configured',
    };
  }

  if (!safeEqual(computeSignature(secret, rawBody), signatureHeader)) {
    return { kind: 'rejected', reason: 'forbidden', message: 'HMAC digest mismatch' };
  }

  return { kind: 'allowed', verified: true };
}
