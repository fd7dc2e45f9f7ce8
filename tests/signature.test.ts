import { createHmac } from 'crypto';
import { describe, it, expect } from 'vitest';
import { computeSignature, verifySignature } from '../src/core/webhook/signature.js';

const SECRET = 'test-secret';
const BODY = Buffer.from('{"zen":"Keep it logically awesome."}');

function sign(body: Buffer, secret = SECRET): string {
  return 'sha1=' + createHmac('sha1', secret).update(body).digest('hex');
}

describe('computeSignature', () => {
  it('should produce a sha1= prefixed hex digest', () => {
    const signature = computeSignature(SECRET, BODY);
    expect(signature).toBe(sign(BODY));
    expect(signature).toMatch(/^sha1=[0-9a-f]{40}$/);
  });

  it('should accept string bodies', () => {
    expect(computeSignature(SECRET, BODY.toString('utf-8'))).toBe(sign(BODY));
  });
});

describe('verifySignature', () => {
  it('should allow a matching signature', () => {
    expect(verifySignature(BODY, sign(BODY), SECRET)).toEqual({ kind: 'allowed', verified: true });
  });

  it('should reject a missing header when a secret is configured', () => {
    expect(verifySignature(BODY, undefined, SECRET)).toEqual({
      kind: 'rejected',
      reason: 'forbidden',
      message: 'Missing X-Hub-Signature',
    });
  });

  it('should allow unsigned requests when no secret is configured', () => {
    expect(verifySignature(BODY, undefined, '')).toEqual({ kind: 'allowed', verified: false });
    expect(verifySignature(BODY, undefined, undefined)).toEqual({ kind: 'allowed', verified: false });
  });

  it('should report a signature without a secret as an internal error', () => {
    const outcome = verifySignature(BODY, sign(BODY), '');
    expect(outcome.kind).toBe('rejected');
    if (outcome.kind === 'rejected') {
      expect(outcome.reason).toBe('internal-error');
    }
  });

  it('should reject a body that differs by one byte', () => {
    const tampered = Buffer.from(BODY);
    tampered[2] = tampered[2] ^ 0x01;
    expect(verifySignature(tampered, sign(BODY), SECRET)).toEqual({
      kind: 'rejected',
      reason: 'forbidden',
      message: 'HMAC digest mismatch',
    });
  });

  it('should reject a signature with one hex digit flipped', () => {
    const signature = sign(BODY);
    const index = signature.length - 1;
    const flipped = (parseInt(signature[index], 16) ^ 0x1).toString(16);
    const tampered = signature.slice(0, index) + flipped;

    expect(tampered).not.toBe(signature);
    expect(verifySignature(BODY, tampered, SECRET)).toEqual({
      kind: 'rejected',
      reason: 'forbidden',
      message: 'HMAC digest mismatch',
    });
  });

  it('should reject a signature made with another secret', () => {
    const outcome = verifySignature(BODY, sign(BODY, 'other-secret'), SECRET);
    expect(outcome).toMatchObject({ kind: 'rejected', reason: 'forbidden' });
  });

  it('should reject a signature of the wrong length', () => {
    const outcome = verifySignature(BODY, 'sha1=abc', SECRET);
    expect(outcome).toMatchObject({ kind: 'rejected', reason: 'forbidden' });
  });

  it('should reject a digest without the sha1= prefix', () => {
    const bare = sign(BODY).slice('sha1='.length);
    expect(verifySignature(BODY, bare, SECRET)).toMatchObject({ kind: 'rejected', reason: 'forbidden' });
  });
});
