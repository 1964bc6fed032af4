import { createHmac, timingSafeEqual } from "node:crypto";

export const SIGNATURE_HEADER = "X-Signature";
const SIGNATURE_PREFIX = "sha256=";

/**
 * HMAC-SHA256 over the exact bytes sent, formatted `sha256=<hex_digest>`.
 */
export function signPayload(body: string | Buffer, secret: string): string {
  const digest = createHmac("sha256", secret).update(body).digest("hex");
  return `${SIGNATURE_PREFIX}${digest}`;
}

/**
 * Verify a `sha256=<hex>` signature against the raw body.
 * Malformed signatures fail verification rather than throwing.
 */
export function verifySignature(body: string | Buffer, signature: string | undefined, secret: string): boolean {
  if (!signature || !secret) {
    return false;
  }
  if (!signature.startsWith(SIGNATURE_PREFIX)) {
    return false;
  }
  const received = signature.slice(SIGNATURE_PREFIX.length);
  if (!/^[0-9a-f]{64}$/i.test(received)) {
    return false;
  }

  const expected = createHmac("sha256", secret).update(body).digest();
  return timingSafeEqual(Buffer.from(received, "hex"), expected);
}
