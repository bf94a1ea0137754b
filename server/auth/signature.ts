import crypto from "node:crypto";

export const SIGNATURE_HEADER = "x-signature";

export const signBody = (secret: string, body: Buffer | string): string =>
  crypto.createHmac("sha256", secret).update(body).digest("hex");

/**
 * Constant-time string comparison. Both sides are hashed first so the
 * comparison length never depends on the caller-supplied value.
 */
export const safeEqual = (expected: string, provided: string): boolean => {
  const a = crypto.createHash("sha256").update(expected, "utf8").digest();
  const b = crypto.createHash("sha256").update(provided, "utf8").digest();
  return crypto.timingSafeEqual(a, b) && expected.length === provided.length;
};

export const verifySignature = (secret: string, body: Buffer | string, signature: string): boolean =>
  safeEqual(signBody(secret, body), signature);
