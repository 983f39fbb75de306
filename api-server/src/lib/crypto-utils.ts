import * as crypto from "crypto";

// Keyed digest used to store API keys. Deterministic, so a presented key can
// be looked up by its hash; the pepper never leaves configuration.
export function hmacSha256(secret: string, value: string): string {
  return crypto.createHmac("sha256", secret).update(value).digest("hex");
}

export function randomSecret(bytes: number): string {
  return crypto.randomBytes(bytes).toString("base64url");
}

export function randomId(bytes = 12): string {
  return crypto.randomBytes(bytes).toString("base64url");
}

/** Constant-time comparison of two hex digests. */
export function digestsEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, "hex");
  const right = Buffer.from(b, "hex");
  if (left.length !== right.length || left.length === 0) {
    return false;
  }
  return crypto.timingSafeEqual(left, right);
}
