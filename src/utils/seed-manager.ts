import crypto from "crypto";

export function hashStringToSeed(seed: string): number {
  const hash = crypto.createHash("sha256").update(seed).digest("hex");

  // First 8 hex characters fit a 32-bit faker seed
  return parseInt(hash.slice(0, 8), 16);
}

export function toNumericSeed(seed: string | number): number {
  return typeof seed === "string" ? hashStringToSeed(seed) : seed;
}

export function generateRandomSeed(): string {
  return crypto.randomBytes(32).toString("hex");
}
