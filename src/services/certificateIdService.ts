import { createHash, randomBytes } from "crypto";

export interface Clock {
  now(): Date;
  randomBytes(size: number): Buffer;
}

export const systemClock: Clock = {
  now: () => new Date(),
  randomBytes: (size) => randomBytes(size),
};

export const CERTIFICATE_ID_PREFIX = "CERT-";
export const CERTIFICATE_ID_PATTERN = /^CERT-[A-Z0-9]{12}$/;

const NONCE_BYTES = 16;
const DIGEST_CHARS = 12;

/**
 * Derives a certificate identifier from the trainee/training pair, the
 * current instant and a random nonce. With a fixed clock the result is
 * reproducible; with the system clock every call yields a fresh ID.
 *
 * Throws when the entropy source fails.
 */
export function generateCertificateId(
  traineeId: string,
  trainingId: string,
  clock: Clock = systemClock
): string {
  const issuedAtMs = clock.now().getTime();
  const nonce = clock.randomBytes(NONCE_BYTES).toString("hex");
  const digest = createHash("sha256")
    .update(`${traineeId}|${trainingId}|${issuedAtMs}|${nonce}`)
    .digest("hex");
  return `${CERTIFICATE_ID_PREFIX}${digest.slice(0, DIGEST_CHARS).toUpperCase()}`;
}
