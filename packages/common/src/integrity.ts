/**
 * Integrity digests in Subresource Integrity format (`sha512-<base64>`).
 *
 * Registries have used several algorithms over time, so the algorithm is part
 * of every digest and never assumed. Bare 40 character hex strings (the legacy
 * `shasum` field) are read as sha1.
 */

import { createHash } from "crypto";

export type IntegrityAlgorithm = "sha512" | "sha384" | "sha256" | "sha1";

export const INTEGRITY_ALGORITHMS: readonly IntegrityAlgorithm[] = [
  "sha512",
  "sha384",
  "sha256",
  "sha1",
];

export interface ParsedIntegrity {
  algorithm: IntegrityAlgorithm;
  /**
   * Base64 digest.
   */
  digest: string;
}

export function isIntegrityAlgorithm(value: string): value is IntegrityAlgorithm {
  return INTEGRITY_ALGORITHMS.some((a) => a === value);
}

export function calculateIntegrity(
  data: Uint8Array,
  algorithm: IntegrityAlgorithm
): string {
  const digest = createHash(algorithm).update(data).digest("base64");
  return `${algorithm}-${digest}`;
}

/**
 * Parses every hash in an integrity string, strongest first. Unknown algorithms
 * and malformed entries are skipped.
 */
export function parseIntegrity(integrity: string): ParsedIntegrity[] {
  const trimmed = integrity.trim();
  if (/^[0-9a-f]{40}$/i.test(trimmed)) {
    return [
      {
        algorithm: "sha1",
        digest: Buffer.from(trimmed, "hex").toString("base64"),
      },
    ];
  }

  const result: ParsedIntegrity[] = [];
  for (const entry of trimmed.split(/\s+/)) {
    const match = /^(sha\d+)-([A-Za-z0-9+/=]+)(\?.*)?$/.exec(entry);
    if (!match) {
      continue;
    }
    const [, algorithm, digest] = match;
    if (algorithm === undefined || digest === undefined) {
      continue;
    }
    if (isIntegrityAlgorithm(algorithm)) {
      result.push({ algorithm, digest });
    }
  }
  return result.sort(
    (a, b) =>
      INTEGRITY_ALGORITHMS.indexOf(a.algorithm) -
      INTEGRITY_ALGORITHMS.indexOf(b.algorithm)
  );
}

/**
 * The hash used to check and address content: the strongest one the string carries.
 */
export function primaryIntegrity(integrity: string): ParsedIntegrity | undefined {
  return parseIntegrity(integrity)[0];
}

export function integrityToHex(parsed: ParsedIntegrity): string {
  return Buffer.from(parsed.digest, "base64").toString("hex");
}

export interface IntegrityCheck {
  ok: boolean;
  /**
   * Digest of the data in the algorithm that was compared.
   */
  actual: string;
}

export function checkIntegrity(data: Uint8Array, expected: string): IntegrityCheck {
  const parsed = primaryIntegrity(expected);
  if (parsed === undefined) {
    return { ok: false, actual: calculateIntegrity(data, "sha512") };
  }
  const actual = calculateIntegrity(data, parsed.algorithm);
  return { ok: actual === `${parsed.algorithm}-${parsed.digest}`, actual };
}
