import { createHash } from "crypto";
import {
  calculateIntegrity,
  checkIntegrity,
  integrityToHex,
  parseIntegrity,
  primaryIntegrity,
} from "./";

const data = Buffer.from("hello burrow");

describe("integrity", () => {
  it("computes SRI digests for the requested algorithm", () => {
    const expected = createHash("sha256").update(data).digest("base64");

    expect(calculateIntegrity(data, "sha256")).toBe(`sha256-${expected}`);
  });

  it("prefers the strongest hash of a multi-hash string", () => {
    const sha1 = calculateIntegrity(data, "sha1");
    const sha512 = calculateIntegrity(data, "sha512");

    expect(primaryIntegrity(`${sha1} ${sha512}`)?.algorithm).toBe("sha512");
  });

  it("reads a legacy hex shasum as sha1", () => {
    const hex = createHash("sha1").update(data).digest("hex");

    const [parsed] = parseIntegrity(hex);

    expect(parsed?.algorithm).toBe("sha1");
    expect(parsed && integrityToHex(parsed)).toBe(hex);
    expect(checkIntegrity(data, hex).ok).toBe(true);
  });

  it("skips unknown algorithms", () => {
    expect(parseIntegrity("md5-AAAA")).toEqual([]);
  });

  it("detects a mismatch and reports the actual digest", () => {
    const check = checkIntegrity(
      Buffer.from("tampered"),
      calculateIntegrity(data, "sha512")
    );

    expect(check.ok).toBe(false);
    expect(check.actual).toBe(
      calculateIntegrity(Buffer.from("tampered"), "sha512")
    );
  });
});
