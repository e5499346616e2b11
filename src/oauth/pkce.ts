import crypto from "node:crypto";
import type { PKCEPair } from "../types.js";
import { PkceGenerationError } from "./errors.js";

// 48 bytes encode to a 64-character verifier, inside the 43..128 range.
const VERIFIER_BYTES = 48;

export function base64UrlEncode(data: Buffer) {
  return data.toString("base64url");
}

export function deriveCodeChallenge(codeVerifier: string) {
  return base64UrlEncode(
    crypto.createHash("sha256").update(codeVerifier, "ascii").digest()
  );
}

export function generatePKCE(
  randomBytes: (size: number) => Buffer = crypto.randomBytes
): PKCEPair {
  let bytes: Buffer;
  try {
    bytes = randomBytes(VERIFIER_BYTES);
  } catch (err) {
    throw new PkceGenerationError({ cause: err });
  }
  const codeVerifier = base64UrlEncode(bytes);
  return { codeVerifier, codeChallenge: deriveCodeChallenge(codeVerifier) };
}
