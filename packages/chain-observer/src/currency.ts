/**
 * XRPL currency codes.
 *
 * Standard codes are three ASCII characters. Anything longer travels as
 * a 40-character hex string (20 bytes, right-padded with zeros).
 * Comparison always happens on the decoded form.
 */

import { isHex, toHex } from "./hex.js";

const NON_STANDARD_LENGTH = 40;

/**
 * Decode a currency code from its ledger form.
 *
 * "PFT" stays "PFT"; "5046544E4F4445000000..." becomes "PFTNODE".
 */
export function decodeCurrencyCode(code: string): string {
  if (code.length !== NON_STANDARD_LENGTH || !isHex(code)) {
    return code;
  }

  const bytes = Buffer.from(code, "hex");

  // Standard code in 160-bit form: ASCII lives in bytes 12..14
  if (bytes[0] === 0) {
    return bytes.subarray(12, 15).toString("ascii").replace(/\0+$/, "");
  }

  return bytes.toString("utf8").replace(/\0+$/, "");
}

/**
 * Encode a currency code for a transaction Amount.
 *
 * @throws Error when the code does not fit in 20 bytes or spells "XRP"
 */
export function encodeCurrencyCode(code: string): string {
  if (code === "XRP") {
    throw new Error("XRP is not an issued currency code");
  }
  if (code.length === 3) {
    return code;
  }
  if (code.length === NON_STANDARD_LENGTH && isHex(code)) {
    return code.toUpperCase();
  }

  const hex = toHex(code);
  if (hex.length > NON_STANDARD_LENGTH) {
    throw new Error(`Currency code "${code}" exceeds 20 bytes`);
  }
  return hex.padEnd(NON_STANDARD_LENGTH, "0");
}
