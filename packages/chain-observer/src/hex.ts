/**
 * Hex helpers for XRPL memo and currency fields.
 */

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

/**
 * Convert a UTF-8 string to uppercase hex encoding (XRPL convention).
 */
export function toHex(str: string): string {
  return Buffer.from(str, "utf8").toString("hex").toUpperCase();
}

/**
 * Convert a hex-encoded string back to UTF-8.
 *
 * @throws Error when the input is not even-length hex
 */
export function fromHex(hex: string): string {
  if (!isHex(hex)) {
    throw new Error(`Not a hex string: "${hex.slice(0, 16)}"`);
  }
  return Buffer.from(hex, "hex").toString("utf8");
}

export function isHex(value: string): boolean {
  return HEX_PATTERN.test(value);
}
