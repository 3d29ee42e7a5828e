/**
 * Identity addresses: "0x" followed by 40 hex digits.
 * Stored and compared in lower case everywhere.
 */

export const ADDRESS_PATTERN = /^0x[a-fA-F0-9]{40}$/;

export function isValidAddress(value: unknown): value is string {
  return typeof value === 'string' && ADDRESS_PATTERN.test(value);
}

export function normalizeAddress(address: string): string {
  return address.toLowerCase();
}
