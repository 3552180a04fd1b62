/**
 * Command line argument parsing helpers.
 */

import type { MetadataValue, SessionMetadata } from "@capture-session/core";

/** Commander reducer for repeatable options */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse a metadata value. JSON literals (numbers, booleans, null, arrays,
 * objects, quoted strings) keep their type; anything else is a string.
 */
export function parseMetadataValue(raw: string): MetadataValue {
  try {
    const value: MetadataValue = JSON.parse(raw);
    return value;
  } catch {
    return raw;
  }
}

/**
 * Turn repeated `key=value` arguments into a metadata object.
 * Later pairs override earlier ones.
 *
 * @throws Error for a pair without "=" or with an empty key
 */
export function parseMetadataPairs(pairs: string[]): SessionMetadata {
  const metadata: SessionMetadata = {};
  for (const pair of pairs) {
    const eqIndex = pair.indexOf("=");
    if (eqIndex <= 0) {
      throw new Error(`Invalid metadata "${pair}", expected key=value`);
    }
    const key = pair.slice(0, eqIndex).trim();
    if (!key) {
      throw new Error(`Invalid metadata "${pair}", key is empty`);
    }
    metadata[key] = parseMetadataValue(pair.slice(eqIndex + 1));
  }
  return metadata;
}

/**
 * Parse a device index argument.
 *
 * @throws Error unless the argument is a non-negative integer
 */
export function parseDeviceIndex(raw: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new Error(`Invalid device index "${raw}", expected a non-negative integer`);
  }
  return parseInt(raw, 10);
}
