const DECIMAL_PATTERN = /^[+-]?\d+$/;
const HEX_PATTERN = /^([+-]?)0[xX]([0-9a-fA-F]+)$/;

/**
 * Integer conversion shared by options, positional slots and text defaults.
 * Accepts decimal and `0x` hexadecimal literals with an optional sign.
 * Returns undefined when the text is not a safe integer.
 */
export function parseIntegerText(raw: string): number | undefined {
  const normalized = raw.trim();
  if (normalized.length === 0) {
    return undefined;
  }

  let parsed: number;
  const hex = HEX_PATTERN.exec(normalized);
  if (hex) {
    const magnitude = Number.parseInt(hex[2], 16);
    parsed = hex[1] === '-' ? -magnitude : magnitude;
  } else if (DECIMAL_PATTERN.test(normalized)) {
    parsed = Number.parseInt(normalized, 10);
  } else {
    return undefined;
  }

  if (!Number.isSafeInteger(parsed)) {
    return undefined;
  }
  // -0 would format back as "0".
  return parsed === 0 ? 0 : parsed;
}

export function formatValue(value: string | number | boolean): string {
  return typeof value === 'string' ? value : String(value);
}
