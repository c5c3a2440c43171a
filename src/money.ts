/**
 * Exact handling of monetary amounts.
 *
 * Amounts travel as decimal strings ("12.50") and are held as integer minor
 * units (cents). Arithmetic only ever happens on the integers.
 */

// DECIMAL(10,2): 99,999,999.99
export const MAX_AMOUNT_CENTS = 9_999_999_999;

const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d+))?$/;

export type ParsedAmount = { ok: true; cents: number } | { ok: false; error: string };

export function parseAmount(value: unknown): ParsedAmount {
  let text: string;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return { ok: false, error: 'Amount must be a valid number' };
    }
    // Shortest round-trip form, so 12.5 reads as "12.5" and 0.1 + 0.2 keeps its noise
    text = String(value);
  } else if (typeof value === 'string') {
    text = value.trim();
  } else {
    return { ok: false, error: 'Amount must be a number or a decimal string' };
  }

  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    return { ok: false, error: 'Amount must be a valid number' };
  }

  const [, sign, whole, fraction = ''] = match;
  if (fraction.length > 2) {
    return { ok: false, error: 'Amount can have at most 2 decimal places' };
  }
  if (whole.length > 11) {
    return { ok: false, error: 'Amount exceeds maximum allowed value' };
  }

  const cents = Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
  return { ok: true, cents: sign === '-' ? -cents : cents };
}

export function formatAmount(cents: number): string {
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${cents < 0 ? '-' : ''}${whole}.${fraction}`;
}

export function sumAmounts(amounts: readonly number[]): number {
  return amounts.reduce((total, cents) => total + cents, 0);
}
