import { MaybeNumber } from '../types.js';

const NO_VALUE_LITERALS = new Set(['n/a', 'no data', '--', '-', '—']);

const SUFFIX_EXPONENTS: Record<string, number> = {
  K: 3,
  M: 6,
  B: 9,
  T: 12
};

const PLAIN_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

function parsePlainNumber(text: string): MaybeNumber {
  const cleaned = text.replace(/,/g, '');
  if (!PLAIN_NUMBER.test(cleaned)) {
    return null;
  }
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

/**
 * Turns a scraped display value ("$141.86B", "100B XRP", "1,234.5") into a
 * number. Returns null for empty text, "N/A"-style placeholders and anything
 * that does not parse. Never throws.
 */
export function normalizeValue(raw: string | null | undefined): MaybeNumber {
  if (typeof raw !== 'string') {
    return null;
  }

  const text = raw.trim();
  if (text === '' || NO_VALUE_LITERALS.has(text.toLowerCase())) {
    return null;
  }

  const token = text.split(/\s+/).find(part => /\d/.test(part));
  if (!token) {
    return null;
  }

  const valueText = token.startsWith('$') ? token.slice(1) : token;
  const last = valueText.charAt(valueText.length - 1);

  if (/[a-z]/i.test(last)) {
    const exponent = SUFFIX_EXPONENTS[last.toUpperCase()];
    if (exponent === undefined) {
      return null;
    }
    const mantissa = valueText.slice(0, -1).replace(/,/g, '');
    if (!PLAIN_NUMBER.test(mantissa) || /e/i.test(mantissa)) {
      return null;
    }
    // scale in decimal so "141.86B" lands on 141860000000 exactly
    const scaled = Number(`${mantissa}e${exponent}`);
    return Number.isFinite(scaled) ? scaled : null;
  }

  return parsePlainNumber(valueText);
}

/** Same as normalizeValue for percentage text such as "2.35%". */
export function normalizePercent(raw: string | null | undefined): MaybeNumber {
  if (typeof raw !== 'string') {
    return null;
  }
  return normalizeValue(raw.split('%')[0]);
}

/** Lower-cased label text with punctuation removed, for loose label matching. */
export function normalizeLabel(text: string): string {
  return text
    .replace(/\u00a0/g, ' ')
    .replace(/[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

export function formatMaybe(value: MaybeNumber, format: (value: number) => string): string {
  return value === null ? 'N/A' : format(value);
}
