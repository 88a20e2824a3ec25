import { InvalidAmountError } from "../../common/errors";

// 10 billion in major units; keeps every per-user total a safe integer of cents.
export const MAX_AMOUNT_CENTS = 1_000_000_000_000;

const NUMERAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;
const STORED_AMOUNT_PATTERN = /^(-?)(\d+)\.(\d{2})$/;
const MAX_EXPONENT = 400;
// An underscore is only allowed between two digits, as in `"1_000"`.
const MISPLACED_UNDERSCORE = /(?:^|\D)_|_(?:\D|$)/;

/**
 * Parses user input such as `"1000"`, `"1000,50"` or `" 12.5 "` into cents.
 *
 * Comma is accepted as the decimal separator and underscores may group
 * digits. The value is quantized to two decimals with round-half-even, so
 * `"0.015"` becomes 2 cents and `"2.665"` becomes 266. Anything that is not
 * a numeral, is not positive after quantization, or exceeds
 * {@link MAX_AMOUNT_CENTS} is rejected.
 */
export function parseAmount(raw: string): number {
  const normalized = raw.replace(/,/g, ".").trim();
  if (MISPLACED_UNDERSCORE.test(normalized)) {
    throw new InvalidAmountError(`Invalid amount: "${raw}"`);
  }
  const match = NUMERAL_PATTERN.exec(normalized.replace(/_/g, ""));
  if (!match) {
    throw new InvalidAmountError(`Invalid amount: "${raw}"`);
  }

  const [, sign, whole = "", fraction = "", exponentText] = match;
  if (whole === "" && fraction === "") {
    throw new InvalidAmountError(`Invalid amount: "${raw}"`);
  }

  const exponent = exponentText === undefined ? 0 : Number(exponentText);
  if (!Number.isSafeInteger(exponent) || Math.abs(exponent) > MAX_EXPONENT) {
    throw new InvalidAmountError(`Invalid amount: "${raw}"`);
  }

  const cents = quantizeToCents(whole, fraction, exponent);
  if (sign === "-" || cents === 0) {
    throw new InvalidAmountError();
  }
  if (cents === null || cents > MAX_AMOUNT_CENTS) {
    throw new InvalidAmountError("Amount exceeds allowed limits");
  }
  return cents;
}

// Returns null when the magnitude cannot be represented as a safe integer.
function quantizeToCents(
  whole: string,
  fraction: string,
  exponent: number
): number | null {
  let integerDigits = whole;
  let fractionDigits = fraction;

  if (exponent > 0) {
    const padded = fractionDigits.padEnd(exponent, "0");
    integerDigits += padded.slice(0, exponent);
    fractionDigits = padded.slice(exponent);
  } else if (exponent < 0) {
    const padded = integerDigits.padStart(-exponent, "0");
    fractionDigits = padded.slice(padded.length + exponent) + fractionDigits;
    integerDigits = padded.slice(0, padded.length + exponent);
  }

  integerDigits = integerDigits.replace(/^0+/, "");
  const kept = fractionDigits.slice(0, 2).padEnd(2, "0");
  const rest = fractionDigits.slice(2);

  const digits = `${integerDigits}${kept}`;
  if (digits.length > 16) {
    return null;
  }

  let cents = Number(digits);
  if (roundsUp(rest, cents)) {
    cents += 1;
  }
  return Number.isSafeInteger(cents) ? cents : null;
}

function roundsUp(rest: string, cents: number): boolean {
  if (rest === "" || rest[0] < "5") {
    return false;
  }
  if (rest[0] > "5" || /[1-9]/.test(rest.slice(1))) {
    return true;
  }
  return cents % 2 === 1;
}

/** Reads back a stored fixed two-decimal string such as `"-12.30"`. */
export function parseCents(value: string): number | null {
  const match = STORED_AMOUNT_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  const [, sign, units, hundredths] = match;
  const magnitude = Number(units) * 100 + Number(hundredths);
  if (!Number.isSafeInteger(magnitude)) {
    return null;
  }
  return sign === "-" && magnitude > 0 ? -magnitude : magnitude;
}

function formatHundredths(value: number): string {
  const sign = value < 0 ? "-" : "";
  const magnitude = Math.abs(value);
  const units = Math.floor(magnitude / 100);
  const hundredths = String(magnitude % 100).padStart(2, "0");
  return `${sign}${units}.${hundredths}`;
}

export function formatCents(cents: number): string {
  return formatHundredths(cents);
}

/** Renders basis points as a percent string, e.g. `-7000` as `"-70.00"`. */
export function formatBasisPoints(basisPoints: number): string {
  return formatHundredths(basisPoints);
}
