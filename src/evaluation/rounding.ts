/**
 * Half-to-even rounding on exact decimal digits
 */

const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?$/;

// Above this magnitude a double has no digits past the fifth decimal place
const EXACT_MAGNITUDE = 1e15;

/**
 * Round a plain decimal string such as "-12.3456789" to `places` fractional
 * digits, ties going to the even neighbour, and return the closest double.
 */
export function roundDecimalString(digits: string, places: number): number {
  const match = DECIMAL_PATTERN.exec(digits.trim());
  if (!match || (match[2] === '' && !match[3])) {
    // "NaN", "Infinity", exponent notation
    return roundNumber(Number(digits), places);
  }

  const sign = match[1] === '-' ? '-' : '';
  const fraction = (match[3] ?? '').padEnd(places + 1, '0');
  const rest = fraction.slice(places);
  let scaled = BigInt((match[2] || '0') + fraction.slice(0, places));

  const tail = rest.slice(1);
  const aboveHalf = rest[0] > '5' || (rest[0] === '5' && /[1-9]/.test(tail));
  const exactHalf = rest[0] === '5' && !/[1-9]/.test(tail);
  if (aboveHalf || (exactHalf && scaled % 2n === 1n)) {
    scaled += 1n;
  }

  const text = scaled.toString().padStart(places + 1, '0');
  const cut = text.length - places;
  const result = Number(`${sign}${text.slice(0, cut)}.${text.slice(cut)}`);
  return result === 0 ? 0 : result;
}

/**
 * Round a double on its exact binary value. toFixed(30) is enough to tell a
 * true tie from a near-tie for every double that can sit on a tie.
 */
export function roundNumber(value: number, places: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= EXACT_MAGNITUDE) {
    return value === 0 ? 0 : value;
  }
  return roundDecimalString(value.toFixed(30), places);
}
