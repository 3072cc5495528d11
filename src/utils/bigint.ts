export function toBigInt(value: unknown): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) throw new RangeError(`Not a safe integer: ${value}`);
    return BigInt(value);
  }
  if (typeof value === 'string') {
    const s = value.trim().replace(/[_,]/g, '');
    if (!s) throw new TypeError('Empty string cannot be converted to bigint');
    if (!/^-?\d+$/.test(s)) throw new TypeError(`Not an integer amount: ${value}`);
    return BigInt(s);
  }
  throw new TypeError(`Cannot convert type ${typeof value} to BigInt`);
}

export function bigintToDb(v: bigint): string { return v.toString(); }

export function dbToBigint(v: unknown): bigint {
  if (typeof v === 'string' || typeof v === 'number' || typeof v === 'bigint') return toBigInt(v);
  throw new TypeError(`Unexpected DB bigint type: ${typeof v}`);
}

export function pow10(exp: number): bigint {
  if (!Number.isInteger(exp) || exp < 0) throw new RangeError(`Invalid decimal exponent: ${exp}`);
  return 10n ** BigInt(exp);
}

// floor for non-negative operands
export function floorDiv(num: bigint, den: bigint): bigint {
  if (den <= 0n) throw new RangeError('Division by non-positive bigint');
  return num / den;
}

export function ceilDiv(num: bigint, den: bigint): bigint {
  if (den <= 0n) throw new RangeError('Division by non-positive bigint');
  if (num <= 0n) return num / den;
  return (num + den - 1n) / den;
}

export function minBigint(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

/**
 * Render a base-unit amount with `decimals` fractional digits, trimming
 * trailing zeros: formatUnits(150000000n, 8) === '1.5'.
 */
export function formatUnits(amount: bigint, decimals: number): string {
  const neg = amount < 0n;
  const abs = neg ? -amount : amount;
  const scale = pow10(decimals);
  const whole = (abs / scale).toString().replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const frac = decimals > 0 ? (abs % scale).toString().padStart(decimals, '0').replace(/0+$/, '') : '';
  return `${neg ? '-' : ''}${whole}${frac ? `.${frac}` : ''}`;
}

export function jsonStringifySafeBigint(obj: unknown): string {
  return JSON.stringify(obj, (_, val) => (typeof val === 'bigint' ? val.toString() : val));
}
