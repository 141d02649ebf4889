/**
 * Receipt Split MCP Server - Exact Rational Arithmetic
 *
 * Shares of an item are kept as exact fractions of a minor unit until the
 * final rounding step, so repeated division never drops a cent.
 */

function gcd(a: bigint, b: bigint): bigint {
  let x = a < 0n ? -a : a;
  let y = b < 0n ? -b : b;
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

export class Fraction {
  static readonly ZERO = new Fraction(0n, 1n);

  readonly numerator: bigint;
  readonly denominator: bigint;

  private constructor(numerator: bigint, denominator: bigint) {
    // Denominator is always positive and the pair is always reduced.
    const sign = denominator < 0n ? -1n : 1n;
    const divisor = gcd(numerator, denominator) || 1n;
    this.numerator = (sign * numerator) / divisor;
    this.denominator = (sign * denominator) / divisor;
  }

  static of(numerator: bigint | number, denominator: bigint | number = 1n): Fraction {
    const den = BigInt(denominator);
    if (den === 0n) {
      throw new RangeError('Fraction denominator must not be zero');
    }
    return new Fraction(BigInt(numerator), den);
  }

  add(other: Fraction): Fraction {
    return new Fraction(
      this.numerator * other.denominator + other.numerator * this.denominator,
      this.denominator * other.denominator
    );
  }

  sub(other: Fraction): Fraction {
    return this.add(new Fraction(-other.numerator, other.denominator));
  }

  mul(other: Fraction): Fraction {
    return new Fraction(this.numerator * other.numerator, this.denominator * other.denominator);
  }

  div(other: Fraction): Fraction {
    if (other.numerator === 0n) {
      throw new RangeError('Division by zero');
    }
    return new Fraction(this.numerator * other.denominator, this.denominator * other.numerator);
  }

  compare(other: Fraction): number {
    const left = this.numerator * other.denominator;
    const right = other.numerator * this.denominator;
    return left === right ? 0 : left < right ? -1 : 1;
  }

  isZero(): boolean {
    return this.numerator === 0n;
  }

  /** Round to the nearest integer, ties to even. */
  roundHalfEven(): bigint {
    const floor = floorDiv(this.numerator, this.denominator);
    const remainder = this.numerator - floor * this.denominator; // 0 <= remainder < denominator
    const twice = remainder * 2n;

    if (twice < this.denominator) return floor;
    if (twice > this.denominator) return floor + 1n;
    return floor % 2n === 0n ? floor : floor + 1n;
  }

  toString(): string {
    return this.denominator === 1n ? `${this.numerator}` : `${this.numerator}/${this.denominator}`;
  }
}

function floorDiv(a: bigint, b: bigint): bigint {
  const quotient = a / b;
  return (a % b !== 0n) && ((a < 0n) !== (b < 0n)) ? quotient - 1n : quotient;
}
