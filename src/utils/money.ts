/**
 * Receipt Split MCP Server - Money Utilities
 *
 * Conversion between printed/typed amounts and integer minor units.
 */

import { SUPPORTED_CURRENCIES } from '../models/types.js';

function decimalsFor(currency: string): number {
  return SUPPORTED_CURRENCIES[currency]?.decimals ?? 2;
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Format an amount in minor units to a readable string.
 * Works on the integer digits so large values never pick up float noise.
 */
export function formatMoney(amount: number, currency: string): string {
  const config = SUPPORTED_CURRENCIES[currency] || { symbol: currency + ' ', decimals: 2 };
  const sign = amount < 0 ? '-' : '';
  const digits = Math.abs(amount).toString().padStart(config.decimals + 1, '0');

  if (config.decimals === 0) {
    return `${sign}${config.symbol}${digits}`;
  }

  const whole = digits.slice(0, digits.length - config.decimals);
  const fraction = digits.slice(digits.length - config.decimals);
  return `${sign}${config.symbol}${whole}.${fraction}`;
}

// ============================================================================
// Parsing
// ============================================================================

const PRICE_TOKEN = /^(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d+))?$/;

/**
 * Convert a printed price token ("1,299.00", "3.5", "12") to minor units.
 * Returns undefined when the token is not a plain non-negative number or
 * carries more fraction digits than the currency allows.
 */
export function toMinorUnits(token: string, currency: string = 'USD'): number | undefined {
  const match = token.trim().match(PRICE_TOKEN);
  if (!match) return undefined;

  const decimals = decimalsFor(currency);
  const whole = match[1].replace(/,/g, '');
  const fraction = match[2] ?? '';
  if (fraction.length > decimals) return undefined;

  return Number.parseInt(whole + fraction.padEnd(decimals, '0'), 10);
}

/**
 * Convert an amount typed in major units (12.99), as tools receive it, to
 * minor units.
 */
export function parseMoney(value: number, currency: string = 'USD'): number {
  return Math.round(value * Math.pow(10, decimalsFor(currency)));
}
