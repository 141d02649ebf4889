/**
 * Receipt Split MCP Server - Line Classifier
 *
 * Tags each receipt line as ITEM, DISCOUNT, SUBTOTAL, TAX, TOTAL or NOISE.
 * Matchers are tried in descending priority; the first one that recognises
 * the line wins, so overlapping patterns ("Total Savings" vs "Total") are
 * settled by the table below rather than by regex order in code.
 */

import type {
  ClassifiedLine,
  ItemLine,
  LineKind,
  WeightUnit,
} from '../models/types.js';
import { toMinorUnits } from './money.js';

export interface LineMatcher {
  name: string;
  kind: LineKind;
  priority: number;
  match(line: string, lineNumber: number): ClassifiedLine | null;
}

// ============================================================================
// Shared Patterns
// ============================================================================

const PRICE = String.raw`\d{1,3}(?:,\d{3})+\.\d{2}|\d+\.\d{2}`;
const MONEY = String.raw`\$?\s*(${PRICE})`;
const TAX_FLAG = String.raw`(?:\s+([TXNF]))?`;

const TRAILING_PRICE = new RegExp(String.raw`^(.*?)\s*${MONEY}${TAX_FLAG}\s*$`, 'i');
const NEGATIVE_PRICE = new RegExp(
  String.raw`^(.*?)\s*(?:-\s*\$?\s*(${PRICE})|\$?\s*(${PRICE})\s*-|\(\s*\$?\s*(${PRICE})\s*\))${TAX_FLAG}\s*$`,
  'i'
);

const ORDER_DATE = /\b([A-Z][a-z]{2,8} \d{1,2}, \d{4}) order\b/;

// Footer, payment and discount words count only as the line's own label, so
// product names such as "Total Whitening Toothpaste" stay items.
const NOISE_LABEL = /^\s*(?:(?:visa|mastercard|amex|discover|debit|credit|cash|change(?: due)?|payment|card ending|approval|auth(?:orization)?|total savings|you saved|items? sold|thank you|order number)\b|(?:order|store|ref|tc|st|op|te|tr)\s*#|#\s*items)/i;
const TENDER = /\b(?:tend|change due|card ending|auth code)\b/i;
const SUBTOTAL_KEYWORD = /^\s*sub\s*-?\s*total\b[^a-z]*$/i;
const TAX_KEYWORD = /^\s*(?:sales\s+)?(?:tax|hst|gst|vat)\b[^a-z]*$/i;
const TOTAL_KEYWORD = /^\s*(?:grand\s+|order\s+)?(?:total|amount due|balance due)\b[^a-z]*$/i;
const DISCOUNT_KEYWORD = /^\s*(?:[\w.]+\s+)?(?:discount|coupon|rollback|savings|promo|markdown)(?:\s+[\w.%#]+)?\s*$/i;

// "Qty 2", "2 @ 1.99" or "2.31 lb @" mark a purchased item, never a footer.
const QUANTITY_NOTATION = /\bQty\s+\d+|\d\s*@|\d\s*(?:lb|kg|oz)\s*@/i;

function priceOf(token: string | undefined): number {
  return token === undefined ? 0 : toMinorUnits(token) ?? 0;
}

function taxFlagOf(flag: string | undefined): boolean | undefined {
  if (!flag) return undefined;
  return /[TX]/i.test(flag);
}

function cleanName(raw: string): string {
  return raw.replace(/\s+/g, ' ').trim();
}

/** Exact division rounded half-to-even, for unit prices derived from a line total. */
export function divideHalfEven(amount: number, divisor: number): number {
  const floor = Math.floor(amount / divisor);
  const twice = (amount - floor * divisor) * 2;
  if (twice < divisor) return floor;
  if (twice > divisor) return floor + 1;
  return floor % 2 === 0 ? floor : floor + 1;
}

function totalsMatcher(
  name: string,
  kind: 'SUBTOTAL' | 'TAX' | 'TOTAL',
  priority: number,
  keyword: RegExp
): LineMatcher {
  return {
    name,
    kind,
    priority,
    match(line, lineNumber) {
      if (QUANTITY_NOTATION.test(line)) return null;
      const priced = line.match(TRAILING_PRICE);
      if (!priced || !keyword.test(priced[1])) return null;
      return { kind, lineNumber, amount: priceOf(priced[2]) };
    },
  };
}

// ============================================================================
// Matcher Table
// ============================================================================

export const LINE_MATCHERS: readonly LineMatcher[] = [
  {
    name: 'blank',
    kind: 'NOISE',
    priority: 100,
    match(line, lineNumber) {
      return line.trim() === '' ? { kind: 'NOISE', lineNumber, text: '', reason: 'blank' } : null;
    },
  },
  {
    name: 'order-date',
    kind: 'NOISE',
    priority: 95,
    match(line, lineNumber) {
      return ORDER_DATE.test(line)
        ? { kind: 'NOISE', lineNumber, text: line.trim(), reason: 'order-date' }
        : null;
    },
  },
  {
    name: 'noise-keyword',
    kind: 'NOISE',
    priority: 90,
    match(line, lineNumber) {
      if (QUANTITY_NOTATION.test(line)) return null;
      return NOISE_LABEL.test(line) || TENDER.test(line)
        ? { kind: 'NOISE', lineNumber, text: line.trim(), reason: 'keyword' }
        : null;
    },
  },
  totalsMatcher('subtotal', 'SUBTOTAL', 80, SUBTOTAL_KEYWORD),
  totalsMatcher('tax', 'TAX', 70, TAX_KEYWORD),
  totalsMatcher('total', 'TOTAL', 60, TOTAL_KEYWORD),
  {
    name: 'discount',
    kind: 'DISCOUNT',
    priority: 50,
    match(line, lineNumber) {
      const negative = line.match(NEGATIVE_PRICE);
      if (negative) {
        const amount = priceOf(negative[2] ?? negative[3] ?? negative[4]);
        return { kind: 'DISCOUNT', lineNumber, amount: -amount, text: line.trim() };
      }
      const priced = line.match(TRAILING_PRICE);
      if (priced && !QUANTITY_NOTATION.test(line) && DISCOUNT_KEYWORD.test(priced[1])) {
        return { kind: 'DISCOUNT', lineNumber, amount: -priceOf(priced[2]), text: line.trim() };
      }
      return null;
    },
  },
  {
    // BANANAS 2.31 lb @ 0.58 /lb 1.34 N
    name: 'weight-item',
    kind: 'ITEM',
    priority: 40,
    match(line, lineNumber) {
      const pattern = new RegExp(
        String.raw`^(.*?)\s*(\d+(?:\.\d+)?)\s*(lb|kg|oz)\s*@\s*${MONEY}\s*\/\s*(?:lb|kg|oz)\s+${MONEY}${TAX_FLAG}\s*$`,
        'i'
      );
      const m = line.match(pattern);
      if (!m) return null;
      const item: ItemLine = {
        kind: 'ITEM',
        lineNumber,
        name: cleanName(m[1]),
        quantity: 1,
        unitPrice: priceOf(m[4]),
        extendedPrice: priceOf(m[5]),
        unitPriceSource: 'printed',
        taxFlag: taxFlagOf(m[6]),
        weight: { amount: m[2], unit: toWeightUnit(m[3]) },
      };
      return item;
    },
  },
  {
    // BREAD 2 @ 2.00 4.00 N
    name: 'quantity-at-price',
    kind: 'ITEM',
    priority: 35,
    match(line, lineNumber) {
      const pattern = new RegExp(
        String.raw`^(.*?)\s*(\d+)\s*@\s*${MONEY}(?:\s*(?:ea|each))?\s+${MONEY}${TAX_FLAG}\s*$`,
        'i'
      );
      const m = line.match(pattern);
      if (!m) return null;
      return {
        kind: 'ITEM',
        lineNumber,
        name: cleanName(m[1]),
        quantity: Number.parseInt(m[2], 10),
        unitPrice: priceOf(m[3]),
        extendedPrice: priceOf(m[4]),
        unitPriceSource: 'printed',
        taxFlag: taxFlagOf(m[5]),
      };
    },
  },
  {
    // Great Value Whole Milk Qty 2 $7.00
    name: 'online-qty',
    kind: 'ITEM',
    priority: 30,
    match(line, lineNumber) {
      const pattern = new RegExp(String.raw`^(.*?)\s*\bQty\s+(\d+)\s+${MONEY}${TAX_FLAG}\s*$`, 'i');
      const m = line.match(pattern);
      if (!m) return null;
      const quantity = Math.max(1, Number.parseInt(m[2], 10));
      const extendedPrice = priceOf(m[3]);
      return {
        kind: 'ITEM',
        lineNumber,
        name: cleanName(m[1]),
        quantity,
        unitPrice: divideHalfEven(extendedPrice, quantity),
        extendedPrice,
        unitPriceSource: 'derived',
        taxFlag: taxFlagOf(m[4]),
      };
    },
  },
  {
    // MILK 3.50 T
    name: 'single-price',
    kind: 'ITEM',
    priority: 20,
    match(line, lineNumber) {
      const m = line.match(TRAILING_PRICE);
      if (!m || cleanName(m[1]) === '') return null;
      const price = priceOf(m[2]);
      return {
        kind: 'ITEM',
        lineNumber,
        name: cleanName(m[1]),
        quantity: 1,
        unitPrice: price,
        extendedPrice: price,
        unitPriceSource: 'printed',
        taxFlag: taxFlagOf(m[3]),
      };
    },
  },
  {
    // EGGS Qty 1 $N/A -- a price marker followed by something unreadable
    name: 'malformed-price',
    kind: 'ITEM',
    priority: 10,
    match(line, lineNumber) {
      const m = line.match(/^(.*?)\s*(?:\bQty\s+(\d+)\s+)?\$\s*(\S*)\s*$/i);
      if (!m || SUBTOTAL_KEYWORD.test(m[1]) || TAX_KEYWORD.test(m[1]) || TOTAL_KEYWORD.test(m[1])) {
        return null;
      }
      const quantity = m[2] ? Math.max(1, Number.parseInt(m[2], 10)) : 1;
      // Best effort: "3.5" still reads as 3.50, anything else becomes zero.
      const extendedPrice = toMinorUnits(m[3]) ?? 0;
      return {
        kind: 'ITEM',
        lineNumber,
        name: cleanName(m[1]),
        quantity,
        unitPrice: divideHalfEven(extendedPrice, quantity),
        extendedPrice,
        unitPriceSource: m[2] ? 'derived' : 'printed',
        malformedToken: m[3],
      };
    },
  },
  {
    name: 'unpriced',
    kind: 'NOISE',
    priority: 0,
    match(line, lineNumber) {
      return { kind: 'NOISE', lineNumber, text: cleanName(line), reason: 'unpriced' };
    },
  },
];

function toWeightUnit(raw: string): WeightUnit {
  const unit = raw.toLowerCase();
  return unit === 'kg' || unit === 'oz' ? unit : 'lb';
}

const ORDERED_MATCHERS = [...LINE_MATCHERS].sort((a, b) => b.priority - a.priority);

/**
 * Classify one line. `lineNumber` is 1-based and travels with the result
 * for traceability.
 */
export function classifyLine(line: string, lineNumber: number): ClassifiedLine {
  for (const matcher of ORDERED_MATCHERS) {
    const result = matcher.match(line, lineNumber);
    if (result) return result;
  }
  // The unpriced matcher accepts every line.
  return { kind: 'NOISE', lineNumber, text: cleanName(line), reason: 'unpriced' };
}

/** Pull the "Mar 3, 2024" part out of an online order header, if present. */
export function extractOrderDate(text: string): string | undefined {
  return text.match(ORDER_DATE)?.[1];
}
