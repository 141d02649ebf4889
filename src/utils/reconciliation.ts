/**
 * Receipt Split MCP Server - Reconciliation Checks
 *
 * Validates parsed items against the receipt's own arithmetic. Mismatches are
 * reported, never fatal, and no item is ever dropped because of one.
 */

import type {
  Anomaly,
  ItemCorrection,
  LineItem,
  ReceiptTotals,
  ReconciliationReport,
} from '../models/types.js';
import { formatMoney } from './money.js';
import { netPrice } from './parser.js';

/** Differences up to one minor unit are rounding on the receipt itself. */
export const TOLERANCE = 1;

function withinTolerance(a: number, b: number): boolean {
  return Math.abs(a - b) <= TOLERANCE;
}

/**
 * Items whose quantity × unit price is expected to equal the extended price.
 * Discounted and weighed items legitimately diverge; derived unit prices
 * match by construction.
 */
function isQuantityCheckable(item: LineItem): boolean {
  return item.unitPriceSource === 'printed' && item.discount === undefined && item.weight === undefined;
}

function correctExtendedPrice(item: LineItem, extendedPrice: number): LineItem {
  const corrected: LineItem = {
    ...item,
    extendedPrice,
    originalExtendedPrice: item.originalExtendedPrice ?? item.extendedPrice,
    corrected: true,
    correctedBy: 'reconciliation',
  };
  return Object.freeze(corrected);
}

/**
 * Check parsed items against the receipt totals.
 *
 * An item failing the quantity check is re-derived from quantity × unit
 * price only when a declared subtotal exists and the re-derived value makes
 * the items add up to it. Otherwise the printed extended price stands, and
 * an item corrected by hand always keeps its value.
 */
export function reconcileReceipt(
  parsedItems: readonly LineItem[],
  totals: ReceiptTotals,
  currency: string = 'USD'
): ReconciliationReport {
  const items = [...parsedItems];
  const anomalies: Anomaly[] = [];
  const corrections: ItemCorrection[] = [];
  const subtotalDeclared = totals.sources.subtotal === 'declared';

  let itemSubtotal = items.reduce((sum, item) => sum + netPrice(item), 0);

  items.forEach((item, itemIndex) => {
    if (!isQuantityCheckable(item)) return;

    const expected = item.quantity * item.unitPrice;
    if (withinTolerance(expected, item.extendedPrice)) return;

    let detail = `${item.quantity} × ${formatMoney(item.unitPrice, currency)} = ${formatMoney(expected, currency)}, but the line shows ${formatMoney(item.extendedPrice, currency)}`;

    const adjusted = itemSubtotal - item.extendedPrice + expected;
    if (
      item.correctedBy !== 'user' &&
      subtotalDeclared &&
      !withinTolerance(itemSubtotal, totals.subtotal) &&
      withinTolerance(adjusted, totals.subtotal)
    ) {
      items[itemIndex] = correctExtendedPrice(item, expected);
      corrections.push({ itemIndex, field: 'extendedPrice', from: item.extendedPrice, to: expected });
      itemSubtotal = adjusted;
      detail += `; corrected to ${formatMoney(expected, currency)} to match the subtotal`;
    }

    anomalies.push({
      kind: 'QUANTITY_MISMATCH',
      itemIndex,
      lineNumber: item.sourceLineNumber,
      detail,
    });
  });

  if (subtotalDeclared && !withinTolerance(itemSubtotal, totals.subtotal)) {
    anomalies.push({
      kind: 'SUBTOTAL_MISMATCH',
      detail: `Items add up to ${formatMoney(itemSubtotal, currency)} but the receipt subtotal is ${formatMoney(totals.subtotal, currency)}`,
    });
  }

  if (totals.sources.grandTotal === 'declared') {
    const base = subtotalDeclared ? totals.subtotal : itemSubtotal;
    const expectedTotal = base + totals.taxAmount;
    if (!withinTolerance(expectedTotal, totals.grandTotal)) {
      anomalies.push({
        kind: 'TOTAL_MISMATCH',
        detail: `Subtotal ${formatMoney(base, currency)} + tax ${formatMoney(totals.taxAmount, currency)} = ${formatMoney(expectedTotal, currency)}, but the receipt total is ${formatMoney(totals.grandTotal, currency)}`,
      });
    }
  }

  return {
    items,
    anomalies,
    corrections,
    itemSubtotal,
    balanced: !anomalies.some(a => a.kind === 'SUBTOTAL_MISMATCH' || a.kind === 'TOTAL_MISMATCH'),
  };
}
