/**
 * Receipt Split MCP Server - Receipt Parser
 *
 * Turns decoded receipt text into ordered line items and footer totals.
 */

import { EmptyReceiptError } from '../models/errors.js';
import type {
  ItemLine,
  LineItem,
  ParsedReceipt,
  ParseOptions,
  ParseWarning,
  ReceiptTotals,
} from '../models/types.js';
import { classifyLine, extractOrderDate } from './classifier.js';

// Name-only lines carried into the next item's description.
const MAX_CONTINUATION_LINES = 2;

interface DraftItem {
  line: ItemLine;
  name: string;
  discount: number;
}

/**
 * Parse one receipt.
 *
 * Discount lines attach to the nearest preceding item. The first subtotal,
 * tax and total lines fill the totals; missing ones are derived bottom-up.
 *
 * @throws EmptyReceiptError when no item line exists, or a total line is
 *   reached before any item
 */
export function parseReceipt(text: string, options: ParseOptions = {}): ParsedReceipt {
  const defaultTaxable = options.defaultTaxable ?? true;
  const lines = text.split(/\r?\n/);

  const drafts: DraftItem[] = [];
  const warnings: ParseWarning[] = [];
  let pending: string[] = [];

  let subtotal: number | undefined;
  let taxAmount: number | undefined;
  let grandTotal: number | undefined;

  for (const [i, raw] of lines.entries()) {
    const classified = classifyLine(raw, i + 1);

    if (classified.kind === 'NOISE') {
      if (classified.reason === 'unpriced') {
        pending = [...pending, classified.text].slice(-MAX_CONTINUATION_LINES);
      } else {
        pending = [];
      }
      continue;
    }

    switch (classified.kind) {
      case 'ITEM': {
        // A price-only line ("Qty 2 $7.00") takes its name from the lines above it.
        const name = classified.name || pending.join(' ');
        drafts.push({ line: classified, name: name || `Line ${classified.lineNumber}`, discount: 0 });
        break;
      }
      case 'DISCOUNT': {
        const target = drafts[drafts.length - 1];
        if (target) {
          target.discount += classified.amount;
        } else {
          warnings.push({
            kind: 'ORPHAN_DISCOUNT',
            lineNumber: classified.lineNumber,
            detail: `Discount "${classified.text}" has no item before it and was ignored`,
          });
        }
        break;
      }
      case 'SUBTOTAL':
        subtotal ??= classified.amount;
        break;
      case 'TAX':
        taxAmount ??= classified.amount;
        break;
      case 'TOTAL':
        if (drafts.length === 0) {
          throw new EmptyReceiptError(classified.lineNumber);
        }
        grandTotal ??= classified.amount;
        break;
    }
    pending = [];
  }

  if (drafts.length === 0) {
    throw new EmptyReceiptError();
  }

  const items = drafts.map((draft, index) => {
    const item = toLineItem(draft, defaultTaxable);
    warnings.push(...warningsFor(draft, item, index));
    return item;
  });

  return {
    items,
    totals: deriveTotals(items, subtotal, taxAmount, grandTotal),
    warnings,
    orderDate: extractOrderDate(text),
  };
}

// ============================================================================
// Helpers
// ============================================================================

function toLineItem(draft: DraftItem, defaultTaxable: boolean): LineItem {
  const { line } = draft;
  const item: LineItem = {
    kind: 'line',
    name: draft.name,
    quantity: line.quantity,
    unitPrice: line.unitPrice,
    extendedPrice: line.extendedPrice,
    isTaxable: line.taxFlag ?? defaultTaxable,
    ...(draft.discount !== 0 ? { discount: draft.discount } : {}),
    sourceLineNumber: line.lineNumber,
    unitPriceSource: line.unitPriceSource,
    ...(line.weight ? { weight: line.weight } : {}),
    corrected: false,
  };
  return Object.freeze(item);
}

function warningsFor(draft: DraftItem, item: LineItem, itemIndex: number): ParseWarning[] {
  const found: ParseWarning[] = [];
  const lineNumber = item.sourceLineNumber;

  if (draft.line.malformedToken !== undefined) {
    found.push({
      kind: 'MALFORMED_PRICE',
      itemIndex,
      lineNumber,
      detail: `Could not read price "${draft.line.malformedToken}" for "${item.name}"`,
    });
  }
  if (item.extendedPrice === 0) {
    found.push({
      kind: 'ZERO_PRICE',
      itemIndex,
      lineNumber,
      detail: `"${item.name}" has a zero price and needs a manual correction`,
    });
  }
  return found;
}

/** Extended price after any discount. */
export function netPrice(item: { extendedPrice: number; discount?: number }): number {
  return item.extendedPrice + (item.discount ?? 0);
}

function deriveTotals(
  items: LineItem[],
  subtotal: number | undefined,
  taxAmount: number | undefined,
  grandTotal: number | undefined
): ReceiptTotals {
  const itemSum = items.reduce((sum, item) => sum + netPrice(item), 0);
  const resolvedSubtotal = subtotal ?? itemSum;
  const resolvedTax = taxAmount ?? 0;

  return {
    subtotal: resolvedSubtotal,
    taxAmount: resolvedTax,
    grandTotal: grandTotal ?? resolvedSubtotal + resolvedTax,
    sources: {
      subtotal: subtotal === undefined ? 'derived' : 'declared',
      taxAmount: taxAmount === undefined ? 'derived' : 'declared',
      grandTotal: grandTotal === undefined ? 'derived' : 'declared',
    },
  };
}
