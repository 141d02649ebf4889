/**
 * Receipt Split MCP Server - Text Summaries
 *
 * Renders sessions and allocation results as plain text for tool responses.
 */

import type {
  AllocationResult,
  AssignmentSnapshot,
  BillItem,
  ReceiptSession,
  ReceiptTotals,
  Warning,
} from '../models/types.js';
import { sessionItems } from '../store/store.js';
import { formatMoney } from './money.js';
import { netPrice } from './parser.js';

/**
 * Format one item as a numbered line.
 * Item numbers shown to people are 1-based.
 */
export function formatItem(item: BillItem, index: number, currency: string): string {
  const parts = [`${index + 1}. ${item.name}`];

  if (item.kind === 'line' && item.weight) {
    parts.push(`${item.weight.amount} ${item.weight.unit} @ ${formatMoney(item.unitPrice, currency)}/${item.weight.unit}`);
  } else if (item.quantity > 1) {
    parts.push(`${item.quantity} × ${formatMoney(item.unitPrice, currency)}`);
  }
  parts.push(formatMoney(item.extendedPrice, currency));

  if (item.discount) {
    parts.push(`discount ${formatMoney(item.discount, currency)} → ${formatMoney(netPrice(item), currency)}`);
  }

  const flags: string[] = [];
  if (item.isTaxable) flags.push('taxable');
  if (item.kind === 'custom') flags.push('added');
  if (item.kind === 'line' && item.corrected) flags.push('corrected');
  if (netPrice(item) === 0) flags.push('CHECK PRICE');

  return `  ${parts.join(' | ')}${flags.length ? ` [${flags.join(', ')}]` : ''}`;
}

export function formatTotals(totals: ReceiptTotals, currency: string): string {
  const mark = (source: string) => (source === 'derived' ? ' (derived)' : '');
  return [
    `Subtotal: ${formatMoney(totals.subtotal, currency)}${mark(totals.sources.subtotal)}`,
    `Tax: ${formatMoney(totals.taxAmount, currency)}${mark(totals.sources.taxAmount)}`,
    `**Total: ${formatMoney(totals.grandTotal, currency)}**${mark(totals.sources.grandTotal)}`,
  ].join('\n');
}

export function formatWarnings(warnings: readonly Warning[]): string {
  return warnings
    .map(w => {
      const where = w.itemIndex !== undefined
        ? ` (item ${w.itemIndex + 1})`
        : w.lineNumber !== undefined ? ` (line ${w.lineNumber})` : '';
      return `  ⚠ ${w.kind}${where}: ${w.detail}`;
    })
    .join('\n');
}

/**
 * Parse warnings that still apply. A manual correction resolves the
 * warnings raised for that item.
 */
export function openWarnings(session: ReceiptSession): Warning[] {
  const items = session.reconciliation.items;
  const parseWarnings = session.receipt.warnings.filter(w => {
    if (w.itemIndex === undefined) return true;
    const item = items[w.itemIndex];
    return !(item && item.correctedBy === 'user' && netPrice(item) !== 0);
  });
  return [...parseWarnings, ...session.reconciliation.anomalies];
}

export function formatAssignment(session: ReceiptSession, snapshot: AssignmentSnapshot): string {
  const items = sessionItems(session);
  return items
    .map((item, index) => {
      const weights = snapshot.entries.get(index);
      if (!weights || weights.size === 0) {
        return `  ${index + 1}. ${item.name} → (unassigned)`;
      }
      const values = Array.from(weights.values());
      const equal = values.every(v => v === values[0]);
      const who = Array.from(weights.entries())
        .map(([personId, weight]) => (equal ? personId : `${personId} ×${weight}`))
        .join(', ');
      return `  ${index + 1}. ${item.name} → ${who}`;
    })
    .join('\n');
}

/**
 * Per-person breakdown: each person's total, then the items they share in
 * with their part of each item's price.
 */
export function formatSplitSummary(
  session: ReceiptSession,
  snapshot: AssignmentSnapshot,
  result: AllocationResult
): string {
  const { currency } = session;
  const items = sessionItems(session);
  const lines: string[] = [];

  if (session.receipt.orderDate) {
    lines.push(`${session.receipt.orderDate}:`, '');
  }

  for (const summary of result.people.values()) {
    lines.push(
      `**${summary.personId}: ${formatMoney(summary.total, currency)}** ` +
      `(items ${formatMoney(summary.itemShare, currency)} + tax ${formatMoney(summary.taxShare, currency)})`
    );

    items.forEach((item, index) => {
      const weights = snapshot.entries.get(index);
      const weight = weights?.get(summary.personId);
      if (!weights || weight === undefined) return;

      const totalWeight = Array.from(weights.values()).reduce((sum, w) => sum + w, 0);
      const portion = weights.size === 1 ? '' : ` (${weight} of ${totalWeight} shares)`;
      const amount = result.itemAmounts.get(index)?.get(summary.personId) ?? 0;
      lines.push(`  - ${item.name}${portion} – ${formatMoney(amount, currency)}`);
    });
    lines.push('');
  }

  lines.push(`Grand Total = ${formatMoney(result.allocatedTotal, currency)}`);
  if (result.roundingAdjustment > 0) {
    lines.push(`Rounding: ${result.roundingAdjustment} minor unit(s) assigned by largest remainder`);
  }
  if (result.residual !== 0) {
    lines.push(`Residual vs. receipt: ${formatMoney(result.residual, currency)}`);
  }

  return lines.join('\n');
}
