/**
 * Receipt Split MCP Server - Allocation Engine
 *
 * Splits every item among its assignees, spreads tax over each person's
 * taxable consumption, and rounds so the visible totals add up exactly.
 * A pure function of (items, assignment, tax): same input, same output.
 */

import {
  EmptyAssignmentError,
  InvalidWeightError,
  UnassignedItemError,
} from '../models/errors.js';
import type {
  AllocationResult,
  AllocationWarning,
  Assignment,
  BillItem,
  ItemIndex,
  PersonId,
  PersonSummary,
} from '../models/types.js';
import { Fraction } from './fraction.js';
import { netPrice } from './parser.js';

export interface AllocationInput {
  items: readonly BillItem[];
  assignment: Assignment;
  taxAmount: number;
  /** Receipt total as printed; enables the residual check. */
  declaredGrandTotal?: number;
  /** People to list even when they have nothing assigned. */
  people?: readonly PersonId[];
}

// ============================================================================
// Validation
// ============================================================================

/**
 * The exact value of a weight. Any finite double is an integer times a power
 * of two, and doubling is exact, so the fraction carries no rounding.
 */
function weightToFraction(weight: number): Fraction | undefined {
  if (!Number.isFinite(weight) || weight <= 0) return undefined;
  let scaled = weight;
  let exponent = 0n;
  while (!Number.isInteger(scaled)) {
    scaled *= 2;
    exponent += 1n;
  }
  return Fraction.of(BigInt(scaled), 2n ** exponent);
}

interface ResolvedItem {
  price: Fraction;
  isTaxable: boolean;
  assignees: { personId: PersonId; weight: Fraction }[];
  totalWeight: Fraction;
}

function resolveItems(items: readonly BillItem[], assignment: Assignment): ResolvedItem[] {
  return items.map((item, itemIndex) => {
    const weights = assignment.get(itemIndex);
    if (!weights) {
      throw new UnassignedItemError(itemIndex, item.name);
    }
    if (weights.size === 0) {
      throw new EmptyAssignmentError(itemIndex, item.name);
    }

    const assignees: ResolvedItem['assignees'] = [];
    let totalWeight = Fraction.ZERO;
    for (const [personId, raw] of weights) {
      const weight = weightToFraction(raw);
      if (!weight) {
        throw new InvalidWeightError(itemIndex, personId, raw);
      }
      assignees.push({ personId, weight });
      totalWeight = totalWeight.add(weight);
    }

    return {
      price: Fraction.of(netPrice(item)),
      isTaxable: item.isTaxable,
      assignees,
      totalWeight,
    };
  });
}

// ============================================================================
// Rounding
// ============================================================================

function comparePersonIds(a: PersonId, b: PersonId): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Round each exact share half-to-even, then hand the leftover minor units to
 * the largest remainders (or take them from the smallest) until the rounded
 * shares add up to `target`. Ties go to the lower person id.
 */
export function distributeLargestRemainder(
  exact: ReadonlyMap<PersonId, Fraction>,
  target: bigint
): { rounded: Map<PersonId, bigint>; adjustment: number } {
  const rounded = new Map<PersonId, bigint>();
  const remainders: { personId: PersonId; remainder: Fraction }[] = [];
  let sum = 0n;

  for (const [personId, share] of exact) {
    const value = share.roundHalfEven();
    rounded.set(personId, value);
    remainders.push({ personId, remainder: share.sub(Fraction.of(value)) });
    sum += value;
  }

  const diff = target - sum;
  if (diff === 0n || remainders.length === 0) {
    return { rounded, adjustment: 0 };
  }

  const step = diff > 0n ? 1n : -1n;
  remainders.sort((a, b) => {
    const byRemainder = diff > 0n ? b.remainder.compare(a.remainder) : a.remainder.compare(b.remainder);
    return byRemainder !== 0 ? byRemainder : comparePersonIds(a.personId, b.personId);
  });

  const count = Number(diff > 0n ? diff : -diff);
  for (let i = 0; i < count; i++) {
    const { personId } = remainders[i % remainders.length];
    rounded.set(personId, (rounded.get(personId) ?? 0n) + step);
  }

  return { rounded, adjustment: count };
}

// ============================================================================
// Allocation
// ============================================================================

function addTo(map: Map<PersonId, Fraction>, personId: PersonId, amount: Fraction): void {
  map.set(personId, (map.get(personId) ?? Fraction.ZERO).add(amount));
}

/**
 * Allocate all items and tax to people.
 *
 * @throws UnassignedItemError, EmptyAssignmentError, InvalidWeightError
 *   before any share is computed
 */
export function allocate(input: AllocationInput): AllocationResult {
  const { items, assignment, taxAmount, declaredGrandTotal, people = [] } = input;
  const resolved = resolveItems(items, assignment);
  const warnings: AllocationWarning[] = [];

  const itemShares = new Map<PersonId, Fraction>();
  const taxableShares = new Map<PersonId, Fraction>();
  for (const personId of people) {
    itemShares.set(personId, Fraction.ZERO);
  }

  let itemTotal = 0n;
  let taxableBase = Fraction.ZERO;

  const itemAmounts = new Map<ItemIndex, Map<PersonId, number>>();

  for (const [itemIndex, item] of resolved.entries()) {
    itemTotal += item.price.numerator;
    if (item.isTaxable) {
      taxableBase = taxableBase.add(item.price);
    }

    const shares = new Map<PersonId, Fraction>();
    for (const { personId, weight } of item.assignees) {
      const share = item.price.mul(weight).div(item.totalWeight);
      shares.set(personId, share);
      addTo(itemShares, personId, share);
      if (item.isTaxable) {
        addTo(taxableShares, personId, share);
      }
    }

    const { rounded } = distributeLargestRemainder(shares, item.price.numerator);
    itemAmounts.set(
      itemIndex,
      new Map(Array.from(rounded, ([personId, amount]): [PersonId, number] => [personId, Number(amount)]))
    );
  }

  // Tax follows consumption of taxable goods, not headcount.
  const tax = Fraction.of(taxAmount);
  const taxShares = new Map<PersonId, Fraction>();
  const taxAllocated = !taxableBase.isZero();
  for (const personId of itemShares.keys()) {
    const taxable = taxableShares.get(personId) ?? Fraction.ZERO;
    taxShares.set(personId, taxAllocated ? tax.mul(taxable).div(taxableBase) : Fraction.ZERO);
  }

  if (!taxAllocated && taxAmount !== 0) {
    warnings.push({
      kind: 'UNALLOCATED_TAX',
      detail: `No taxable items are assigned, so ${taxAmount} minor units of tax were not allocated`,
    });
  }

  const itemRounding = distributeLargestRemainder(itemShares, itemTotal);
  const taxRounding = distributeLargestRemainder(taxShares, taxAllocated ? BigInt(taxAmount) : 0n);

  const summaries = new Map<PersonId, PersonSummary>();
  let allocatedTotal = 0;
  for (const personId of itemShares.keys()) {
    const itemShare = Number(itemRounding.rounded.get(personId) ?? 0n);
    const taxShare = Number(taxRounding.rounded.get(personId) ?? 0n);
    summaries.set(personId, { personId, itemShare, taxShare, total: itemShare + taxShare });
    allocatedTotal += itemShare + taxShare;
  }

  let residual = 0;
  if (declaredGrandTotal !== undefined) {
    const customTotal = items
      .filter(item => item.kind === 'custom')
      .reduce((sum, item) => sum + netPrice(item), 0);
    residual = declaredGrandTotal + customTotal - allocatedTotal;
    if (residual !== 0) {
      warnings.push({
        kind: 'DECLARED_TOTAL_MISMATCH',
        detail: `Allocated total differs from the receipt total by ${residual} minor units`,
      });
    }
  }

  return {
    people: summaries,
    itemAmounts,
    allocatedTotal,
    roundingAdjustment: itemRounding.adjustment + taxRounding.adjustment,
    residual,
    warnings,
  };
}
