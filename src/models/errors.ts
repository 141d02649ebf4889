/**
 * Receipt Split MCP Server - Domain Errors
 *
 * Fatal parse errors and allocation preconditions. Recoverable problems are
 * reported as warning records instead (see ParseWarning / Anomaly).
 */

import type { ItemIndex, PersonId } from './types.js';

export type ReceiptSplitErrorCode =
  | 'EMPTY_RECEIPT'
  | 'UNASSIGNED_ITEM'
  | 'EMPTY_ASSIGNMENT'
  | 'INVALID_WEIGHT'
  | 'UNIT_OVER_ASSIGNMENT'
  | 'ITEM_NOT_FOUND';

export abstract class ReceiptSplitError extends Error {
  abstract readonly code: ReceiptSplitErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// ============================================================================
// Parsing
// ============================================================================

export class EmptyReceiptError extends ReceiptSplitError {
  readonly code = 'EMPTY_RECEIPT';

  /** `lineNumber` is the TOTAL line that was reached before any item, if any. */
  constructor(readonly lineNumber?: number) {
    super(
      lineNumber === undefined
        ? 'No item lines found on the receipt'
        : `Total on line ${lineNumber} appears before any item line`
    );
  }
}

// ============================================================================
// Allocation
// ============================================================================

export class UnassignedItemError extends ReceiptSplitError {
  readonly code = 'UNASSIGNED_ITEM';

  constructor(readonly itemIndex: ItemIndex, readonly itemName: string) {
    super(`Item ${itemIndex + 1} "${itemName}" is not assigned to anyone`);
  }
}

export class EmptyAssignmentError extends ReceiptSplitError {
  readonly code = 'EMPTY_ASSIGNMENT';

  constructor(readonly itemIndex: ItemIndex, readonly itemName: string) {
    super(`Item ${itemIndex + 1} "${itemName}" is assigned to an empty set of people`);
  }
}

export class InvalidWeightError extends ReceiptSplitError {
  readonly code = 'INVALID_WEIGHT';

  constructor(
    readonly itemIndex: ItemIndex,
    readonly personId: PersonId,
    readonly weight: number
  ) {
    super(`Weight ${weight} for ${personId} on item ${itemIndex + 1} must be a positive number`);
  }
}

// ============================================================================
// Session edits
// ============================================================================

export class UnitOverAssignmentError extends ReceiptSplitError {
  readonly code = 'UNIT_OVER_ASSIGNMENT';

  constructor(
    readonly itemIndex: ItemIndex,
    readonly quantity: number,
    readonly requested: number
  ) {
    super(`Item ${itemIndex + 1} has ${quantity} unit(s) but ${requested} were assigned`);
  }
}

export class ItemNotFoundError extends ReceiptSplitError {
  readonly code = 'ITEM_NOT_FOUND';

  constructor(readonly itemIndex: ItemIndex, readonly itemCount: number) {
    super(`Item ${itemIndex + 1} does not exist (receipt has ${itemCount} items)`);
  }
}
