/**
 * Receipt Split MCP Server - In-Memory Store
 *
 * Holds one session per parsed receipt. Data persists only during server
 * runtime.
 *
 * The assignment is never edited in place: every change builds a new frozen
 * snapshot with a higher version and swaps it in, so an allocation that has
 * taken a snapshot keeps reading a consistent mapping.
 */

import { ItemNotFoundError, UnitOverAssignmentError } from '../models/errors.js';
import type {
  AssignmentSnapshot,
  BillItem,
  CustomItem,
  ItemIndex,
  LineItem,
  ParsedReceipt,
  PersonId,
  ReceiptSession,
  SessionId,
} from '../models/types.js';
import { divideHalfEven } from '../utils/classifier.js';
import { reconcileReceipt } from '../utils/reconciliation.js';

// ============================================================================
// Store State
// ============================================================================

interface StoreState {
  sessions: Map<SessionId, ReceiptSession>;
}

const state: StoreState = {
  sessions: new Map(),
};

// ============================================================================
// ID Generation
// ============================================================================

function generateId(prefix: string): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `${prefix}_${timestamp}${random}`;
}

// ============================================================================
// Snapshots
// ============================================================================

const EMPTY_SNAPSHOT: AssignmentSnapshot = Object.freeze({
  version: 0,
  entries: new Map<ItemIndex, ReadonlyMap<PersonId, number>>(),
});

function nextSnapshot(
  current: AssignmentSnapshot,
  edit: (entries: Map<ItemIndex, ReadonlyMap<PersonId, number>>) => void
): AssignmentSnapshot {
  const entries = new Map(current.entries);
  edit(entries);
  const snapshot: AssignmentSnapshot = { version: current.version + 1, entries };
  return Object.freeze(snapshot);
}

/** Items in allocation order: parsed (possibly corrected) items, then custom items. */
export function sessionItems(session: ReceiptSession): BillItem[] {
  return [...session.reconciliation.items, ...session.customItems];
}

export interface CustomItemInput {
  name: string;
  price: number;          // Line total in minor units
  quantity?: number;
  isTaxable?: boolean;
}

export interface ItemCorrectionInput {
  name?: string;
  quantity?: number;
  unitPrice?: number;
  extendedPrice?: number;
  isTaxable?: boolean;
}

// ============================================================================
// Receipt Session Operations
// ============================================================================

export const receiptStore = {
  create(receipt: ParsedReceipt, currency: string = 'USD'): ReceiptSession {
    const session: ReceiptSession = {
      id: generateId('receipt'),
      currency,
      receipt,
      reconciliation: reconcileReceipt(receipt.items, receipt.totals, currency),
      customItems: [],
      people: [],
      assignment: EMPTY_SNAPSHOT,
      createdAt: new Date(),
      updatedAt: new Date(),
    };
    state.sessions.set(session.id, session);
    return session;
  },

  get(id: SessionId): ReceiptSession | undefined {
    return state.sessions.get(id);
  },

  /** The current assignment. Callers keep the returned object for the whole computation. */
  snapshot(id: SessionId): AssignmentSnapshot | undefined {
    return state.sessions.get(id)?.assignment;
  },

  update(id: SessionId, data: Partial<Omit<ReceiptSession, 'id' | 'createdAt'>>): ReceiptSession | undefined {
    const session = state.sessions.get(id);
    if (!session) return undefined;
    const updated = { ...session, ...data, updatedAt: new Date() };
    state.sessions.set(id, updated);
    return updated;
  },

  delete(id: SessionId): boolean {
    return state.sessions.delete(id);
  },

  list(): ReceiptSession[] {
    return Array.from(state.sessions.values())
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  },

  addPeople(id: SessionId, names: string[]): ReceiptSession | undefined {
    const session = state.sessions.get(id);
    if (!session) return undefined;

    const people = [...session.people];
    for (const raw of names) {
      const name = raw.trim();
      if (name && !people.includes(name)) {
        people.push(name);
      }
    }
    return this.update(id, { people });
  },

  addCustomItem(id: SessionId, input: CustomItemInput): ReceiptSession | undefined {
    const session = state.sessions.get(id);
    if (!session) return undefined;

    const quantity = Math.max(1, Math.trunc(input.quantity ?? 1));
    const item: CustomItem = {
      kind: 'custom',
      name: input.name,
      quantity,
      unitPrice: divideHalfEven(input.price, quantity),
      extendedPrice: input.price,
      isTaxable: input.isTaxable ?? false,
    };
    return this.update(id, { customItems: [...session.customItems, Object.freeze(item)] });
  },

  /**
   * Replace a parsed item with a manually corrected copy. Indices of other
   * items are unchanged; the receipt is reconciled again.
   */
  correctItem(id: SessionId, itemIndex: ItemIndex, input: ItemCorrectionInput): ReceiptSession | undefined {
    const session = state.sessions.get(id);
    if (!session) return undefined;

    const items = session.reconciliation.items;
    const current = items[itemIndex];
    if (itemIndex < 0 || itemIndex >= items.length || !current) {
      throw new ItemNotFoundError(itemIndex, items.length);
    }

    const quantity = input.quantity ?? current.quantity;
    const unitPrice = input.unitPrice ?? current.unitPrice;
    const extendedPrice = input.extendedPrice
      ?? (input.quantity !== undefined || input.unitPrice !== undefined ? quantity * unitPrice : current.extendedPrice);

    const corrected: LineItem = {
      ...current,
      name: input.name ?? current.name,
      quantity,
      unitPrice,
      extendedPrice,
      isTaxable: input.isTaxable ?? current.isTaxable,
      unitPriceSource: input.unitPrice !== undefined ? 'printed' : current.unitPriceSource,
      originalExtendedPrice: current.originalExtendedPrice ?? current.extendedPrice,
      corrected: true,
      correctedBy: 'user',
    };

    const nextItems = items.map((item, i) => (i === itemIndex ? Object.freeze(corrected) : item));
    return this.update(id, {
      reconciliation: reconcileReceipt(nextItems, session.receipt.totals, session.currency),
    });
  },

  assign(id: SessionId, itemIndex: ItemIndex, weights: ReadonlyMap<PersonId, number>): ReceiptSession | undefined {
    const session = state.sessions.get(id);
    if (!session) return undefined;

    const count = sessionItems(session).length;
    if (itemIndex < 0 || itemIndex >= count) {
      throw new ItemNotFoundError(itemIndex, count);
    }

    const people = [...session.people];
    for (const personId of weights.keys()) {
      if (!people.includes(personId)) people.push(personId);
    }

    const copy: ReadonlyMap<PersonId, number> = new Map(weights);
    return this.update(id, {
      people,
      assignment: nextSnapshot(session.assignment, entries => entries.set(itemIndex, copy)),
    });
  },

  /**
   * Assign whole units of an item. Unit counts become weights; fewer units
   * than the quantity still cover the item in proportion.
   */
  assignUnits(id: SessionId, itemIndex: ItemIndex, units: ReadonlyMap<PersonId, number>): ReceiptSession | undefined {
    const session = state.sessions.get(id);
    if (!session) return undefined;

    const items = sessionItems(session);
    const item = items[itemIndex];
    if (itemIndex < 0 || itemIndex >= items.length || !item) {
      throw new ItemNotFoundError(itemIndex, items.length);
    }

    const requested = Array.from(units.values()).reduce((sum, n) => sum + n, 0);
    if (requested > item.quantity) {
      throw new UnitOverAssignmentError(itemIndex, item.quantity, requested);
    }
    return this.assign(id, itemIndex, units);
  },

  unassign(id: SessionId, itemIndex: ItemIndex): ReceiptSession | undefined {
    const session = state.sessions.get(id);
    if (!session) return undefined;

    return this.update(id, {
      assignment: nextSnapshot(session.assignment, entries => entries.delete(itemIndex)),
    });
  },
};

// ============================================================================
// Store Utilities
// ============================================================================

export const store = {
  // Clear all data (useful for testing)
  clear(): void {
    state.sessions.clear();
  },

  // Get store statistics
  stats(): {
    sessions: number;
    items: number;
    people: number;
  } {
    const sessions = Array.from(state.sessions.values());
    return {
      sessions: sessions.length,
      items: sessions.reduce((sum, s) => sum + sessionItems(s).length, 0),
      people: new Set(sessions.flatMap(s => s.people)).size,
    };
  },
};
