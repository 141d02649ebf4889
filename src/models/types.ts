/**
 * Receipt Split MCP Server - Data Models
 *
 * These models represent the core domain objects for splitting one receipt.
 * All amounts are integers in minor units (cents for USD).
 */

// ============================================================================
// Core Identifiers
// ============================================================================

export type PersonId = string;
export type SessionId = string;

/** Position of an item in a session's item list (parsed items first, then custom items). */
export type ItemIndex = number;

// ============================================================================
// Currency & Money
// ============================================================================

export interface Currency {
  code: string;      // ISO 4217 code (USD, EUR, GBP, etc.)
  symbol: string;    // Display symbol ($, €, £, etc.)
  decimals: number;  // Decimal places (2 for most, 0 for JPY, KRW)
}

export const SUPPORTED_CURRENCIES: Record<string, Currency> = {
  USD: { code: 'USD', symbol: '$', decimals: 2 },
  EUR: { code: 'EUR', symbol: '€', decimals: 2 },
  GBP: { code: 'GBP', symbol: '£', decimals: 2 },
  CAD: { code: 'CAD', symbol: 'C$', decimals: 2 },
  AUD: { code: 'AUD', symbol: 'A$', decimals: 2 },
  JPY: { code: 'JPY', symbol: '¥', decimals: 0 },
  MXN: { code: 'MXN', symbol: '$', decimals: 2 },
  CHF: { code: 'CHF', symbol: 'Fr', decimals: 2 },
};

// ============================================================================
// Line Classification
// ============================================================================

export type LineKind = 'ITEM' | 'DISCOUNT' | 'SUBTOTAL' | 'TAX' | 'TOTAL' | 'NOISE';

export type WeightUnit = 'lb' | 'kg' | 'oz';

export interface Weight {
  amount: string;        // As printed, e.g. "2.31"
  unit: WeightUnit;
}

export interface ItemLine {
  kind: 'ITEM';
  lineNumber: number;
  name: string;
  quantity: number;
  unitPrice: number;
  extendedPrice: number;
  unitPriceSource: UnitPriceSource;
  taxFlag?: boolean;
  weight?: Weight;
  malformedToken?: string;   // Set when the price after a price marker was unreadable
}

export interface DiscountLine {
  kind: 'DISCOUNT';
  lineNumber: number;
  amount: number;        // Always <= 0
  text: string;
}

export interface TotalsLine {
  kind: 'SUBTOTAL' | 'TAX' | 'TOTAL';
  lineNumber: number;
  amount: number;
}

export type NoiseReason = 'blank' | 'keyword' | 'order-date' | 'unpriced';

export interface NoiseLine {
  kind: 'NOISE';
  lineNumber: number;
  text: string;
  reason: NoiseReason;
}

export type ClassifiedLine = ItemLine | DiscountLine | TotalsLine | NoiseLine;

// ============================================================================
// Items
// ============================================================================

/** Whether the unit price was printed on the receipt or derived from the extended price. */
export type UnitPriceSource = 'printed' | 'derived';

/** Who last replaced a printed value: a manual edit, or the subtotal check. */
export type CorrectionSource = 'user' | 'reconciliation';

interface BaseItem {
  readonly name: string;
  readonly quantity: number;
  readonly unitPrice: number;
  readonly extendedPrice: number;
  readonly isTaxable: boolean;
  readonly discount?: number;            // <= 0, applied against extendedPrice
}

export interface LineItem extends BaseItem {
  readonly kind: 'line';
  readonly sourceLineNumber: number;
  readonly unitPriceSource: UnitPriceSource;
  readonly weight?: Weight;
  readonly corrected: boolean;
  readonly correctedBy?: CorrectionSource;
  readonly originalExtendedPrice?: number;   // Kept when a correction replaced the printed value
}

export interface CustomItem extends BaseItem {
  readonly kind: 'custom';
}

export type BillItem = LineItem | CustomItem;

// ============================================================================
// Receipt Parsing
// ============================================================================

export type TotalSource = 'declared' | 'derived';

export interface ReceiptTotals {
  subtotal: number;
  taxAmount: number;
  grandTotal: number;
  sources: {
    subtotal: TotalSource;
    taxAmount: TotalSource;
    grandTotal: TotalSource;
  };
}

export type ParseWarningKind = 'MALFORMED_PRICE' | 'ZERO_PRICE' | 'ORPHAN_DISCOUNT';

export type AnomalyKind = 'QUANTITY_MISMATCH' | 'SUBTOTAL_MISMATCH' | 'TOTAL_MISMATCH';

export type AllocationWarningKind = 'DECLARED_TOTAL_MISMATCH' | 'UNALLOCATED_TAX';

export interface Finding<K extends string> {
  kind: K;
  itemIndex?: ItemIndex;
  lineNumber?: number;
  detail: string;
}

export type ParseWarning = Finding<ParseWarningKind>;
export type Anomaly = Finding<AnomalyKind>;
export type AllocationWarning = Finding<AllocationWarningKind>;
export type Warning = ParseWarning | Anomaly | AllocationWarning;

export interface ParsedReceipt {
  items: LineItem[];
  totals: ReceiptTotals;
  warnings: ParseWarning[];
  orderDate?: string;
}

export interface ParseOptions {
  defaultTaxable?: boolean;
}

// ============================================================================
// Reconciliation
// ============================================================================

export interface ItemCorrection {
  itemIndex: ItemIndex;
  field: 'extendedPrice';
  from: number;
  to: number;
}

export interface ReconciliationReport {
  items: LineItem[];
  anomalies: Anomaly[];
  corrections: ItemCorrection[];
  itemSubtotal: number;        // Sum of net prices after corrections
  balanced: boolean;
}

// ============================================================================
// Assignment
// ============================================================================

/** Person -> weight for one item. Weights must be positive. */
export type AssigneeWeights = ReadonlyMap<PersonId, number>;

export type Assignment = ReadonlyMap<ItemIndex, AssigneeWeights>;

export interface AssignmentSnapshot {
  readonly version: number;
  readonly entries: Assignment;
}

// ============================================================================
// Allocation (Computed)
// ============================================================================

export interface PersonSummary {
  personId: PersonId;
  itemShare: number;
  taxShare: number;
  total: number;
}

export interface AllocationResult {
  people: Map<PersonId, PersonSummary>;
  /** Each item's price split among its assignees, rounded item by item for display. */
  itemAmounts: Map<ItemIndex, Map<PersonId, number>>;
  allocatedTotal: number;       // Sum of every person's total
  roundingAdjustment: number;   // Minor units moved by largest-remainder distribution
  residual: number;             // Declared grand total minus allocated total (0 when none declared)
  warnings: AllocationWarning[];
}

// ============================================================================
// Sessions
// ============================================================================

export interface ReceiptSession {
  id: SessionId;
  currency: string;
  receipt: ParsedReceipt;
  reconciliation: ReconciliationReport;
  customItems: CustomItem[];
  people: PersonId[];
  assignment: AssignmentSnapshot;
  createdAt: Date;
  updatedAt: Date;
}
