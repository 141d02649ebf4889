/**
 * Receipt Split MCP Server
 *
 * An MCP server that turns receipt text into line items, checks them against
 * the receipt's own totals, and splits every charge (items, proportional tax,
 * added fees) among the people who shared them, to the cent.
 */

import { MCPServer } from "mcp-use/server";
import { z } from "zod";

import { loadConfig } from "./src/config.js";
import { ReceiptSplitError } from "./src/models/errors.js";
import { receiptStore, sessionItems, store } from "./src/store/store.js";
import { allocate } from "./src/utils/allocation.js";
import { formatMoney, parseMoney } from "./src/utils/money.js";
import { parseReceipt } from "./src/utils/parser.js";
import {
  formatAssignment,
  formatItem,
  formatSplitSummary,
  formatTotals,
  formatWarnings,
  openWarnings,
} from "./src/utils/summary.js";

import type { AllocationResult, ReceiptSession } from "./src/models/types.js";

// ============================================================================
// Server Configuration
// ============================================================================

const config = loadConfig();

const server = new MCPServer({
  name: "receipt-split",
  version: "1.0.0",
  description: "Split a grocery receipt fairly. Parse the receipt text, assign items to people, and get per-person totals with proportional tax that add up exactly.",
  baseUrl: config.baseUrl,
});

function reply(text: string) {
  return {
    content: [{
      type: "text" as const,
      text,
    }],
  };
}

function notFound(sessionId: string) {
  return reply(`Receipt ${sessionId} not found. Use list_receipts to see open receipts.`);
}

/** Domain errors become a readable answer; anything else is a bug and propagates. */
function rejected(action: string, error: unknown) {
  if (error instanceof ReceiptSplitError) {
    return reply(`Could not ${action}: ${error.message}`);
  }
  throw error;
}

function describeSession(session: ReceiptSession): string {
  const items = sessionItems(session);
  const warnings = openWarnings(session);

  return `**Receipt** (ID: ${session.id})${session.receipt.orderDate ? `\nOrder date: ${session.receipt.orderDate}` : ""}

**Items:**
${items.map((item, i) => formatItem(item, i, session.currency)).join("\n")}

${formatTotals(session.receipt.totals, session.currency)}
${warnings.length ? `\n**Needs review:**\n${formatWarnings(warnings)}\n` : ""}
People: ${session.people.length ? session.people.join(", ") : "none yet"}`;
}

// ============================================================================
// RECEIPT TOOLS
// ============================================================================

server.tool(
  {
    name: "parse_receipt",
    description: "Parse the text of a receipt into numbered line items with quantities, prices, discounts and tax flags, and check them against the receipt's subtotal and total. Opens a receipt session used by the other tools.",
    schema: z.object({
      receiptText: z.string().describe("The receipt text, one receipt line per line"),
      currency: z.string().default(config.defaultCurrency).describe("Currency code"),
      defaultTaxable: z.boolean().default(config.defaultTaxable).describe("Taxability of items printed without a tax flag"),
    }),
  },
  async ({ receiptText, currency, defaultTaxable }) => {
    let session: ReceiptSession;
    try {
      const receipt = parseReceipt(receiptText, { defaultTaxable });
      session = receiptStore.create(receipt, currency);
    } catch (error) {
      return rejected("parse the receipt", error);
    }

    console.log(`[receipt] ${session.id} parsed: ${session.receipt.items.length} items, ${openWarnings(session).length} warnings`);

    return reply(`${describeSession(session)}

Use \`add_people\` and \`assign_item\` to say who had what, then \`split_receipt\`.`);
  }
);

server.tool(
  {
    name: "get_receipt",
    description: "Show a parsed receipt: items, totals, anything that needs review, people, and the current item assignment.",
    schema: z.object({
      sessionId: z.string().describe("The receipt session ID, as returned by parse_receipt"),
    }),
  },
  async ({ sessionId }) => {
    const session = receiptStore.get(sessionId);
    if (!session) return notFound(sessionId);

    const snapshot = session.assignment;
    return reply(`${describeSession(session)}

**Assignment** (version ${snapshot.version}):
${formatAssignment(session, snapshot)}`);
  }
);

server.tool(
  {
    name: "list_receipts",
    description: "List open receipts.",
    schema: z.object({}),
  },
  async () => {
    const sessions = receiptStore.list();

    if (sessions.length === 0) {
      return reply("No receipts yet. Use parse_receipt to start one.");
    }

    const list = sessions.map(s => {
      const total = formatMoney(s.receipt.totals.grandTotal, s.currency);
      return `- ${s.id}: ${sessionItems(s).length} items, ${total}${s.receipt.orderDate ? ` (${s.receipt.orderDate})` : ""}`;
    }).join("\n");

    return reply(`**Receipts (${sessions.length}):**\n${list}`);
  }
);

server.tool(
  {
    name: "add_custom_item",
    description: "Add a charge that is not on the receipt, such as a delivery fee, bag fee or tip. Added items are not taxed unless marked taxable.",
    schema: z.object({
      sessionId: z.string().describe("The receipt session ID, as returned by parse_receipt"),
      name: z.string().min(1).describe("What the charge is"),
      price: z.number().min(0).describe("Total for the line in major units (e.g., 4.99)"),
      quantity: z.number().int().positive().default(1),
      taxable: z.boolean().default(false),
    }),
  },
  async ({ sessionId, name, price, quantity, taxable }) => {
    const session = receiptStore.get(sessionId);
    if (!session) return notFound(sessionId);

    const updated = receiptStore.addCustomItem(sessionId, {
      name,
      price: parseMoney(price, session.currency),
      quantity,
      isTaxable: taxable,
    });
    if (!updated) return notFound(sessionId);

    const items = sessionItems(updated);
    const index = items.length - 1;
    console.log(`[receipt] ${sessionId} custom item added: ${name}`);

    return reply(`Added:\n${formatItem(items[index], index, updated.currency)}\n\nAssign it with \`assign_item\` (item ${index + 1}).`);
  }
);

server.tool(
  {
    name: "correct_item",
    description: "Fix a parsed item by hand, e.g. a price that could not be read or a quantity that does not match. Amounts are in major units.",
    schema: z.object({
      sessionId: z.string().describe("The receipt session ID, as returned by parse_receipt"),
      itemNumber: z.number().int().positive().describe("Item number (1-based)"),
      name: z.string().min(1).optional(),
      quantity: z.number().int().positive().optional(),
      unitPrice: z.number().min(0).optional().describe("Price per unit"),
      extendedPrice: z.number().min(0).optional().describe("Line total before discount"),
      taxable: z.boolean().optional(),
    }),
  },
  async ({ sessionId, itemNumber, name, quantity, unitPrice, extendedPrice, taxable }) => {
    const session = receiptStore.get(sessionId);
    if (!session) return notFound(sessionId);

    let updated: ReceiptSession | undefined;
    try {
      updated = receiptStore.correctItem(sessionId, itemNumber - 1, {
        name,
        quantity,
        unitPrice: unitPrice === undefined ? undefined : parseMoney(unitPrice, session.currency),
        extendedPrice: extendedPrice === undefined ? undefined : parseMoney(extendedPrice, session.currency),
        isTaxable: taxable,
      });
    } catch (error) {
      return rejected("correct the item", error);
    }
    if (!updated) return notFound(sessionId);

    const item = updated.reconciliation.items[itemNumber - 1];
    console.log(`[receipt] ${sessionId} item ${itemNumber} corrected`);

    return reply(`Corrected:\n${formatItem(item, itemNumber - 1, updated.currency)}${
      updated.reconciliation.balanced ? "\n\nItems now agree with the receipt totals." : `\n\n**Still needs review:**\n${formatWarnings(updated.reconciliation.anomalies)}`
    }`);
  }
);

// ============================================================================
// PEOPLE & ASSIGNMENT TOOLS
// ============================================================================

server.tool(
  {
    name: "add_people",
    description: "Add the people splitting this receipt.",
    schema: z.object({
      sessionId: z.string().describe("The receipt session ID, as returned by parse_receipt"),
      names: z.array(z.string().min(1)).min(1).describe("Names of people"),
    }),
  },
  async ({ sessionId, names }) => {
    const updated = receiptStore.addPeople(sessionId, names);
    if (!updated) return notFound(sessionId);

    return reply(`People on this receipt: ${updated.people.join(", ")}`);
  }
);

server.tool(
  {
    name: "assign_item",
    description: "Say who shared an item. List people to split it equally, or give weights (e.g., {\"Alice\": 2, \"Bob\": 1}) to split it unevenly. Replaces any earlier assignment of the item.",
    schema: z.object({
      sessionId: z.string().describe("The receipt session ID, as returned by parse_receipt"),
      itemNumber: z.number().int().positive().describe("Item number (1-based)"),
      people: z.array(z.string().min(1)).optional().describe("People splitting the item equally"),
      weights: z.record(z.string(), z.number().positive()).optional().describe("Person name -> weight"),
    }),
  },
  async ({ sessionId, itemNumber, people, weights }) => {
    const entries: [string, number][] = weights
      ? Object.entries(weights)
      : (people ?? []).map((name): [string, number] => [name, 1]);

    let updated: ReceiptSession | undefined;
    try {
      updated = receiptStore.assign(sessionId, itemNumber - 1, new Map(entries));
    } catch (error) {
      return rejected("assign the item", error);
    }
    if (!updated) return notFound(sessionId);

    console.log(`[receipt] ${sessionId} item ${itemNumber} assigned (assignment v${updated.assignment.version})`);
    const item = sessionItems(updated)[itemNumber - 1];

    return reply(entries.length === 0
      ? `Item ${itemNumber} "${item.name}" now has nobody assigned; splitting will fail until someone is.`
      : `Item ${itemNumber} "${item.name}" → ${entries.map(([name, weight]) => weights ? `${name} ×${weight}` : name).join(", ")}`);
  }
);

server.tool(
  {
    name: "assign_item_units",
    description: "For items bought in several units, say how many units each person took (e.g., {\"Alice\": 2, \"Bob\": 1} for 3 yogurts).",
    schema: z.object({
      sessionId: z.string().describe("The receipt session ID, as returned by parse_receipt"),
      itemNumber: z.number().int().positive().describe("Item number (1-based)"),
      units: z.record(z.string(), z.number().int().positive()).describe("Person name -> number of units"),
    }),
  },
  async ({ sessionId, itemNumber, units }) => {
    let updated: ReceiptSession | undefined;
    try {
      updated = receiptStore.assignUnits(sessionId, itemNumber - 1, new Map(Object.entries(units)));
    } catch (error) {
      return rejected("assign units", error);
    }
    if (!updated) return notFound(sessionId);

    const item = sessionItems(updated)[itemNumber - 1];
    const assigned = Object.values(units).reduce((sum, n) => sum + n, 0);
    const note = assigned < item.quantity
      ? `\n${item.quantity - assigned} unit(s) were not claimed; their cost is shared in proportion.`
      : "";
    console.log(`[receipt] ${sessionId} item ${itemNumber} units assigned (assignment v${updated.assignment.version})`);

    return reply(`Item ${itemNumber} "${item.name}": ${Object.entries(units).map(([name, n]) => `${name} ${n}`).join(", ")}${note}`);
  }
);

server.tool(
  {
    name: "unassign_item",
    description: "Remove everyone from an item.",
    schema: z.object({
      sessionId: z.string().describe("The receipt session ID, as returned by parse_receipt"),
      itemNumber: z.number().int().positive().describe("Item number (1-based)"),
    }),
  },
  async ({ sessionId, itemNumber }) => {
    const updated = receiptStore.unassign(sessionId, itemNumber - 1);
    if (!updated) return notFound(sessionId);

    return reply(`Item ${itemNumber} is unassigned.`);
  }
);

// ============================================================================
// SPLIT TOOLS
// ============================================================================

server.tool(
  {
    name: "split_receipt",
    description: "Work out what each person owes: their share of each item they had plus tax in proportion to the taxable items they had. Every item must be assigned first.",
    schema: z.object({
      sessionId: z.string().describe("The receipt session ID, as returned by parse_receipt"),
    }),
  },
  async ({ sessionId }) => {
    const session = receiptStore.get(sessionId);
    if (!session) return notFound(sessionId);

    // One snapshot for the whole computation.
    const snapshot = session.assignment;
    const { totals } = session.receipt;

    let result: AllocationResult;
    try {
      result = allocate({
        items: sessionItems(session),
        assignment: snapshot.entries,
        taxAmount: totals.taxAmount,
        declaredGrandTotal: totals.sources.grandTotal === "declared" ? totals.grandTotal : undefined,
        people: session.people,
      });
    } catch (error) {
      return rejected("split the receipt", error);
    }

    console.log(`[receipt] ${sessionId} split at assignment v${snapshot.version}: ${formatMoney(result.allocatedTotal, session.currency)} over ${result.people.size} people`);

    const warnings = [...openWarnings(session), ...result.warnings];
    return reply(`${formatSplitSummary(session, snapshot, result)}${
      warnings.length ? `\n\n**Review before relying on these totals:**\n${formatWarnings(warnings)}` : ""
    }`);
  }
);

// ============================================================================
// UTILITY TOOLS
// ============================================================================

server.tool(
  {
    name: "clear_all_data",
    description: "Clear all data from the system. Use with caution!",
    schema: z.object({
      confirm: z.boolean().describe("Must be true to confirm deletion"),
    }),
  },
  async ({ confirm }) => {
    if (!confirm) {
      return reply("Please set confirm=true to clear all data.");
    }

    store.clear();
    return reply("All data has been cleared.");
  }
);

server.tool(
  {
    name: "get_stats",
    description: "Get statistics about the current state of the system.",
    schema: z.object({}),
  },
  async () => {
    const stats = store.stats();

    return reply(`**Receipt Split Stats:**
- Receipts: ${stats.sessions}
- Items: ${stats.items}
- People: ${stats.people}`);
  }
);

// ============================================================================
// PROMPTS
// ============================================================================

server.prompt(
  {
    name: "split_receipt",
    description: "Split a grocery receipt among housemates: parse it, fix anything unreadable, assign items, and compute what everyone owes.",
    schema: z.object({
      receiptText: z.string().describe("The receipt text"),
      people: z.string().describe("Comma-separated names of people splitting the receipt"),
    }),
  },
  async ({ receiptText, people }) => {
    return {
      messages: [{
        role: "user" as const,
        content: {
          type: "text" as const,
          text: `Here's a receipt to split:

${receiptText}

People: ${people}

Please:
1. Parse the receipt and show me anything flagged for review
2. Ask me to fix any item with a price that could not be read
3. Ask who had each item (items can be shared, or split by units)
4. Add any extra fees I mention (delivery, tip)
5. Split the receipt and show each person's total`,
        },
      }],
    };
  }
);

// ============================================================================
// SERVER STARTUP
// ============================================================================

console.log(`Receipt split MCP server listening on ${config.baseUrl} (inspector: ${config.baseUrl}/inspector)`);

await server.listen(config.port);
