import { z } from "zod";

import { isQuantized } from "../decimal/fixed-decimal";

export const OrderSideSchema = z.enum(["buy", "sell"]);
export type OrderSide = z.infer<typeof OrderSideSchema>;

export const OrderStatusSchema = z.enum(["NEW", "FILLED", "CANCELED", "REJECTED", "UNKNOWN"]);
export type OrderStatus = z.infer<typeof OrderStatusSchema>;

const TERMINAL_STATUSES: ReadonlySet<OrderStatus> = new Set<OrderStatus>(["FILLED", "CANCELED", "REJECTED"]);

export function isTerminalStatus(status: OrderStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

const STATUS_ALIASES: Record<string, OrderStatus> = {
  NEW: "NEW",
  OPEN: "NEW",
  ACTIVE: "NEW",
  PENDING: "NEW",
  PARTIALLY_FILLED: "NEW",
  FILLED: "FILLED",
  CLOSED: "FILLED",
  DONE: "FILLED",
  CANCELED: "CANCELED",
  CANCELLED: "CANCELED",
  EXPIRED: "CANCELED",
  REJECTED: "REJECTED"
};

/** Maps an exchange status spelling onto the ledger's five states. */
export function normalizeOrderStatus(raw: string): OrderStatus {
  const key = raw.trim().toUpperCase().replace(/[\s-]+/g, "_");
  return STATUS_ALIASES[key] ?? "UNKNOWN";
}

const QuantizedDecimalSchema = z.string().refine(isQuantized, {
  message: "Expected a decimal with exactly 8 fractional digits"
});

export const OrderRecordSchema = z.object({
  orderId: z.string().min(1),
  symbol: z.string().min(1),
  side: OrderSideSchema,
  amount: QuantizedDecimalSchema,
  price: QuantizedDecimalSchema,
  status: OrderStatusSchema,
  createdAt: z.string().min(1),
  note: z.string().optional(),
  linkedOrderId: z.string().min(1).optional()
});
export type OrderRecord = z.infer<typeof OrderRecordSchema>;

export const LedgerDocumentSchema = z
  .object({
    orders: z.array(OrderRecordSchema)
  })
  .superRefine((doc, ctx) => {
    const sellIds = new Set(doc.orders.filter((o) => o.side === "sell").map((o) => o.orderId));
    doc.orders.forEach((order, index) => {
      if (order.side !== "buy" || !order.linkedOrderId) return;
      if (!sellIds.has(order.linkedOrderId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Buy ${order.orderId} links to missing sell ${order.linkedOrderId}`,
          path: ["orders", index, "linkedOrderId"]
        });
      }
    });
  });
export type LedgerDocument = z.infer<typeof LedgerDocumentSchema>;

/** UTC ISO-8601 with second precision, e.g. `2026-10-18T12:00:00Z`. */
export function ledgerTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}
