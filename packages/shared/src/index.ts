export * from "./errors";
export * from "./decimal/fixed-decimal";
export * from "./schemas/engine-config";
export * from "./schemas/order-ledger";
