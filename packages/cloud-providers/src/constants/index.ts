/**
 * Constants Module
 *
 * Re-exports polling budgets, default values and resource tags.
 */

export * from "./timeouts";
export * from "./defaults";
export * from "./labels";
