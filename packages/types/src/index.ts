// === Classification Types ===
export { RiskLevel } from "@warden/command-security";
export type { ClassificationResult } from "@warden/command-security";

// === Command Types ===
export * from "./commands/execution";
export * from "./commands/approvals";
export * from "./commands/gate";

// === History Types ===
export * from "./history/entries";

// === Action Types ===
export * from "./actions/actions";

// === API Types ===
export * from "./api";
