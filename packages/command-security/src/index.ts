/**
 * Security utilities for command classification
 */

// Re-export types
export type {
  ClassificationResult,
  ClassificationPolicy,
  SuspiciousPattern,
} from "./types";

export { RiskLevel } from "./types";

// Re-export functions and types from command-security
export {
  classify,
  createClassifier,
  riskLevelForMatchCount,
  parseTermList,
} from "./command-security";

export type { SecurityLogger } from "./command-security";

export { DEFAULT_DANGEROUS_TERMS, SUSPICIOUS_PATTERNS } from "./patterns";
