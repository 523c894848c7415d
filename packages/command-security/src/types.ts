/**
 * Command risk classification types
 */

export enum RiskLevel {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
}

export interface SuspiciousPattern {
  pattern: RegExp;
  description: string;
}

export interface ClassificationResult {
  safe: boolean;
  riskLevel: RiskLevel;
  matchedDangerousTerms: string[];
  warnings: string[];
}

export interface ClassificationPolicy {
  dangerousTerms: readonly string[];
  suspiciousPatterns?: readonly SuspiciousPattern[];
}
