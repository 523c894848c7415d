/**
 * Risk classification for shell commands
 * Philosophy: report everything that looks risky, decide nothing here.
 * The caller owns the policy (run, park or reject).
 */

import { SUSPICIOUS_PATTERNS } from "./patterns";
import {
  ClassificationPolicy,
  ClassificationResult,
  RiskLevel,
  SuspiciousPattern,
} from "./types";

// Logger interface for dependency injection
export interface SecurityLogger {
  warn(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
}

const silentLogger: SecurityLogger = {
  warn: () => {},
  info: () => {},
};

/**
 * Classify a command against a list of dangerous terms and structural patterns.
 *
 * Every term and every pattern is checked; there is no early exit, so
 * `matchedDangerousTerms` and `warnings` are exhaustive. Terms match as
 * case-insensitive substrings, patterns run against the original text.
 * The risk level depends only on how many terms matched: a command that
 * trips a pattern but no term is unsafe with a low risk level.
 */
export function classify(
  text: string,
  dangerousTerms: readonly string[],
  suspiciousPatterns: readonly SuspiciousPattern[] = SUSPICIOUS_PATTERNS
): ClassificationResult {
  const result: ClassificationResult = {
    safe: true,
    riskLevel: RiskLevel.LOW,
    matchedDangerousTerms: [],
    warnings: [],
  };

  const lowered = text.toLowerCase();

  for (const term of dangerousTerms) {
    if (lowered.includes(term.toLowerCase())) {
      result.safe = false;
      result.matchedDangerousTerms.push(term);
      result.warnings.push(`Dangerous command detected: ${term}`);
    }
  }

  for (const { pattern, description } of suspiciousPatterns) {
    if (pattern.test(text)) {
      result.safe = false;
      result.warnings.push(
        `Suspicious pattern (${description}): ${pattern.source}`
      );
    }
  }

  result.riskLevel = riskLevelForMatchCount(
    result.matchedDangerousTerms.length
  );

  return result;
}

export function riskLevelForMatchCount(count: number): RiskLevel {
  if (count > 2) return RiskLevel.HIGH;
  if (count > 0) return RiskLevel.MEDIUM;
  return RiskLevel.LOW;
}

/**
 * Bind a policy once and classify many commands with it
 */
export function createClassifier(
  policy: ClassificationPolicy,
  logger: SecurityLogger = silentLogger
): (text: string) => ClassificationResult {
  const terms = [...policy.dangerousTerms];
  const patterns = policy.suspiciousPatterns ?? SUSPICIOUS_PATTERNS;

  return (text: string) => {
    const result = classify(text, terms, patterns);

    if (result.safe) {
      logger.info("Command classified as safe", {
        length: text.length,
      });
    } else {
      logger.warn("Command classified as unsafe", {
        command: text.substring(0, 100),
        riskLevel: result.riskLevel,
        matchedDangerousTerms: result.matchedDangerousTerms,
        warnings: result.warnings.length,
      });
    }

    return result;
  };
}

/**
 * Parse a comma-separated term list, dropping blanks
 */
export function parseTermList(value: string): string[] {
  return value
    .split(",")
    .map((term) => term.trim())
    .filter((term) => term.length > 0);
}
