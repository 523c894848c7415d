import type { ClassificationResult } from "@warden/command-security";

export interface Command {
  text: string;
  length: number;
}

export function toCommand(text: string): Command {
  return { text, length: text.length };
}

/**
 * A parked command waiting for a one-time human approval
 */
export interface ApprovalTicket {
  id: string;
  command: Command;
  classification: ClassificationResult;
  createdAt: number;
}

export interface ApprovalTicketSummary {
  id: string;
  command: string;
  riskLevel: ClassificationResult["riskLevel"];
  createdAt: string; // ISO string for JSON serialization
}

export type ResolveResult =
  | { found: true; ticket: ApprovalTicket }
  | { found: false; ticketId: string };
