import type { ClassificationResult } from "@warden/command-security";
import type { ExecutionResult } from "./execution";

export type GateOutcome =
  | {
      status: "rejected";
      command: string;
      reason: "too_long";
      maxLength: number;
    }
  | {
      status: "pending_approval";
      command: string;
      ticketId: string;
      classification: ClassificationResult;
    }
  | {
      status: "executed";
      command: string;
      classification: ClassificationResult;
      execution: ExecutionResult;
    };

export type ApprovalOutcome =
  | { status: "ticket_not_found"; ticketId: string }
  | Extract<GateOutcome, { status: "executed" }>;
