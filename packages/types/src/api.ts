import type { ActionResult } from "./actions/actions";
import type { ApprovalTicketSummary } from "./commands/approvals";

// Response types
export interface SuccessResponse {
  success: boolean;
  message: string;
}

export interface ErrorResponse {
  error: string;
  message: string;
  details?: unknown;
}

export interface HealthResponse extends SuccessResponse {
  healthy: boolean;
  details?: {
    uptime: number;
    pendingApprovals: number;
    sessions: number;
  };
}

export interface ActionResponse {
  result: ActionResult;
  rendered: string;
}

export interface PendingApprovalsResponse {
  success: boolean;
  approvals: ApprovalTicketSummary[];
}
