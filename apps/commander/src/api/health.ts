import { Router } from "express";
import { HealthResponse } from "@warden/types";
import { asyncHandler } from "./middleware";
import { ApprovalLedger } from "../services/approval-ledger";
import { HistoryStore } from "../services/conversation-history";

export function createHealthRouter(
  ledger: ApprovalLedger,
  histories: HistoryStore
): Router {
  const router = Router();

  /**
   * GET /health
   * Health check endpoint
   */
  router.get(
    "/health",
    asyncHandler(async (_req, res) => {
      const response: HealthResponse = {
        success: true,
        healthy: true,
        message: "Command gate is healthy",
        details: {
          uptime: process.uptime(),
          pendingApprovals: ledger.size,
          sessions: histories.sessionCount,
        },
      };

      res.json(response);
    })
  );

  return router;
}
