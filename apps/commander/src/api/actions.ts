import { Router } from "express";
import {
  ActionRequestSchema,
  ActionResponse,
  PendingApprovalsResponse,
} from "@warden/types";
import { asyncHandler } from "./middleware";
import { ActionDispatcher } from "../actions/registry";
import { renderActionResult } from "../presentation/render";
import { ApprovalLedger } from "../services/approval-ledger";

export function createActionsRouter(
  dispatcher: ActionDispatcher,
  ledger: ApprovalLedger,
  commandPrefix: string
): Router {
  const router = Router();

  /**
   * POST /sessions/:sessionId/actions/:action
   * Run a chat action (ask, exec, approve, history, clear) for a session
   */
  router.post(
    "/sessions/:sessionId/actions/:action",
    asyncHandler(async (req, res) => {
      const body = ActionRequestSchema.parse(req.body ?? {});
      const { sessionId, action } = req.params;

      const result = await dispatcher.dispatch(sessionId, action, body.args);
      const response: ActionResponse = {
        result,
        rendered: renderActionResult(result, { commandPrefix }),
      };

      res.json(response);
    })
  );

  /**
   * GET /approvals
   * List commands waiting for approval
   */
  router.get(
    "/approvals",
    asyncHandler(async (_req, res) => {
      const response: PendingApprovalsResponse = {
        success: true,
        approvals: ledger.pending(),
      };

      res.json(response);
    })
  );

  return router;
}
