import { z } from "zod";
import type { ApprovalOutcome, GateOutcome } from "../commands/gate";
import type { HistoryEntry } from "../history/entries";

export const ACTION_NAMES = [
  "ask",
  "exec",
  "approve",
  "history",
  "clear",
] as const;

export type ActionName = (typeof ACTION_NAMES)[number];

export function isActionName(value: string): value is ActionName {
  return ACTION_NAMES.some((name) => name === value);
}

export const ActionRequestSchema = z.object({
  args: z.string().default(""),
});

export const TextArgsSchema = z
  .string()
  .transform((value) => value.trim())
  .pipe(z.string().min(1, "Argument text is required"));

export const TicketIdSchema = z
  .string()
  .transform((value) => value.trim())
  .pipe(z.string().min(1, "Ticket id is required"));

export type ActionResult =
  | {
      kind: "answer";
      reply: string;
      commands: GateOutcome[];
    }
  | {
      kind: "completion_failed";
      error: string;
    }
  | {
      kind: "gate";
      outcome: GateOutcome;
    }
  | {
      kind: "approval";
      outcome: ApprovalOutcome;
    }
  | {
      kind: "history";
      entries: HistoryEntry[];
    }
  | {
      kind: "history_cleared";
    }
  | {
      kind: "invalid_arguments";
      action: ActionName;
      message: string;
    }
  | {
      kind: "unrecognized";
      action: string;
      available: ActionName[];
    };
