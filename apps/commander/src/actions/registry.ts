import {
  ACTION_NAMES,
  ActionName,
  ActionResult,
  GateOutcome,
  HistoryRole,
  TextArgsSchema,
  TicketIdSchema,
  isActionName,
} from "@warden/types";
import { ZodError } from "zod";
import { CommandGate } from "../services/command-gate";
import { CompletionEngine } from "../services/completion-engine";
import { HistoryStore } from "../services/conversation-history";
import { extractCommands } from "../utils/command-extraction";
import { logger } from "../utils/logger";

export interface ActionContext {
  sessionId: string;
  args: string;
}

export type ActionHandler = (context: ActionContext) => Promise<ActionResult>;

export type ActionRegistry = Record<ActionName, ActionHandler>;

export interface RegistryDependencies {
  gate: CommandGate;
  histories: HistoryStore;
  completionEngine: CompletionEngine;
  systemPrompt: string;
}

class InvalidArguments extends Error {}

function parseArgs<T>(
  schema: { parse(value: unknown): T },
  value: string
): T {
  try {
    return schema.parse(value);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new InvalidArguments(error.issues.map((i) => i.message).join("; "));
    }
    throw error;
  }
}

export function createActionRegistry({
  gate,
  histories,
  completionEngine,
  systemPrompt,
}: RegistryDependencies): ActionRegistry {
  return {
    ask: async ({ sessionId, args }) => {
      const question = parseArgs(TextArgsSchema, args);
      const history = histories.get(sessionId);

      let reply: string;
      try {
        reply = await completionEngine.complete({
          system: systemPrompt,
          context: history.recentContext(),
          question,
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error("Completion engine request failed", {
          sessionId,
          error: message,
        });
        return { kind: "completion_failed", error: message };
      }

      history.append(HistoryRole.USER, question);
      history.append(HistoryRole.ASSISTANT, reply);

      const { prose, commands } = extractCommands(reply);
      const outcomes: GateOutcome[] = [];
      for (const command of commands) {
        outcomes.push(await gate.submit(command));
      }

      return { kind: "answer", reply: prose, commands: outcomes };
    },

    exec: async ({ args }) => {
      const command = parseArgs(TextArgsSchema, args);
      return { kind: "gate", outcome: await gate.submit(command) };
    },

    approve: async ({ args }) => {
      const ticketId = parseArgs(TicketIdSchema, args);
      return { kind: "approval", outcome: await gate.approve(ticketId) };
    },

    history: async ({ sessionId }) => ({
      kind: "history",
      entries: histories.get(sessionId).snapshot(),
    }),

    clear: async ({ sessionId }) => {
      histories.get(sessionId).clear();
      logger.info("Conversation history cleared", { sessionId });
      return { kind: "history_cleared" };
    },
  };
}

/**
 * Fail fast at start-up if any known action lacks a handler
 */
export function validateRegistry(
  registry: Partial<ActionRegistry>
): ActionRegistry {
  const { ask, exec, approve, history, clear } = registry;
  if (!ask || !exec || !approve || !history || !clear) {
    const missing = ACTION_NAMES.filter((name) => !registry[name]);
    throw new Error(`Missing action handlers: ${missing.join(", ")}`);
  }
  return { ask, exec, approve, history, clear };
}

export class ActionDispatcher {
  private registry: ActionRegistry;

  constructor(registry: Partial<ActionRegistry>) {
    this.registry = validateRegistry(registry);
  }

  async dispatch(
    sessionId: string,
    action: string,
    args: string
  ): Promise<ActionResult> {
    if (!isActionName(action)) {
      logger.warn("Unrecognized action", { sessionId, action });
      return { kind: "unrecognized", action, available: [...ACTION_NAMES] };
    }

    logger.info("Dispatching action", { sessionId, action });

    try {
      return await this.registry[action]({ sessionId, args });
    } catch (error) {
      if (error instanceof InvalidArguments) {
        return { kind: "invalid_arguments", action, message: error.message };
      }
      throw error;
    }
  }
}
