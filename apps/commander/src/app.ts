import express, { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import compression from "compression";
import { createClassifier } from "@warden/command-security";
import type { Config } from "./config";
import { logger } from "./utils/logger";
import { errorHandler, requestLogger } from "./api/middleware";
import { createHealthRouter } from "./api/health";
import { createActionsRouter } from "./api/actions";
import { ActionDispatcher, createActionRegistry } from "./actions/registry";
import { getSystemPrompt } from "./prompt/system-prompt";
import { ApprovalLedger } from "./services/approval-ledger";
import { CommandGate } from "./services/command-gate";
import { CommandRunner } from "./services/command-runner";
import {
  AiCompletionEngine,
  CompletionEngine,
} from "./services/completion-engine";
import { HistoryStore } from "./services/conversation-history";

export interface Services {
  ledger: ApprovalLedger;
  runner: CommandRunner;
  histories: HistoryStore;
  gate: CommandGate;
  dispatcher: ActionDispatcher;
}

export interface ServiceOverrides {
  completionEngine?: CompletionEngine;
}

/**
 * Wire the gating pipeline from a config
 */
export function createServices(
  config: Config,
  overrides: ServiceOverrides = {}
): Services {
  const ledger = new ApprovalLedger({ ticketTtlMs: config.approvalTtlMs });
  const runner = new CommandRunner({
    timeoutMs: config.commandTimeoutMs,
    maxConcurrent: config.maxConcurrentCommands,
    osType: config.osType,
  });
  const histories = new HistoryStore({
    limit: config.historyLimit,
    recentKeep: config.historyRecentKeep,
    stride: config.historyStride,
  });

  const gate = new CommandGate({
    classify: createClassifier(
      { dangerousTerms: config.dangerousCommands },
      logger
    ),
    ledger,
    runner,
    policy: {
      maxCommandLength: config.maxCommandLength,
      autoApproveSafe: config.autoApproveSafe,
    },
  });

  const completionEngine =
    overrides.completionEngine ??
    new AiCompletionEngine({
      model: config.model,
      openaiApiKey: config.openaiApiKey,
      anthropicApiKey: config.anthropicApiKey,
    });

  const dispatcher = new ActionDispatcher(
    createActionRegistry({
      gate,
      histories,
      completionEngine,
      systemPrompt: getSystemPrompt(config.osType),
    })
  );

  logger.info("Services initialized", {
    dangerousTerms: config.dangerousCommands.length,
    maxCommandLength: config.maxCommandLength,
    autoApproveSafe: config.autoApproveSafe,
    historyLimit: config.historyLimit,
  });

  return { ledger, runner, histories, gate, dispatcher };
}

export function createApp(config: Config, services: Services): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(
    cors({
      origin: config.corsOrigin,
      credentials: true,
    })
  );

  // Body parsing and compression
  app.use(express.json({ limit: "1mb" }));
  app.use(compression());

  // Request logging
  app.use(requestLogger);

  app.use(createHealthRouter(services.ledger, services.histories));
  app.use(
    "/api",
    createActionsRouter(
      services.dispatcher,
      services.ledger,
      config.commandPrefix
    )
  );

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: "NOT_FOUND",
      message: `Route ${req.method} ${req.path} not found`,
    });
  });

  // Error handling (must be last)
  app.use(errorHandler);

  return app;
}
