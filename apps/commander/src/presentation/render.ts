import {
  ActionResult,
  ApprovalOutcome,
  ExecutionResult,
  GateOutcome,
  HistoryEntry,
  RiskLevel,
} from "@warden/types";
import { truncate } from "../services/conversation-history";

export const MAX_OUTPUT_CHARS = 1800;
export const TRUNCATION_MARKER = "\n... (output truncated)";

const HISTORY_RENDER_COUNT = 10;
const HISTORY_CONTENT_LIMIT = 100;

const RISK_MARKERS: Record<RiskLevel, string> = {
  [RiskLevel.LOW]: "🟢",
  [RiskLevel.MEDIUM]: "🟡",
  [RiskLevel.HIGH]: "🔴",
};

export interface RenderOptions {
  commandPrefix: string;
}

const fenced = (text: string) => "```\n" + text + "\n```\n";

/**
 * Chat-ready rendering of a command's execution result
 */
export function formatExecutionOutput(execution: ExecutionResult): string {
  if (!execution.succeeded) {
    return `❌ **Execution error:**\n${fenced(execution.errorMessage).trimEnd()}`;
  }

  let output = "";
  if (execution.stdout) {
    output += `📤 **Output:**\n${fenced(execution.stdout)}`;
  }
  if (execution.stderr) {
    output += `⚠️ **Warnings:**\n${fenced(execution.stderr)}`;
  }
  if (execution.exitCode !== 0) {
    output += `🔴 **Exit code:** ${execution.exitCode}\n`;
  }

  if (!output) {
    return "✅ Command completed successfully";
  }

  if (output.length > MAX_OUTPUT_CHARS) {
    output = output.slice(0, MAX_OUTPUT_CHARS) + TRUNCATION_MARKER;
  }

  return output;
}

function renderGateOutcome(
  outcome: GateOutcome | ApprovalOutcome,
  { commandPrefix }: RenderOptions
): string {
  switch (outcome.status) {
    case "rejected":
      return `❌ Command is too long (max ${outcome.maxLength} characters)`;

    case "ticket_not_found":
      return "❌ Command not found or already executed";

    case "pending_approval": {
      const { classification } = outcome;
      let text = `${RISK_MARKERS[classification.riskLevel]} **WARNING! Potentially dangerous command**\n`;
      text += `📋 **Command:** \`${outcome.command}\`\n`;
      text += `⚠️ **Risk level:** ${classification.riskLevel}\n`;

      if (classification.warnings.length > 0) {
        text += "🚨 **Warnings:**\n";
        for (const warning of classification.warnings) {
          text += `• ${warning}\n`;
        }
      }

      text += `\n🔧 To run it, use: \`${commandPrefix}approve ${outcome.ticketId}\``;
      return text;
    }

    case "executed":
      return `⚙️ Executing command: \`${outcome.command}\`\n${formatExecutionOutput(outcome.execution)}`;
  }
}

function renderHistory(entries: HistoryEntry[]): string {
  if (entries.length === 0) {
    return "📝 Message history is empty";
  }

  let text = "📝 **Message history:**\n";
  for (const entry of entries.slice(-HISTORY_RENDER_COUNT)) {
    const icon = entry.role === "user" ? "👤" : "🤖";
    text += `${icon} ${truncate(entry.content, HISTORY_CONTENT_LIMIT)}\n`;
  }
  return text;
}

export function renderActionResult(
  result: ActionResult,
  options: RenderOptions
): string {
  const { commandPrefix } = options;

  switch (result.kind) {
    case "answer": {
      const parts: string[] = [];
      if (result.reply) {
        parts.push(`🤖 **AI reply:**\n${result.reply}`);
      }
      for (const outcome of result.commands) {
        parts.push(renderGateOutcome(outcome, options));
      }
      return parts.join("\n\n");
    }

    case "completion_failed":
      return `❌ Error contacting the AI: ${result.error}`;

    case "gate":
    case "approval":
      return renderGateOutcome(result.outcome, options);

    case "history":
      return renderHistory(result.entries);

    case "history_cleared":
      return "🗑️ Message history cleared";

    case "invalid_arguments":
      return `❌ Invalid arguments for ${commandPrefix}${result.action}: ${result.message}`;

    case "unrecognized":
      return `❓ Unknown command: ${commandPrefix}${result.action}. Available: ${result.available
        .map((action) => `${commandPrefix}${action}`)
        .join(", ")}`;
  }
}
