import { ClassificationResult } from "@warden/command-security";
import { ApprovalOutcome, ExecutionResult, GateOutcome } from "@warden/types";
import { logger } from "../utils/logger";
import { ApprovalLedger } from "./approval-ledger";

export interface GatePolicy {
  maxCommandLength: number;
  autoApproveSafe: boolean;
}

export interface GateDependencies {
  classify: (text: string) => ClassificationResult;
  ledger: ApprovalLedger;
  runner: { run(command: string): Promise<ExecutionResult> };
  policy: GatePolicy;
}

/**
 * Decides what happens to a candidate command: run it, park it for
 * approval, or reject it outright.
 */
export class CommandGate {
  constructor(private deps: GateDependencies) {}

  async submit(text: string): Promise<GateOutcome> {
    const { maxCommandLength, autoApproveSafe } = this.deps.policy;

    if (text.length > maxCommandLength) {
      logger.warn("Command rejected: too long", {
        length: text.length,
        maxLength: maxCommandLength,
      });
      return {
        status: "rejected",
        command: text,
        reason: "too_long",
        maxLength: maxCommandLength,
      };
    }

    const classification = this.deps.classify(text);

    // The auto-approve flag lets every command through without a ticket
    if (classification.safe || autoApproveSafe) {
      const execution = await this.deps.runner.run(text);
      return { status: "executed", command: text, classification, execution };
    }

    const ticketId = this.deps.ledger.park(text, classification);
    return {
      status: "pending_approval",
      command: text,
      ticketId,
      classification,
    };
  }

  async approve(ticketId: string): Promise<ApprovalOutcome> {
    const resolved = this.deps.ledger.resolve(ticketId);
    if (!resolved.found) {
      return { status: "ticket_not_found", ticketId };
    }

    const { ticket } = resolved;
    logger.info("Running approved command", { ticketId });

    const execution = await this.deps.runner.run(ticket.command.text);
    return {
      status: "executed",
      command: ticket.command.text,
      classification: ticket.classification,
      execution,
    };
  }
}

export default CommandGate;
