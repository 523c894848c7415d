import crypto from "crypto";
import {
  ApprovalTicket,
  ApprovalTicketSummary,
  ClassificationResult,
  ResolveResult,
  toCommand,
} from "@warden/types";
import { logger } from "../utils/logger";

export const TICKET_ID_LENGTH = 8;

const getHash = (text: string, slice: number = TICKET_ID_LENGTH): string =>
  crypto.createHash("sha256").update(text).digest("hex").slice(0, slice);

interface LedgerConfig {
  ticketTtlMs: number; // 0 keeps tickets until resolved
  now: () => number;
  hashId: (text: string) => string;
}

/**
 * Keyed store of commands waiting for a human to approve them.
 *
 * Every mutation is a single synchronous step, so concurrent request
 * handlers on the event loop cannot interleave inside park or resolve:
 * two approvals racing for the same id see exactly one winner.
 */
export class ApprovalLedger {
  private tickets: Map<string, ApprovalTicket> = new Map();
  private config: LedgerConfig;

  constructor(config: Partial<LedgerConfig> = {}) {
    this.config = {
      ticketTtlMs: config.ticketTtlMs ?? 0,
      now: config.now ?? Date.now,
      hashId: config.hashId ?? ((text) => getHash(text)),
    };
  }

  /**
   * Park a command and return its ticket id.
   * The id is content-derived; a clash with a different command is
   * resolved by salting the hash until a free or identical slot is found.
   */
  park(text: string, classification: ClassificationResult): string {
    this.pruneExpired();

    const id = this.allocateId(text);
    const ticket: ApprovalTicket = {
      id,
      command: toCommand(text),
      classification,
      createdAt: this.config.now(),
    };
    this.tickets.set(id, ticket);

    logger.info("Command parked for approval", {
      ticketId: id,
      riskLevel: classification.riskLevel,
      pending: this.tickets.size,
    });

    return id;
  }

  /**
   * Remove and return a ticket. A ticket can be resolved at most once.
   */
  resolve(ticketId: string): ResolveResult {
    this.pruneExpired();

    const ticket = this.tickets.get(ticketId);
    if (!ticket) {
      logger.warn("Approval requested for unknown ticket", { ticketId });
      return { found: false, ticketId };
    }

    this.tickets.delete(ticketId);
    logger.info("Ticket resolved", {
      ticketId,
      pending: this.tickets.size,
    });

    return { found: true, ticket };
  }

  pending(): ApprovalTicketSummary[] {
    this.pruneExpired();

    return Array.from(this.tickets.values()).map((ticket) => ({
      id: ticket.id,
      command: ticket.command.text,
      riskLevel: ticket.classification.riskLevel,
      createdAt: new Date(ticket.createdAt).toISOString(),
    }));
  }

  get size(): number {
    this.pruneExpired();
    return this.tickets.size;
  }

  private allocateId(text: string): string {
    let salt = 0;
    let id = this.config.hashId(text);

    for (;;) {
      const existing = this.tickets.get(id);
      if (!existing || existing.command.text === text) {
        return id;
      }

      salt++;
      logger.warn("Ticket id collision, rehashing", { ticketId: id, salt });
      id = this.config.hashId(`${salt}:${text}`);
    }
  }

  private pruneExpired(): void {
    if (this.config.ticketTtlMs <= 0) return;

    const cutoff = this.config.now() - this.config.ticketTtlMs;
    for (const [id, ticket] of this.tickets) {
      if (ticket.createdAt <= cutoff) {
        this.tickets.delete(id);
        logger.info("Approval ticket expired", { ticketId: id });
      }
    }
  }
}

export default ApprovalLedger;
