import {
  HistoryEntry,
  HistoryPolicy,
  HistoryRole,
  HistoryRoleType,
} from "@warden/types";
import { logger } from "../utils/logger";

export const DEFAULT_HISTORY_POLICY: HistoryPolicy = {
  limit: 50,
  recentKeep: 20,
  stride: 5,
};

const CONTEXT_CONTENT_LIMIT = 200;

const ROLE_LABELS: Record<HistoryRoleType, string> = {
  [HistoryRole.USER]: "User",
  [HistoryRole.ASSISTANT]: "AI",
};

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Bounded, self-compacting log of one conversation.
 *
 * Once an append pushes the log past its limit, the newest `recentKeep`
 * entries stay as they are and only every `stride`-th older entry
 * survives. Compaction is lossy and happens inside append, so readers
 * never see a half-compacted log.
 */
export class ConversationHistory {
  private entries: HistoryEntry[] = [];
  private policy: HistoryPolicy;

  constructor(
    policy: Partial<HistoryPolicy> = {},
    private now: () => Date = () => new Date()
  ) {
    const limit = policy.limit || DEFAULT_HISTORY_POLICY.limit;
    this.policy = {
      limit,
      recentKeep: Math.min(
        policy.recentKeep || DEFAULT_HISTORY_POLICY.recentKeep,
        limit
      ),
      stride: policy.stride || DEFAULT_HISTORY_POLICY.stride,
    };
  }

  append(role: HistoryRoleType, content: string): void {
    this.entries.push({
      role,
      content,
      timestamp: this.now().toISOString(),
    });

    if (this.entries.length > this.policy.limit) {
      this.compact();
    }
  }

  snapshot(): HistoryEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Render the last `count` entries as role-labelled lines for a prompt
   */
  recentContext(count: number = 5): string {
    if (count <= 0) return "";

    return this.entries
      .slice(-count)
      .map(
        (entry) =>
          `${ROLE_LABELS[entry.role]}: ${truncate(entry.content, CONTEXT_CONTENT_LIMIT)}`
      )
      .join("\n");
  }

  clear(): void {
    this.entries = [];
  }

  private compact(): void {
    const { recentKeep, stride } = this.policy;
    const before = this.entries.length;

    const splitAt = this.entries.length - recentKeep;
    const recent = this.entries.slice(splitAt);
    const older = this.entries
      .slice(0, splitAt)
      .filter((_, index) => index % stride === 0);

    this.entries = [...older, ...recent];

    logger.debug("Conversation history compacted", {
      before,
      after: this.entries.length,
    });
  }
}

/**
 * One conversation history per chat session (channel)
 */
export class HistoryStore {
  private sessions: Map<string, ConversationHistory> = new Map();

  constructor(private policy: Partial<HistoryPolicy> = {}) {}

  get(sessionId: string): ConversationHistory {
    let history = this.sessions.get(sessionId);
    if (!history) {
      history = new ConversationHistory(this.policy);
      this.sessions.set(sessionId, history);
    }
    return history;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }
}

export default ConversationHistory;
