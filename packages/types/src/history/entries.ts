export const HistoryRole = {
  USER: "user",
  ASSISTANT: "assistant",
} as const;

export type HistoryRoleType = (typeof HistoryRole)[keyof typeof HistoryRole];

export interface HistoryEntry {
  role: HistoryRoleType;
  content: string;
  timestamp: string;
}

export interface HistoryPolicy {
  limit: number;
  recentKeep: number;
  stride: number;
}
