import { describe, expect, it } from "@jest/globals";
import { classify } from "@warden/command-security";
import { ApprovalLedger } from "./approval-ledger";

const verdict = (text: string) => classify(text, ["rm -rf"]);

describe("ApprovalLedger", () => {
  it("hands out 8-character hex ticket ids", () => {
    const ledger = new ApprovalLedger();

    const id = ledger.park("rm -rf build", verdict("rm -rf build"));

    expect(id).toMatch(/^[0-9a-f]{8}$/);
  });

  it("resolves a parked command exactly once", () => {
    const ledger = new ApprovalLedger();
    const id = ledger.park("rm -rf build", verdict("rm -rf build"));

    const first = ledger.resolve(id);
    const second = ledger.resolve(id);

    expect(first.found).toBe(true);
    if (first.found) {
      expect(first.ticket.command).toEqual({ text: "rm -rf build", length: 12 });
      expect(first.ticket.classification.matchedDangerousTerms).toEqual(["rm -rf"]);
    }
    expect(second).toEqual({ found: false, ticketId: id });
  });

  it("reports unknown ids as not found", () => {
    const ledger = new ApprovalLedger();

    expect(ledger.resolve("00000000")).toEqual({
      found: false,
      ticketId: "00000000",
    });
  });

  it("derives the same id for the same command text", () => {
    const ledger = new ApprovalLedger();

    const first = ledger.park("rm -rf a", verdict("rm -rf a"));
    const second = ledger.park("rm -rf a", verdict("rm -rf a"));

    expect(second).toBe(first);
    expect(ledger.size).toBe(1);
  });

  it("rehashes instead of overwriting when two commands share an id", () => {
    const ledger = new ApprovalLedger({
      hashId: (text) => (text.startsWith("1:") ? "bbbbbbbb" : "aaaaaaaa"),
    });

    const first = ledger.park("rm -rf a", verdict("rm -rf a"));
    const second = ledger.park("rm -rf b", verdict("rm -rf b"));

    expect(first).toBe("aaaaaaaa");
    expect(second).toBe("bbbbbbbb");

    const a = ledger.resolve("aaaaaaaa");
    const b = ledger.resolve("bbbbbbbb");
    expect(a.found && a.ticket.command.text).toBe("rm -rf a");
    expect(b.found && b.ticket.command.text).toBe("rm -rf b");
  });

  it("only lets one of two racing approvals through", async () => {
    const ledger = new ApprovalLedger();
    const id = ledger.park("rm -rf x", verdict("rm -rf x"));

    const results = await Promise.all([
      Promise.resolve().then(() => ledger.resolve(id)),
      Promise.resolve().then(() => ledger.resolve(id)),
    ]);

    expect(results.filter((r) => r.found)).toHaveLength(1);
  });

  it("expires tickets older than the ttl", () => {
    let now = 1_000;
    const ledger = new ApprovalLedger({ ticketTtlMs: 500, now: () => now });
    const id = ledger.park("rm -rf old", verdict("rm -rf old"));

    now = 1_499;
    expect(ledger.size).toBe(1);

    now = 1_500;
    expect(ledger.resolve(id)).toEqual({ found: false, ticketId: id });
  });

  it("keeps tickets forever when no ttl is set", () => {
    let now = 0;
    const ledger = new ApprovalLedger({ now: () => now });
    const id = ledger.park("rm -rf keep", verdict("rm -rf keep"));

    now = Number.MAX_SAFE_INTEGER;

    expect(ledger.resolve(id).found).toBe(true);
  });

  it("summarises pending tickets", () => {
    const ledger = new ApprovalLedger({ now: () => 0 });
    const id = ledger.park("rm -rf tmp", verdict("rm -rf tmp"));

    expect(ledger.pending()).toEqual([
      {
        id,
        command: "rm -rf tmp",
        riskLevel: "medium",
        createdAt: "1970-01-01T00:00:00.000Z",
      },
    ]);
  });
});
