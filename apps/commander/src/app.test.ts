import { beforeEach, describe, expect, it } from "@jest/globals";
import request from "supertest";
import { Express } from "express";
import { createApp, createServices } from "./app";
import { loadConfig } from "./config";
import { CompletionEngine } from "./services/completion-engine";

const completionEngine: CompletionEngine = {
  complete: async () => "Sure.\nCOMMAND: echo from-ai",
};

describe("command gate API", () => {
  let app: Express;

  beforeEach(() => {
    const config = loadConfig({
      NODE_ENV: "test",
      DANGEROUS_COMMANDS: "rm -rf",
      COMMAND_TIMEOUT_MS: "5000",
    });
    app = createApp(config, createServices(config, { completionEngine }));
  });

  it("reports health", async () => {
    const response = await request(app).get("/health").expect(200);

    expect(response.body).toMatchObject({
      healthy: true,
      details: { pendingApprovals: 0, sessions: 0 },
    });
  });

  it("runs safe commands and renders their output", async () => {
    const response = await request(app)
      .post("/api/sessions/c1/actions/exec")
      .send({ args: "echo hi" })
      .expect(200);

    expect(response.body.result).toMatchObject({
      kind: "gate",
      outcome: {
        status: "executed",
        execution: { succeeded: true, stdout: "hi\n", exitCode: 0 },
      },
    });
    expect(response.body.rendered).toBe(
      "⚙️ Executing command: `echo hi`\n📤 **Output:**\n```\nhi\n\n```\n"
    );
  });

  it("parks dangerous commands until they are approved", async () => {
    const parked = await request(app)
      .post("/api/sessions/c1/actions/exec")
      .send({ args: "echo rm -rf" })
      .expect(200);
    const ticketId: string = parked.body.result.outcome.ticketId;

    const pending = await request(app).get("/api/approvals").expect(200);
    expect(pending.body.approvals).toHaveLength(1);
    expect(pending.body.approvals[0]).toMatchObject({
      id: ticketId,
      command: "echo rm -rf",
      riskLevel: "medium",
    });

    const approved = await request(app)
      .post("/api/sessions/c1/actions/approve")
      .send({ args: ticketId })
      .expect(200);
    expect(approved.body.result.outcome.execution.stdout).toBe("rm -rf\n");

    const again = await request(app)
      .post("/api/sessions/c1/actions/approve")
      .send({ args: ticketId })
      .expect(200);
    expect(again.body.rendered).toBe("❌ Command not found or already executed");
  });

  it("answers malformed JSON bodies with a client error", async () => {
    const response = await request(app)
      .post("/api/sessions/c1/actions/exec")
      .set("Content-Type", "application/json")
      .send("{bad")
      .expect(400);

    expect(response.body.error).toBe("BAD_REQUEST");
  });

  it("runs commands proposed by the completion engine", async () => {
    const response = await request(app)
      .post("/api/sessions/c1/actions/ask")
      .send({ args: "say something" })
      .expect(200);

    expect(response.body.result).toMatchObject({
      kind: "answer",
      reply: "Sure.",
      commands: [{ status: "executed", command: "echo from-ai" }],
    });
  });

  it("answers unknown actions without failing", async () => {
    const response = await request(app)
      .post("/api/sessions/c1/actions/deploy")
      .send({})
      .expect(200);

    expect(response.body.result.kind).toBe("unrecognized");
  });

  it("rejects malformed request bodies", async () => {
    const response = await request(app)
      .post("/api/sessions/c1/actions/exec")
      .send({ args: 42 })
      .expect(400);

    expect(response.body.error).toBe("VALIDATION_ERROR");
  });

  it("returns 404 for unknown routes", async () => {
    const response = await request(app).get("/nope").expect(404);

    expect(response.body).toEqual({
      error: "NOT_FOUND",
      message: "Route GET /nope not found",
    });
  });
});
