import { spawn, ChildProcess } from "child_process";
import {
  ExecutionFailureReason,
  ExecutionResult,
} from "@warden/types";
import { logger } from "../utils/logger";

export const DEFAULT_COMMAND_TIMEOUT_MS = 30000;

export interface RunnerConfig {
  timeoutMs: number;
  maxConcurrent: number;
  osType: "windows" | "linux";
  cwd?: string;
}

/**
 * Runs shell commands in child processes under a hard wall-clock bound.
 *
 * Commands never block the event loop; a bounded queue caps how many
 * run at once. A non-zero exit code is still a successful run: callers
 * decide what an exit code means.
 */
export class CommandRunner {
  private config: RunnerConfig;
  private active = 0;
  private waiting: Array<() => void> = [];
  private runningProcesses: Set<ChildProcess> = new Set();

  constructor(config: Partial<RunnerConfig> = {}) {
    this.config = {
      timeoutMs: config.timeoutMs || DEFAULT_COMMAND_TIMEOUT_MS,
      maxConcurrent: config.maxConcurrent || 4,
      osType: config.osType || "linux",
      cwd: config.cwd,
    };
  }

  async run(command: string): Promise<ExecutionResult> {
    await this.acquireSlot();
    try {
      return await this.execute(command);
    } finally {
      this.releaseSlot();
    }
  }

  get stats(): { active: number; queued: number } {
    return { active: this.active, queued: this.waiting.length };
  }

  /**
   * Kill all running processes (for shutdown)
   */
  killAllProcesses(): void {
    logger.info("Killing all running processes", {
      count: this.runningProcesses.size,
    });

    for (const child of this.runningProcesses) {
      this.killTree(child);
    }

    this.runningProcesses.clear();
  }

  private get shell(): string {
    return this.config.osType === "windows" ? "cmd.exe" : "/bin/sh";
  }

  private execute(command: string): Promise<ExecutionResult> {
    const { timeoutMs } = this.config;
    const startedAt = Date.now();

    logger.info("Executing command", {
      command: command.substring(0, 100),
      timeout: timeoutMs,
    });

    return new Promise((resolve) => {
      let settled = false;
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let child: ChildProcess | undefined;
      let timeoutId: NodeJS.Timeout | undefined;

      const finish = (result: ExecutionResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        if (child) {
          this.runningProcesses.delete(child);
        }

        logger.info("Command finished", {
          succeeded: result.succeeded,
          exitCode: result.succeeded ? result.exitCode : undefined,
          reason: result.succeeded ? undefined : result.reason,
          durationMs: result.durationMs,
        });
        resolve(result);
      };

      const launchFailed = (error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        logger.error("Command launch failed", {
          command: command.substring(0, 100),
          error: message,
        });
        finish({
          succeeded: false,
          reason: ExecutionFailureReason.LAUNCH,
          errorMessage: message,
          durationMs: Date.now() - startedAt,
        });
      };

      let proc: ChildProcess;
      try {
        // spawn throws synchronously on argument errors such as NUL bytes
        proc = spawn(command, {
          cwd: this.config.cwd,
          shell: this.shell,
          stdio: ["ignore", "pipe", "pipe"],
          // Own process group, so a timeout can take the whole tree down
          detached: this.config.osType !== "windows",
          windowsHide: true,
        });
      } catch (error) {
        launchFailed(error);
        return;
      }
      child = proc;
      this.runningProcesses.add(proc);

      timeoutId = setTimeout(() => {
        logger.warn("Command timed out", {
          command: command.substring(0, 100),
          timeout: timeoutMs,
        });
        this.killTree(proc);
        proc.stdout?.destroy();
        proc.stderr?.destroy();

        finish({
          succeeded: false,
          reason: ExecutionFailureReason.TIMEOUT,
          errorMessage: `Command timed out after ${timeoutMs}ms`,
          durationMs: Date.now() - startedAt,
        });
      }, timeoutMs);

      proc.stdout?.on("data", (data: Buffer) => {
        stdout.push(data);
      });

      proc.stderr?.on("data", (data: Buffer) => {
        stderr.push(data);
      });

      proc.on("close", (code, signal) => {
        if (code === null) {
          logger.warn("Command terminated by signal", { signal });
        }
        finish({
          succeeded: true,
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: Buffer.concat(stderr).toString("utf8"),
          exitCode: code ?? -1,
          durationMs: Date.now() - startedAt,
        });
      });

      proc.on("error", launchFailed);
    });
  }

  private killTree(child: ChildProcess): void {
    try {
      if (child.pid !== undefined && this.config.osType !== "windows") {
        process.kill(-child.pid, "SIGKILL");
      } else {
        child.kill("SIGKILL");
      }
    } catch (error) {
      // The group may already be gone
      logger.debug("Failed to kill process", {
        pid: child.pid,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private acquireSlot(): Promise<void> {
    if (this.active < this.config.maxConcurrent) {
      this.active++;
      return Promise.resolve();
    }

    logger.debug("Command queued", { queued: this.waiting.length + 1 });
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private releaseSlot(): void {
    const next = this.waiting.shift();
    if (next) {
      // Slot passes straight to the next waiter
      next();
    } else {
      this.active--;
    }
  }
}

export default CommandRunner;
