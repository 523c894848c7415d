import dotenv from "dotenv";
import { z } from "zod";
import { DEFAULT_DANGEROUS_TERMS, parseTermList } from "@warden/command-security";

dotenv.config({ debug: false });

const booleanFlag = z
  .union([z.boolean(), z.string().transform((val) => val === "true")])
  .default(false);

export const configSchema = z
  .object({
    PORT: z.coerce.number().default(8080),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),
    LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
    CORS_ORIGIN: z.string().default("*"),

    // Chat surface
    COMMAND_PREFIX: z.string().min(1).default("!"),

    // Completion engine
    OS_TYPE: z.enum(["windows", "linux"]).default("linux"),
    MODEL: z.string().default("gpt-4o"),
    OPENAI_API_KEY: z.string().optional(),
    ANTHROPIC_API_KEY: z.string().optional(),

    // Command policy
    DANGEROUS_COMMANDS: z.string().optional(),
    MAX_COMMAND_LENGTH: z.coerce.number().int().positive().default(1000),
    AUTO_APPROVE_SAFE: booleanFlag,
    COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    MAX_CONCURRENT_COMMANDS: z.coerce.number().int().positive().default(4),
    APPROVAL_TTL_MS: z.coerce.number().int().nonnegative().default(0),

    // Conversation history
    MESSAGE_HISTORY_LIMIT: z.coerce.number().int().positive().default(50),
    HISTORY_RECENT_KEEP: z.coerce.number().int().positive().default(20),
    HISTORY_STRIDE: z.coerce.number().int().positive().default(5),
  });

export const createConfig = (data: z.infer<typeof configSchema>) => ({
  port: data.PORT,
  nodeEnv: data.NODE_ENV,
  logLevel: data.LOG_LEVEL,
  corsOrigin: data.CORS_ORIGIN,
  commandPrefix: data.COMMAND_PREFIX,
  osType: data.OS_TYPE,
  model: data.MODEL,
  openaiApiKey: data.OPENAI_API_KEY,
  anthropicApiKey: data.ANTHROPIC_API_KEY,
  dangerousCommands:
    data.DANGEROUS_COMMANDS === undefined
      ? [...DEFAULT_DANGEROUS_TERMS]
      : parseTermList(data.DANGEROUS_COMMANDS),
  maxCommandLength: data.MAX_COMMAND_LENGTH,
  autoApproveSafe: data.AUTO_APPROVE_SAFE,
  commandTimeoutMs: data.COMMAND_TIMEOUT_MS,
  maxConcurrentCommands: data.MAX_CONCURRENT_COMMANDS,
  approvalTtlMs: data.APPROVAL_TTL_MS,
  historyLimit: data.MESSAGE_HISTORY_LIMIT,
  historyRecentKeep: data.HISTORY_RECENT_KEEP,
  historyStride: data.HISTORY_STRIDE,
  isDevelopment: data.NODE_ENV === "development",
  isProduction: data.NODE_ENV === "production",
});

export type Config = ReturnType<typeof createConfig>;

/**
 * Parse a config from an environment-shaped object. Throws ZodError when invalid.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Config {
  return createConfig(configSchema.parse(env));
}

const parsed = configSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("Invalid environment variables:", parsed.error.format());
  process.exit(1);
}

export const config = createConfig(parsed.data);

export default config;
