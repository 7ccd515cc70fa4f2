import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const booleanFlag = (defaultValue: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(defaultValue)
    .transform((value) => value === "true");

const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().optional()
);

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  GEMINI_API_KEY: optionalString,
  GEMINI_LIVE_URL: z
    .string()
    .url()
    .default(
      "wss://generativelanguage.googleapis.com/ws/google.ai.generativelanguage.v1beta.GenerativeService.BidiGenerateContent"
    ),
  GEMINI_LIVE_MODEL: z.string().min(1).default("models/gemini-2.5-flash-native-audio-latest"),
  GEMINI_SETUP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  GEMINI_GOOGLE_SEARCH_ENABLED: booleanFlag("true"),
  SYSTEM_INSTRUCTION_PATH: optionalString,
  MCP_CONFIG_PATH: z.string().min(1).default("mcp_config.json"),
  TOOL_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  AUDIO_INPUT_SAMPLE_RATE_HZ: z.coerce.number().int().positive().default(16_000),
  AUDIO_OUTPUT_SAMPLE_RATE_HZ: z.coerce.number().int().positive().default(24_000),
  AUDIO_CHUNK_SAMPLES: z.coerce.number().int().positive().default(1024),
  AUDIO_CAPTURE_COMMAND: z.string().min(1).default("rec"),
  AUDIO_PLAYBACK_COMMAND: z.string().min(1).default("play"),
  AUDIO_CAPTURE_DEVICE: optionalString,
  PLAYBACK_DRAIN_GRACE_MS: z.coerce.number().int().min(0).default(80),
  START_MUTED: booleanFlag("false"),
  SESSION_LOG_DIR: z.string().min(1).default("logs"),
  DATABASE_URL: optionalString,
  OPERATOR_API_ENABLED: booleanFlag("false"),
  HOST: z.string().default("127.0.0.1"),
  PORT: z.coerce.number().int().positive().default(4300),
  OPERATOR_AUTH_TOKEN: optionalString
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid voice-bridge env: ${details}`);
  }
  return parsed.data;
}

export const env = parseEnv(process.env);
