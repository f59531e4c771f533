import path from "path";
import { z } from "zod";
import { imageModelName } from "./llm/google/models.js";

const EnvSchema = z.object({
  GOOGLE_API_KEY: z.string().trim().optional(),
  GEMINI_API_KEY: z.string().trim().optional(),
  PORT: z.coerce.number().int().positive().default(8000),
  STATIC_DIR: z.string().trim().min(1).default("static"),
  IMAGE_MODEL: z.string().trim().min(1).default(imageModelName),
  LOG_LEVEL: z.enum([ "fatal", "error", "warn", "info", "debug", "trace", "silent" ]).default("info"),
});

export interface AppConfig {
  apiKey: string;
  port: number;
  staticDir: string;
  imageModel: string;
  logLevel: string;
}

/**
 * Reads and validates the process environment. The API key is the only
 * required value; GOOGLE_API_KEY wins over GEMINI_API_KEY.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const values = parsed.data;
  const apiKey = values.GOOGLE_API_KEY || values.GEMINI_API_KEY;
  if (!apiKey) {
    throw new Error("The GOOGLE_API_KEY (or GEMINI_API_KEY) environment variable is required.");
  }

  return {
    apiKey,
    port: values.PORT,
    staticDir: path.resolve(values.STATIC_DIR),
    imageModel: values.IMAGE_MODEL,
    logLevel: values.LOG_LEVEL,
  };
}
