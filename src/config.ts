import * as dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const fallbackOrigins = ["http://localhost:5173", "http://localhost:4173"];

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8787),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  CORS_ORIGINS: z.string().optional(),
  APP_PREFIX: z.string().regex(/^\/[\w-]*$/, "APP_PREFIX must start with '/'").default("/robot"),
  DECK_SEED: z.coerce.number().int().optional(),
});

export type LogLevel = z.infer<typeof EnvSchema>["LOG_LEVEL"];

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  corsOrigins: string[];
  prefix: string;
  deckSeed?: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = EnvSchema.parse(env);
  const configured = e.CORS_ORIGINS?.split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    corsOrigins: configured && configured.length > 0 ? configured : fallbackOrigins,
    // "/" はプレフィックスなし扱い
    prefix: e.APP_PREFIX === "/" ? "" : e.APP_PREFIX,
    deckSeed: e.DECK_SEED,
  };
}
