// lib/env.ts
import fs from "node:fs";
import path from "node:path";
import { parse as parseDotenv } from "dotenv";
import { z } from "zod";

const toBool = (v?: string) => typeof v === "string" && /^(1|true|yes|y|on)$/i.test(v.trim());

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  // search-time AC-3 after each assignment; off keeps domains read-only during search
  CROSSWORD_INFERENCE: z
    .string()
    .optional()
    .transform((v) => (v ? toBool(v) : false))
    .pipe(z.boolean()),
});

export type Env = z.infer<typeof envSchema>;
export type LogLevel = Env["LOG_LEVEL"];

// Shell values win over .env; .env.local wins over .env
function loadDotenv(cwd: string): Record<string, string | undefined> {
  const merged: Record<string, string | undefined> = {};
  for (const file of [".env", ".env.local"]) {
    const p = path.join(cwd, file);
    if (fs.existsSync(p)) Object.assign(merged, parseDotenv(fs.readFileSync(p)));
  }
  return merged;
}

export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse({
    NODE_ENV: source.NODE_ENV,
    LOG_LEVEL: source.LOG_LEVEL,
    CROSSWORD_INFERENCE: source.CROSSWORD_INFERENCE,
  });
}

export const env = parseEnv({ ...loadDotenv(process.cwd()), ...process.env });
