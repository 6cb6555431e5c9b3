import { existsSync } from "fs";
import { z } from "zod";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Env = z.infer<typeof EnvSchema>;

/** Loads `.env.local` then `.env` into `process.env`; existing variables win. */
export function loadEnvFiles(files: string[] = [".env.local", ".env"]): void {
  if (typeof process.loadEnvFile !== "function") return;
  for (const file of files) {
    if (existsSync(file)) process.loadEnvFile(file);
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Env {
  return EnvSchema.parse(env);
}
