import dotenv from "dotenv";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
const rootEnvPath = resolve(__dirname, "../../../.env");
const serverEnvPath = resolve(__dirname, "../.env");

if (process.env.DOTENV_CONFIG_PATH) {
  dotenv.config({ path: process.env.DOTENV_CONFIG_PATH });
} else {
  // Load root first, then server-specific overrides.
  dotenv.config({ path: rootEnvPath });
  dotenv.config({ path: serverEnvPath, override: true });
}

export const RiskLevelSchema = z.enum(["low", "medium", "high"]);

export const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().default(8787),
  HOST: z.string().default("0.0.0.0"),
  PUBLIC_ORIGIN: z.string().default("http://localhost:5173"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  DECISION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  AUCTION_ROUNDS: z.coerce.number().int().positive().default(5),
  COMBAT_MAX_TURNS: z.coerce.number().int().positive().default(20),
  POKER_SMALL_BLIND_FRACTION: z.coerce.number().positive().max(0.5).default(0.05),
  RISK_LEVEL: RiskLevelSchema.default("medium"),
  // Overrides the risk level's single-wager cap when set.
  MAX_WAGER_PCT: z.coerce.number().positive().max(1).optional(),
  HOUSE_FEE: z.coerce.number().min(0).max(0.5).default(0.01)
});

export type Env = z.infer<typeof EnvSchema>;

export const env: Env = EnvSchema.parse(process.env);
