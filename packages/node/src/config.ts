/**
 * @pft-node/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * main() loads a `.env` file with dotenv before calling loadConfig().
 */

import { z } from "zod";
import { isWebSocketUrl } from "@pft-node/chain-observer";
import type { ConnectionManagerOptions, EndpointSources, RetryConfig } from "@pft-node/chain-observer";
import type { ResponderConfig } from "@pft-node/responder";
import type { AnalysisClientOptions } from "./services/analysis-client.js";

// =============================================================================
// Schema
// =============================================================================

const milliseconds = (fallback: number) =>
  z.coerce.number().int().min(0).default(fallback);

const flag = (fallback: "true" | "false") =>
  z.string().transform((v) => v === "true").default(fallback);

/** An empty value is allowed and disables the endpoint */
const ledgerUrl = (name: string) =>
  z
    .string()
    .trim()
    .refine((v) => v === "" || isWebSocketUrl(v), `${name} must be a ws:// or wss:// URL`);

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Node wallet
  NODE_WALLET_SEED: z
    .string({ required_error: "NODE_WALLET_SEED is required" })
    .trim()
    .min(1, "NODE_WALLET_SEED is required"),

  // Ledger endpoints (an empty value disables that endpoint)
  LOCAL_NODE_URL: ledgerUrl("LOCAL_NODE_URL").default("ws://127.0.0.1:6006"),
  RIPPLED_URL: ledgerUrl("RIPPLED_URL").optional(),
  PUBLIC_NODE_URL: ledgerUrl("PUBLIC_NODE_URL").default("wss://s2.ripple.com"),

  // Token
  TOKEN_CURRENCY: z.string().trim().min(1).default("PFT"),
  TOKEN_ISSUER: z.string().trim().min(1).default("rnQUEEg8yyjrwk9FhyXpKavHyCRJM9BDMW"),
  RESPONSE_AMOUNT: z
    .string()
    .trim()
    .regex(/^\d+(\.\d+)?$/, "RESPONSE_AMOUNT must be a positive decimal")
    .default("1"),
  ENSURE_TRUST_LINE: flag("true"),
  TRUST_LINE_LIMIT: z
    .string()
    .trim()
    .regex(/^\d+(\.\d+)?$/, "TRUST_LINE_LIMIT must be a positive decimal")
    .default("100000000"),

  // Connectivity
  CONNECT_TIMEOUT_MS: milliseconds(10_000),
  REQUEST_TIMEOUT_MS: milliseconds(20_000),
  RECONNECT_BASE_DELAY_MS: milliseconds(1_000),
  RECONNECT_MAX_DELAY_MS: milliseconds(60_000),
  RECONNECT_MAX_FAILURES: z.coerce.number().int().min(1).default(10),

  // Analysis
  OPENAI_API_KEY: z
    .string({ required_error: "OPENAI_API_KEY is required" })
    .trim()
    .min(1, "OPENAI_API_KEY is required"),
  ANALYSIS_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  ANALYSIS_MODEL: z.string().min(1).default("gpt-3.5-turbo"),
  ANALYSIS_TIMEOUT_MS: milliseconds(30_000),
  ANALYSIS_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  ANALYSIS_BASE_DELAY_MS: milliseconds(1_000),

  // Dedup
  DEDUP_FILE: z.string().trim().optional(),
  DEDUP_REBUILD_FROM_HISTORY: flag("false"),
  DEDUP_REBUILD_MAX_PAGES: z.coerce.number().int().min(1).default(10),
  DEDUP_REBUILD_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

// =============================================================================
// Component options
// =============================================================================

export interface RuntimeOptions {
  readonly endpoints: EndpointSources;
  readonly connection: Omit<ConnectionManagerOptions, "endpoints">;
  readonly responder: ResponderConfig;
  readonly analysis: AnalysisClientOptions;
  readonly analysisRetry: RetryConfig;
  readonly token: { readonly currency: string; readonly issuer: string };
  readonly ensureTrustLine: boolean;
  readonly dedup: {
    readonly file: string | undefined;
    /** Undefined when the rebuild is off */
    readonly rebuild: { readonly maxPages: number; readonly maxAttempts: number } | undefined;
  };
}

/**
 * Map validated config onto the options each component takes.
 */
export function toRuntimeOptions(config: AppConfig): RuntimeOptions {
  const token = { currency: config.TOKEN_CURRENCY, issuer: config.TOKEN_ISSUER };

  return {
    endpoints: {
      localUrl: config.LOCAL_NODE_URL,
      configuredUrl: config.RIPPLED_URL,
      publicUrl: config.PUBLIC_NODE_URL,
    },
    connection: {
      connectTimeoutMs: config.CONNECT_TIMEOUT_MS,
      requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
      reconnect: {
        maxConsecutiveFailures: config.RECONNECT_MAX_FAILURES,
        baseDelayMs: config.RECONNECT_BASE_DELAY_MS,
        maxDelayMs: config.RECONNECT_MAX_DELAY_MS,
        jitterMs: Math.min(250, config.RECONNECT_BASE_DELAY_MS),
      },
    },
    responder: {
      seed: config.NODE_WALLET_SEED,
      token,
      amount: config.RESPONSE_AMOUNT,
      trustLineLimit: config.TRUST_LINE_LIMIT,
    },
    analysis: {
      baseUrl: config.ANALYSIS_BASE_URL,
      apiKey: config.OPENAI_API_KEY,
      model: config.ANALYSIS_MODEL,
      timeoutMs: config.ANALYSIS_TIMEOUT_MS,
    },
    analysisRetry: {
      maxAttempts: config.ANALYSIS_MAX_ATTEMPTS,
      baseDelayMs: config.ANALYSIS_BASE_DELAY_MS,
      maxDelayMs: config.ANALYSIS_BASE_DELAY_MS * 8,
      jitterMs: Math.min(200, config.ANALYSIS_BASE_DELAY_MS),
    },
    token,
    ensureTrustLine: config.ENSURE_TRUST_LINE,
    dedup: {
      file: config.DEDUP_FILE !== undefined && config.DEDUP_FILE !== "" ? config.DEDUP_FILE : undefined,
      rebuild: config.DEDUP_REBUILD_FROM_HISTORY
        ? {
            maxPages: config.DEDUP_REBUILD_MAX_PAGES,
            maxAttempts: config.DEDUP_REBUILD_MAX_ATTEMPTS,
          }
        : undefined,
    },
  };
}
