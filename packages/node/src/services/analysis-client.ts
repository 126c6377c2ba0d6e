/**
 * Analysis Client
 *
 * Sends memo text to an OpenAI-compatible chat completions endpoint and
 * returns the model's analysis. analyze() never throws: every failure is
 * folded into an AnalysisResult with an AnalysisError.
 */

import { z } from "zod";
import type { AnalysisResult } from "@pft-node/types";
import { describeError } from "@pft-node/chain-observer";

export const SYSTEM_PROMPT =
  "You are analyzing PFT transaction memos. Extract key information and intentions from the memo.";

export function buildUserPrompt(memoText: string): string {
  return `Please analyze this memo: ${memoText}`;
}

// =============================================================================
// Errors
// =============================================================================

export type AnalysisErrorCode = "TIMEOUT" | "NETWORK" | "HTTP_ERROR" | "INVALID_RESPONSE";

export class AnalysisError extends Error {
  constructor(
    public readonly code: AnalysisErrorCode,
    message: string,
    /** HTTP status for HTTP_ERROR */
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AnalysisError";
  }
}

// =============================================================================
// Client
// =============================================================================

export interface AnalysisClientOptions {
  /** API root, e.g. "https://api.openai.com/v1" */
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly model: string;

  /** Bound on one request including the body read. Default: 30000 */
  readonly timeoutMs?: number;
}

/**
 * Anything that can analyze memo text. The monitor loop depends on this,
 * not on the HTTP client.
 */
export interface MemoAnalyzer {
  analyze(text: string): Promise<AnalysisResult<AnalysisError>>;
}

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .min(1),
});

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

export class AnalysisClient implements MemoAnalyzer {
  private readonly url: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(options: AnalysisClientOptions) {
    this.url = `${options.baseUrl.trim().replace(/\/+$/, "")}/chat/completions`;
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async analyze(text: string): Promise<AnalysisResult<AnalysisError>> {
    try {
      const analysis = await this.complete(text);
      return { sourceText: text, text: analysis, success: true };
    } catch (err: unknown) {
      const error =
        err instanceof AnalysisError
          ? err
          : new AnalysisError("NETWORK", `Analysis request failed: ${describeError(err)}`, undefined, {
              cause: err,
            });
      return { sourceText: text, text: "", success: false, error };
    }
  }

  private async complete(text: string): Promise<string> {
    let body: string;
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.model,
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: buildUserPrompt(text) },
          ],
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      body = await response.text();
    } catch (err: unknown) {
      if (isAbort(err)) {
        throw new AnalysisError("TIMEOUT", `Analysis timed out after ${this.timeoutMs}ms`, undefined, {
          cause: err,
        });
      }
      throw new AnalysisError("NETWORK", `Analysis request failed: ${describeError(err)}`, undefined, {
        cause: err,
      });
    }

    const payload = parseJsonSafe(body);

    if (!response.ok) {
      const apiError = ErrorBodySchema.safeParse(payload);
      throw new AnalysisError(
        "HTTP_ERROR",
        apiError.success
          ? `Analysis API returned ${response.status}: ${apiError.data.error.message}`
          : `Analysis API returned ${response.status}`,
        response.status,
      );
    }

    const parsed = CompletionSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AnalysisError("INVALID_RESPONSE", "Analysis API returned an unexpected body");
    }

    const content = parsed.data.choices[0]?.message.content?.trim() ?? "";
    if (content === "") {
      throw new AnalysisError("INVALID_RESPONSE", "Analysis API returned an empty completion");
    }
    return content;
  }
}

function parseJsonSafe(text: string): unknown {
  if (text === "") return null;
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text.slice(0, 4000) };
  }
}

function isAbort(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "name" in err &&
    (err.name === "TimeoutError" || err.name === "AbortError")
  );
}
