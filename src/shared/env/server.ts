// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for the ledger runtime; provides lazy cached access. Does not read files.
 * Invariants: Validated on first access; fails fast on invalid env; ADMIN_ADDRESS is checksummed.
 * Side-effects: process.env
 * Notes: APP_ENV controls adapter wiring; MAX_CLAIM_BATCH may lower (never raise) the batch ceiling.
 * Links: src/bootstrap/container.ts
 * @public
 */

import { getAddress, isAddress, type Address } from "viem";
import { ZodError, z } from "zod";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const addressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), {
    message: "Expected a 20-byte hex address",
  })
  .transform((value): Address => getAddress(value));

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Application environment (controls adapter wiring)
  APP_ENV: z.enum(["test", "production"]).default("production"),

  // Service identity for observability
  SERVICE_NAME: z.string().default("solar-ledger"),

  // Ledger administrator (pause, price correction, dust rescue, createProjectFor)
  ADMIN_ADDRESS: addressSchema,

  // Ceiling mirrors core MAX_CLAIM_BATCH; shared never imports core
  MAX_CLAIM_BATCH: z.coerce.number().int().min(1).max(100).default(100),

  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),
});

type ServerEnv = z.infer<typeof serverSchema> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
  isTestMode: boolean;
};

let ENV: ServerEnv | null = null;

/**
 * Parse an arbitrary env record. Exposed for tests; production code calls serverEnv().
 */
export function parseServerEnv(
  source: Record<string, string | undefined>
): ServerEnv {
  try {
    const parsed = serverSchema.parse(source);
    return {
      ...parsed,
      isDev: parsed.NODE_ENV === "development",
      isTest: parsed.NODE_ENV === "test",
      isProd: parsed.NODE_ENV === "production",
      isTestMode: parsed.APP_ENV === "test",
    };
  } catch (error) {
    if (error instanceof ZodError) {
      const missing = new Set<string>();
      const invalid = new Set<string>();

      for (const issue of error.issues) {
        const key = issue.path[0]?.toString();
        if (!key) continue;

        // invalid_type on an absent key is how zod reports a missing var
        if (issue.code === "invalid_type" && source[key] === undefined) {
          missing.add(key);
        } else {
          invalid.add(key);
        }
      }

      throw new EnvValidationError({
        code: "INVALID_ENV",
        missing: [...missing],
        invalid: [...invalid],
      });
    }

    throw error;
  }
}

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    // biome-ignore lint/style/noProcessEnv: the one validated read of process.env
    ENV = parseServerEnv(process.env);
  }
  return ENV;
}

/** Drop the cached env so the next serverEnv() call re-reads process.env */
export function resetServerEnv(): void {
  ENV = null;
}

export type { ServerEnv };
