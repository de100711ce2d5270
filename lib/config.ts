/**
 * @fileoverview Environment configuration
 * @module lib/config
 */

import { z } from "zod"
import { ConfigurationError } from "./errors"
import { SIMILARITY_METHODS } from "./validation/types"

/** What the workflow does when cross-validation itself fails */
export const VALIDATION_FAILURE_POLICIES = ["fail", "serve_primary"] as const

export type ValidationFailurePolicy = (typeof VALIDATION_FAILURE_POLICIES)[number]

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  ENABLE_CROSS_VALIDATION: z.stringbool().default(false),
  VALIDATION_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.95),
  VALIDATION_SIMILARITY_METHOD: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(SIMILARITY_METHODS))
    .default("number_frequency"),
  VALIDATION_FAILURE_POLICY: z.enum(VALIDATION_FAILURE_POLICIES).default("fail"),
  SENTRY_DSN: z.url().optional(),
})

export interface AppConfig {
  environment: "development" | "test" | "production"
  sentryDsn?: string
  validation: {
    enabled: boolean
    similarityThreshold: number
    similarityMethod: (typeof SIMILARITY_METHODS)[number]
    failurePolicy: ValidationFailurePolicy
  }
}

/**
 * Parse configuration from environment variables.
 *
 * @throws ConfigurationError - one detail per invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw ConfigurationError.fromZodError(parsed.error)
  }

  const vars = parsed.data
  return {
    environment: vars.NODE_ENV,
    sentryDsn: vars.SENTRY_DSN,
    validation: {
      enabled: vars.ENABLE_CROSS_VALIDATION,
      similarityThreshold: vars.VALIDATION_SIMILARITY_THRESHOLD,
      similarityMethod: vars.VALIDATION_SIMILARITY_METHOD,
      failurePolicy: vars.VALIDATION_FAILURE_POLICY,
    },
  }
}
