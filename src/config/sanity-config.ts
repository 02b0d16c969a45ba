/**
 * Optional project config file with Zod validation.
 *
 * Reads `.dataset-sanity.json`, fills missing fields with defaults and
 * reports invalid input with the failing field path. A missing file
 * means all defaults.
 *
 * @module config/sanity-config
 */

import { readFile } from 'fs/promises';
import { availableParallelism } from 'os';
import { z } from 'zod';
import { isErrnoException } from '../sanity/errors.js';

// ============================================================================
// Schema
// ============================================================================

/** Default path for the config file, relative to the working directory. */
export const DEFAULT_CONFIG_PATH = '.dataset-sanity.json';

export const SanityConfigSchema = z
  .object({
    /** Rule ids or group tags to skip. */
    exclude: z.array(z.string().min(1)).default([]),
    /** WARNING failures also fail the run. */
    strict: z.boolean().default(false),
    /** Show WARNING reasons in the checklist. */
    includeWarnings: z.boolean().default(false),
    /** Attempt fixes for fixable rules. */
    fix: z.boolean().default(false),
    /** Dataset versions checked at once. */
    concurrency: z.number().int().min(1).max(256).optional(),
  })
  .strict();

export type SanityConfig = z.infer<typeof SanityConfigSchema>;

export const DEFAULT_SANITY_CONFIG: SanityConfig = SanityConfigSchema.parse({});

// ============================================================================
// Error type
// ============================================================================

/** Config file is not valid JSON or fails validation. */
export class SanityConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'SanityConfigError';
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Validate raw input against the config schema (no I/O).
 */
export function validateSanityConfig(
  raw: unknown,
): { valid: true; config: SanityConfig } | { valid: false; errors: string[] } {
  const result = SanityConfigSchema.safeParse(raw);
  if (result.success) {
    return { valid: true, config: result.data };
  }
  return {
    valid: false,
    errors: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
  };
}

/**
 * Read and validate the config file.
 *
 * @throws {SanityConfigError} On invalid JSON or validation failure
 */
export async function readSanityConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<SanityConfig> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return DEFAULT_SANITY_CONFIG;
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new SanityConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  const validated = validateSanityConfig(raw);
  if (!validated.valid) {
    throw new SanityConfigError(
      `Config validation failed:\n${validated.errors.join('\n')}`,
      validated.errors[0]?.split(':')[0],
    );
  }
  return validated.config;
}

/** Concurrency from config, or the number of CPUs available. */
export function effectiveConcurrency(config: SanityConfig): number {
  return config.concurrency ?? availableParallelism();
}
