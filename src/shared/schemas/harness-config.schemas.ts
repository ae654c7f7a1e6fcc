/**
 * Harness configuration schema
 *
 * Runtime validation and type inference for the options a session is built from.
 */

import { z } from 'zod';
import { StateResetPolicySchema } from '../../browser/state-reset-policy.js';

export const HarnessConfigSchema = z.object({
  headless: z.boolean().default(false).describe('Run the browser without a window'),
  executablePath: z.string().min(1).optional().describe('Path to the Firefox binary'),
  readTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(31_000)
    .describe('Read timeout for every protocol call'),
  downloadDir: z.string().min(1).optional().describe('Directory downloads are saved to'),
  resetPolicy: StateResetPolicySchema.default({}).describe('Stores cleared on reset'),
  resetTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(10_000)
    .describe('Upper bound for a reset to reach the blank page'),
  preNavigationDelayMs: z
    .number()
    .int()
    .nonnegative()
    .default(0)
    .describe('Pause between clearing stores and navigating away'),
  logBrowserVersion: z.boolean().default(false).describe('Log the browser version on launch'),
});

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
export type HarnessConfigInput = z.input<typeof HarnessConfigSchema>;
