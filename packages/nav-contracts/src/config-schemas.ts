/**
 * Zod Schemas for Navigation Configuration
 *
 * Runtime validation for configs loaded from YAML or the environment.
 */

import { z } from 'zod';
import { ConfigValidationError } from './errors.js';

export const RunModeSchema = z.enum(['live', 'simulated']);

export const LogLevelSettingSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const NavigationConfigSchema = z.object({
  /** `live` probes the application, `simulated` draws from the weights */
  mode: RunModeSchema.default('live'),
  /** Probe every registry id when the candidates turn up nothing */
  exhaustiveFallback: z.boolean().default(true),
  maxConcurrentProbes: z.number().int().positive().default(1),
  logLevel: LogLevelSettingSchema.default('info'),
});

export type RunMode = z.infer<typeof RunModeSchema>;
export type LogLevelSetting = z.infer<typeof LogLevelSettingSchema>;
export type NavigationConfig = z.infer<typeof NavigationConfigSchema>;
export type NavigationConfigInput = z.input<typeof NavigationConfigSchema>;

function toIssues(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Parse and validate navigation configuration
 */
export function parseNavigationConfig(data: unknown): NavigationConfig {
  const result = NavigationConfigSchema.safeParse(data);
  if (!result.success) {
    throw toIssues(result.error);
  }
  return result.data;
}

/**
 * Validate navigation configuration without throwing
 */
export function validateNavigationConfig(data: unknown): {
  success: boolean;
  data?: NavigationConfig;
  error?: ConfigValidationError;
} {
  const result = NavigationConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: toIssues(result.error) };
}
