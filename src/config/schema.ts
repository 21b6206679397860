/**
 * Configuration schema validation using Zod
 */

import { z } from 'zod';
import { loggingConfigSchema, pluginsConfigSchema, shellConfigSchema } from './sections/index.js';

export const hostConfigSchema = z.object({
  /** Host version reported to plugins */
  version: z.string().min(1).default('0.1.0'),
  plugins: pluginsConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
  shell: shellConfigSchema.default({}),
});

export type HostConfig = z.infer<typeof hostConfigSchema>;

export type ConfigValidation =
  | { success: true; data: HostConfig }
  | { success: false; error: string };

export function validateConfig(data: unknown): ConfigValidation {
  const result = hostConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; '),
  };
}

/** Configuration with every default applied. */
export function defaultConfig(): HostConfig {
  return hostConfigSchema.parse({});
}
