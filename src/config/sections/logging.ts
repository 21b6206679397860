/**
 * Logging configuration schema
 */

import { z } from 'zod';

const levelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

export const loggingConfigSchema = z.object({
  consoleLevel: levelSchema.default('info'),
  fileLevel: levelSchema.default('info'),
  /** Log file, relative to the install root. Empty string disables file output. */
  file: z.string().default('logs/host.log'),
  maxSize: z.number().int().positive().default(10485760),
  maxFiles: z.number().int().positive().default(30),
});
