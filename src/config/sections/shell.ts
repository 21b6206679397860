/**
 * Shell capability configuration schema
 */

import { z } from 'zod';

export const shellConfigSchema = z.object({
  /** Default timeout for System.run_tool_command */
  timeoutMs: z.number().int().positive().default(30000),
});
