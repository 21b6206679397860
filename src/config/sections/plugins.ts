/**
 * Plugins configuration schema
 */

import { z } from 'zod';

export const pluginsConfigSchema = z.object({
  /** Directory scanned for plugin sub-directories, relative to the install root */
  dir: z.string().min(1).default('plugins'),
});
