/**
 * Configuration sections index
 */

export { loggingConfigSchema } from './logging.js';
export { pluginsConfigSchema } from './plugins.js';
export { shellConfigSchema } from './shell.js';
