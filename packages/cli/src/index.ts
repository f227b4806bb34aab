/**
 * cratedoc command-line interface
 *
 * Commands are registered explicitly so oclif can load them from source.
 */

import Extract from './commands/extract.js';
import Validate from './commands/validate.js';

export const COMMANDS = {
  extract: Extract,
  validate: Validate,
};

export { configFromFlags, resolveExtractConfig } from './utils/extract-config.js';
export type { ExtractFlags } from './utils/extract-config.js';
