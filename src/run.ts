/**
 * ecef-to-sez command
 *
 * Parses six ECEF coordinates (observer, then target) and prints the
 * target's south, east and zenith components, one per line.
 */

import { parseArgs, USAGE } from './args.js';
import { ecefToSez } from './transform/ecef.js';
import { UsageError } from './utils/errors.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('cli');

/**
 * Run the command and return its exit code
 */
export function runCli(args: readonly string[]): number {
  try {
    const { observer, target } = parseArgs(args);
    logger.debug({ observer, target }, 'Parsed arguments');

    const sez = ecefToSez(observer, target);

    console.log(String(sez.south));
    console.log(String(sez.east));
    console.log(String(sez.zenith));

    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      console.log(USAGE);
      return 1;
    }

    logger.debug({ error }, 'Conversion failed');
    console.error('Error:', error instanceof Error ? error.message : error);
    return 1;
  }
}
