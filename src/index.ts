/**
 * ecef-sez
 *
 * Convert ECEF positions into an observer's local South-East-Zenith frame.
 */

// Transform
export {
  ecefToGeocentric,
  sezRotation,
  ecefToSez,
  sezToEcef,
  ecefDistance,
  transpose,
  transformVector,
  isOrthonormal,
  type Matrix3,
  type Vector3,
} from './transform/index.js';

// Types
export type {
  EcefVector,
  SezVector,
  GeocentricPosition,
  ParsedArgs,
} from './types.js';

// CLI
export { parseArgs, parseCoordinate, USAGE } from './args.js';
export { runCli } from './run.js';

// Error types
export { SezError, UsageError, InputError } from './utils/errors.js';

// Logger
export { createLogger } from './utils/logger.js';
