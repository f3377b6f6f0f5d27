/**
 * Transform Module
 *
 * ECEF to local South-East-Zenith coordinates and back.
 */

export {
  ecefToGeocentric,
  sezRotation,
  ecefToSez,
  sezToEcef,
  ecefDistance,
} from './ecef.js';

export {
  transpose,
  transformVector,
  isOrthonormal,
  type Matrix3,
  type Vector3,
} from './matrix.js';
