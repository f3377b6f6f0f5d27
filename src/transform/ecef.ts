/**
 * ECEF (Earth-Centered Earth-Fixed) to SEZ (South-East-Zenith) Transforms
 *
 * The observer's frame is derived from the direction of its ECEF vector
 * (spherical Earth). There is no ellipsoid here: latitude is geocentric,
 * not geodetic, and no height is computed.
 */

import { createLogger } from '../utils/logger.js';
import type { EcefVector, GeocentricPosition, SezVector } from '../types.js';
import {
  add,
  fromRows,
  subtract,
  transformVector,
  transpose,
  type Matrix3,
  type Vector3,
} from './matrix.js';

const logger = createLogger('ecef');

/**
 * Convert radians to degrees
 */
function toDegrees(radians: number): number {
  return radians * (180 / Math.PI);
}

/**
 * Geocentric angles of an ECEF vector, in radians.
 * Math.atan2(0, 0) is 0, so a point on the polar axis gets longitude 0.
 */
function geocentricRadians(ecef: EcefVector): { lat: number; lon: number } {
  const [x, y, z] = ecef;

  const lon = Math.atan2(y, x);

  // Distance from the polar axis
  const h = Math.sqrt(x * x + y * y);
  const lat = Math.atan2(z, h);

  return { lat, lon };
}

/**
 * Convert an ECEF vector to geocentric latitude and longitude (degrees)
 *
 * The ECEF origin has no direction; it comes back as latitude 0, longitude 0.
 */
export function ecefToGeocentric(ecef: EcefVector): GeocentricPosition {
  const { lat, lon } = geocentricRadians(ecef);
  return { latitude: toDegrees(lat), longitude: toDegrees(lon) };
}

/**
 * Compute the ECEF to SEZ rotation matrix for an observer
 *
 * Rows, in ECEF components:
 * - south:  [-sinLat * cosLon, -sinLat * sinLon, cosLat]
 * - east:   [-sinLon,          cosLon,           0     ]
 * - zenith: [ cosLat * cosLon,  cosLat * sinLon, sinLat]
 */
export function sezRotation(observer: EcefVector): Matrix3 {
  const { lat, lon } = geocentricRadians(observer);

  const sinLat = Math.sin(lat);
  const cosLat = Math.cos(lat);
  const sinLon = Math.sin(lon);
  const cosLon = Math.cos(lon);

  const south: Vector3 = [-sinLat * cosLon, -sinLat * sinLon, cosLat];
  const east: Vector3 = [-sinLon, cosLon, 0];
  const zenith: Vector3 = [cosLat * cosLon, cosLat * sinLon, sinLat];

  logger.debug(
    {
      observer,
      latitude: toDegrees(lat),
      longitude: toDegrees(lon),
    },
    'Computed SEZ rotation'
  );

  return fromRows(south, east, zenith);
}

/**
 * Express an ECEF point in the SEZ frame centered on the observer
 */
export function ecefToSez(observer: EcefVector, target: EcefVector): SezVector {
  const delta = subtract(target, observer);
  const [south, east, zenith] = transformVector(sezRotation(observer), delta);

  logger.debug({ delta, south, east, zenith }, 'Transformed ECEF to SEZ');

  return { south, east, zenith };
}

/**
 * Inverse of ecefToSez: the ECEF position of a point given in the
 * observer's SEZ frame
 */
export function sezToEcef(observer: EcefVector, sez: SezVector): EcefVector {
  const inverse = transpose(sezRotation(observer));
  const delta = transformVector(inverse, [sez.south, sez.east, sez.zenith]);
  return add(observer, delta);
}

/**
 * Calculate the distance between two ECEF points
 */
export function ecefDistance(a: EcefVector, b: EcefVector): number {
  const dx = b[0] - a[0];
  const dy = b[1] - a[1];
  const dz = b[2] - a[2];
  return Math.sqrt(dx * dx + dy * dy + dz * dz);
}
