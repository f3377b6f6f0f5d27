/**
 * ecef-sez Type Definitions
 */

import type { Vector3 } from './transform/matrix.js';

// ============================================================================
// Coordinate Types
// ============================================================================

/** ECEF position [x, y, z] in kilometers */
export type EcefVector = Vector3;

/**
 * Displacement from an observer along its local South, East and Zenith axes
 */
export interface SezVector {
  south: number;   // km
  east: number;    // km
  zenith: number;  // km
}

/**
 * Angles of a position vector measured from the Earth's center.
 * No ellipsoid is involved: latitude is atan2(z, sqrt(x² + y²)).
 */
export interface GeocentricPosition {
  latitude: number;   // degrees
  longitude: number;  // degrees
}

// ============================================================================
// CLI Types
// ============================================================================

export interface ParsedArgs {
  /** Observer (SEZ origin) in ECEF */
  observer: EcefVector;

  /** Point to express in the observer's SEZ frame */
  target: EcefVector;
}
