/**
 * Vector and Matrix Operations for Coordinate Transforms
 *
 * Matrices are 3x3 stored as 9-element arrays in COLUMN-MAJOR order
 * (gl-matrix layout). Results are written into plain arrays, never into
 * gl-matrix's Float32Array defaults, so everything stays in double precision.
 */

import { mat3, vec3 } from 'gl-matrix';

export type Matrix3 = number[];
export type Vector3 = [number, number, number];

/**
 * Build a column-major matrix from its rows
 */
export function fromRows(r0: Vector3, r1: Vector3, r2: Vector3): Matrix3 {
  return [
    r0[0], r1[0], r2[0],
    r0[1], r1[1], r2[1],
    r0[2], r1[2], r2[2],
  ];
}

/**
 * Get row i of a column-major matrix
 */
export function getRow(matrix: Matrix3, i: number): Vector3 {
  return [matrix[i], matrix[i + 3], matrix[i + 6]];
}

/**
 * Transpose a matrix (the inverse, for a rotation)
 */
export function transpose(matrix: Matrix3): Matrix3 {
  const result: Matrix3 = new Array<number>(9).fill(0);
  mat3.transpose(result, matrix);
  return result;
}

/**
 * Multiply a vector by a matrix: result = M * v
 */
export function transformVector(matrix: Matrix3, v: Vector3): Vector3 {
  const result: Vector3 = [0, 0, 0];
  vec3.transformMat3(result, v, matrix);
  return result;
}

/**
 * a - b, componentwise
 */
export function subtract(a: Vector3, b: Vector3): Vector3 {
  const result: Vector3 = [0, 0, 0];
  vec3.subtract(result, a, b);
  return result;
}

/**
 * a + b, componentwise
 */
export function add(a: Vector3, b: Vector3): Vector3 {
  const result: Vector3 = [0, 0, 0];
  vec3.add(result, a, b);
  return result;
}

export function dot(a: Vector3, b: Vector3): number {
  return vec3.dot(a, b);
}

/**
 * Check that a matrix is a rotation: rows of unit length, mutually orthogonal
 */
export function isOrthonormal(matrix: Matrix3, epsilon = 1e-12): boolean {
  const rows = [getRow(matrix, 0), getRow(matrix, 1), getRow(matrix, 2)];
  for (let i = 0; i < 3; i++) {
    for (let j = 0; j < 3; j++) {
      const expected = i === j ? 1 : 0;
      if (Math.abs(dot(rows[i], rows[j]) - expected) > epsilon) {
        return false;
      }
    }
  }
  return true;
}
