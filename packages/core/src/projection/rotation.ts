// ---------------------------------------------------------------------------
// Axis rotations for projected points (degrees in, column-major 3x3 out).
// ---------------------------------------------------------------------------

import type { Matrix3x3, RotationAngles } from '../types.js';

/** Convert degrees to radians. */
export function degToRad(deg: number): number {
  return (deg * Math.PI) / 180;
}

/** Build a column-major 3x3 from row-major entries. */
function fromRows(
  m00: number, m01: number, m02: number,
  m10: number, m11: number, m12: number,
  m20: number, m21: number, m22: number,
): Matrix3x3 {
  return new Float64Array([
    m00, m10, m20, // col 0
    m01, m11, m21, // col 1
    m02, m12, m22, // col 2
  ]);
}

/** Rotation about X by `rad`. */
export function rotationX(rad: number): Matrix3x3 {
  const c = Math.cos(rad), s = Math.sin(rad);
  return fromRows(
    1, 0, 0,
    0, c, -s,
    0, s, c,
  );
}

/** Rotation about Y by `rad`. */
export function rotationY(rad: number): Matrix3x3 {
  const c = Math.cos(rad), s = Math.sin(rad);
  return fromRows(
    c, 0, s,
    0, 1, 0,
    -s, 0, c,
  );
}

/** Rotation about Z by `rad`. */
export function rotationZ(rad: number): Matrix3x3 {
  const c = Math.cos(rad), s = Math.sin(rad);
  return fromRows(
    c, -s, 0,
    s, c, 0,
    0, 0, 1,
  );
}

/** Multiply two 3x3 matrices: C = A * B (column-major). */
export function mat3Multiply(A: Matrix3x3, B: Matrix3x3): Matrix3x3 {
  const C = new Float64Array(9);
  for (let col = 0; col < 3; col++) {
    for (let row = 0; row < 3; row++) {
      let sum = 0;
      for (let k = 0; k < 3; k++) {
        sum += A[k * 3 + row]! * B[col * 3 + k]!;
      }
      C[col * 3 + row] = sum;
    }
  }
  return C;
}

/**
 * Combined rotation R = Rz · Ry · Rx, so a point is turned about X first,
 * then Y, then Z.
 */
export function rotationMatrix(angles: RotationAngles): Matrix3x3 {
  return mat3Multiply(
    rotationZ(degToRad(angles.z)),
    mat3Multiply(rotationY(degToRad(angles.y)), rotationX(degToRad(angles.x))),
  );
}

/** True when no axis is rotated. */
export function isZeroRotation(angles: RotationAngles): boolean {
  return angles.x === 0 && angles.y === 0 && angles.z === 0;
}

/** Transform packed positions in place by `p' = R · p`. */
export function rotatePositionsInPlace(positions: Float64Array, count: number, R: Matrix3x3): void {
  const [r00, r10, r20, r01, r11, r21, r02, r12, r22] = R;
  for (let i = 0; i < count; i++) {
    const o = i * 3;
    const x = positions[o]!;
    const y = positions[o + 1]!;
    const z = positions[o + 2]!;
    positions[o] = r00! * x + r01! * y + r02! * z;
    positions[o + 1] = r10! * x + r11! * y + r12! * z;
    positions[o + 2] = r20! * x + r21! * y + r22! * z;
  }
}
