import { Location, locationsEqual, minLocation } from "./geometry";

export type TransformationKind =
  | "halfRotation"
  | "verticalReflection"
  | "horizontalReflection";

/** Order in which a board's symmetries are tested. */
export const TRANSFORMATION_KINDS: readonly TransformationKind[] = [
  "halfRotation",
  "verticalReflection",
  "horizontalReflection",
];

/**
 * A symmetry of the square N x N grid. Each of the three kinds is an
 * involution: applying it twice gives back the original location.
 */
export interface Transformation {
  readonly kind: TransformationKind;
  readonly size: number;
  apply(v: Location): Location;
}

export function createTransformation(
  kind: TransformationKind,
  size: number
): Transformation {
  const last = size - 1;
  switch (kind) {
    case "halfRotation":
      return { kind, size, apply: (v) => ({ row: last - v.row, col: last - v.col }) };
    case "verticalReflection":
      return { kind, size, apply: (v) => ({ row: v.row, col: last - v.col }) };
    case "horizontalReflection":
      return { kind, size, apply: (v) => ({ row: last - v.row, col: v.col }) };
  }
}

export function allTransformations(size: number): Transformation[] {
  return TRANSFORMATION_KINDS.map((kind) => createTransformation(kind, size));
}

/**
 * The cycle of `v` under repeated application of `t`, starting with `v`
 * itself. Size 1 (fixed point) or 2 for the kinds above.
 */
export function orbit(t: Transformation, v: Location): Location[] {
  const result: Location[] = [v];
  // A permutation of size*size cells cannot cycle longer than that.
  const limit = t.size * t.size;
  let current = t.apply(v);
  while (!locationsEqual(current, v)) {
    if (result.length > limit) {
      throw new Error(`Transformation ${t.kind} does not cycle back to (${v.row},${v.col})`);
    }
    result.push(current);
    current = t.apply(current);
  }
  return result;
}

/** Smallest location (row-major) in the orbit of `v`. */
export function orbitRepresentative(t: Transformation, v: Location): Location {
  return orbit(t, v).reduce(minLocation, v);
}

export function isOrbitRepresentative(t: Transformation, v: Location): boolean {
  return locationsEqual(orbitRepresentative(t, v), v);
}
