/**
 * Fixed-point inversion of datum transforms.
 *
 * GCJ-02 has no closed-form inverse. Starting from an approximate inverse,
 * the forward transform is applied to the estimate and the residual against
 * the target is subtracted, until the residual is below tolerance or the
 * round budget is spent.
 */

import type { LatLon } from "./types";

/** Residual tolerance in degrees */
export const PRECISE_EPSILON = 1e-5;

/** Maximum refinement rounds */
export const MAX_ITERATIONS = 10;

export interface InverseSolution {
  coord: LatLon;
  /** Refinement rounds applied to the initial estimate */
  iterations: number;
  /** False when the round budget ran out before the residual met tolerance */
  converged: boolean;
}

/**
 * Invert `forward` at `target`, starting from `initial`.
 *
 * Never fails: when the budget runs out the last estimate is returned with
 * `converged: false`.
 */
export function solveInverse(
  forward: (estimate: LatLon) => LatLon,
  target: LatLon,
  initial: LatLon
): InverseSolution {
  let current = initial;

  for (let iteration = 0; iteration < MAX_ITERATIONS; iteration++) {
    const image = forward(current);
    const dLat = image.lat - target.lat;
    const dLon = image.lon - target.lon;

    if (Math.max(Math.abs(dLat), Math.abs(dLon)) <= PRECISE_EPSILON) {
      return { coord: current, iterations: iteration, converged: true };
    }

    current = { lat: current.lat - dLat, lon: current.lon - dLon };
  }

  return { coord: current, iterations: MAX_ITERATIONS, converged: false };
}
