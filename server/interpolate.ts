import type { Coordinate } from "@shared/types";

export const DEFAULT_SEGMENT_STEP = 0.001;

function assertStepSize(stepSize: number): void {
  if (!Number.isFinite(stepSize) || stepSize <= 0) {
    throw new RangeError(`Step size must be a positive number, got ${stepSize}`);
  }
}

/**
 * Linearly interpolate a straight path between two theta-rho points.
 *
 * Distance is measured as sqrt(dTheta^2 + dRho^2) in coordinate space, not
 * as arc length on the table. Always emits at least the two endpoints.
 */
export function interpolateSegment(
  start: Coordinate,
  end: Coordinate,
  stepSize: number = DEFAULT_SEGMENT_STEP
): Coordinate[] {
  assertStepSize(stepSize);

  const dTheta = end.theta - start.theta;
  const dRho = end.rho - start.rho;
  const distance = Math.sqrt(dTheta * dTheta + dRho * dRho);
  const steps = Math.max(1, Math.floor(distance / stepSize));

  const points: Coordinate[] = [{ theta: start.theta, rho: start.rho }];
  for (let i = 1; i < steps; i++) {
    const t = i / steps;
    points.push({
      theta: start.theta + t * dTheta,
      rho: start.rho + t * dRho,
    });
  }
  // Last point is the endpoint itself, not start + 1 * delta
  points.push({ theta: end.theta, rho: end.rho });

  return points;
}

/**
 * Interpolate every consecutive pair of `path` and join the results.
 * Consecutive segments share their endpoint, which is emitted once.
 */
export function interpolatePath(path: readonly Coordinate[], stepSize: number): Coordinate[] {
  assertStepSize(stepSize);

  const points: Coordinate[] = [];
  for (let i = 0; i < path.length - 1; i++) {
    const segment = interpolateSegment(path[i], path[i + 1], stepSize);
    // No spread push: segments can exceed the call argument limit
    for (let j = i === 0 ? 0 : 1; j < segment.length; j++) {
      points.push(segment[j]);
    }
  }
  return points;
}
