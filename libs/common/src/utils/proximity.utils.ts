import { ProximityCurve } from '../enums';

/**
 * Normalized closeness (0-1) of a POI at `distance` inside `radius`.
 * Linear: 1 - d/r. Exponential: (1 - d/r)^2, which favours the nearest POIs.
 * Distances outside [0, radius] are clamped.
 */
export function proximityFactor(distance: number, radius: number, curve: ProximityCurve): number {
  if (radius <= 0) {
    return 0;
  }

  const ratio = Math.min(1, Math.max(0, distance / radius));
  const linear = 1 - ratio;

  return curve === ProximityCurve.Exponential ? linear * linear : linear;
}

export function proximityContribution(baseWeight: number, factor: number, minFactor: number): number {
  return baseWeight * Math.max(minFactor, factor);
}
