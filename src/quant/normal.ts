/**
 * Standard normal distribution helpers.
 */

/**
 * Standard normal CDF (cumulative distribution function).
 * Uses Abramowitz & Stegun erf approximation (equation 7.1.26)
 * with relation: Φ(x) = (1 + erf(x/√2)) / 2
 *
 * Symmetric by construction: Φ(x) + Φ(-x) = 1.
 */
export function normalCDF(x: number): number {
  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;

  const sign = x < 0 ? -1 : 1;
  const z = Math.abs(x) / Math.SQRT2;
  const t = 1.0 / (1.0 + p * z);
  const y =
    1.0 -
    ((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t * Math.exp(-z * z);

  return 0.5 * (1.0 + sign * y);
}

/** Standard normal PDF (probability density function) */
export function normalPDF(x: number): number {
  return Math.exp(-0.5 * x * x) / Math.sqrt(2 * Math.PI);
}
