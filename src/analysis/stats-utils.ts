/**
 * Shared special functions and small numerical helpers.
 *
 * Log-gamma and the incomplete gamma function back the negative-binomial
 * likelihood and the normal tail used for Wald p-values.
 */

/** Log-gamma via Lanczos approximation. */
export function lgamma(x: number): number {
  const c = [76.18009172947146, -86.50532032941677, 24.01409824083091,
    -1.231739572450155, 0.1208650973866179e-2, -0.5395239384953e-5];
  let y = x;
  let tmp = x + 5.5;
  tmp -= (x + 0.5) * Math.log(tmp);
  let ser = 1.000000000190015;
  for (let j = 0; j < 6; j++) { y += 1; ser += c[j]! / y; }
  return -tmp + Math.log(2.5066282746310005 * ser / x);
}

/**
 * log Γ(y + r) − log Γ(r) for a non-negative integer y.
 * Summed directly for moderate y: the difference of two large log-gammas
 * loses precision when r is huge (near-Poisson dispersion).
 */
export function lgammaRatio(y: number, r: number): number {
  if (y <= 1000) {
    let s = 0;
    for (let k = 0; k < y; k++) s += Math.log(r + k);
    return s;
  }
  return lgamma(y + r) - lgamma(r);
}

/** Trigamma ψ'(x) for x > 0: recurrence up to x ≥ 6, then the asymptotic series. */
export function trigamma(x: number): number {
  let acc = 0;
  let z = x;
  while (z < 6) { acc += 1 / (z * z); z += 1; }
  const z2 = 1 / (z * z);
  return acc + 1 / z + z2 / 2
    + (z2 / z) * (1 / 6 - z2 * (1 / 30 - z2 * (1 / 42 - z2 / 30)));
}

/** Regularized upper incomplete gamma Q(a,x), accurate in the tail. */
export function gammaQ(a: number, x: number): number {
  if (x <= 0) return 1;
  if (x < a + 1) return 1 - gammaSeries(a, x);
  return gammaContinuedFraction(a, x);
}

function gammaSeries(a: number, x: number): number {
  let ap = a, sum = 1 / a, del = 1 / a;
  for (let n = 0; n < 200; n++) {
    ap += 1; del *= x / ap; sum += del;
    if (Math.abs(del) < Math.abs(sum) * 1e-14) break;
  }
  return sum * Math.exp(-x + a * Math.log(x) - lgamma(a));
}

function gammaContinuedFraction(a: number, x: number): number {
  let b = x + 1 - a, c2 = 1e30, d = 1 / b, h = d;
  for (let i = 1; i <= 200; i++) {
    const an = -i * (i - a); b += 2;
    d = an * d + b; if (Math.abs(d) < 1e-30) d = 1e-30;
    c2 = b + an / c2; if (Math.abs(c2) < 1e-30) c2 = 1e-30;
    d = 1 / d; const del = d * c2; h *= del;
    if (Math.abs(del - 1) < 1e-14) break;
  }
  return h * Math.exp(-x + a * Math.log(x) - lgamma(a));
}

/** Standard normal upper tail P(Z > z), via Q(1/2, z²/2). */
export function normalSF(z: number): number {
  if (Number.isNaN(z)) return NaN;
  if (z < 0) return 1 - normalSF(-z);
  return 0.5 * gammaQ(0.5, (z * z) / 2);
}

/** Two-sided normal p-value for a Wald statistic. */
export function twoSidedNormalP(z: number): number {
  return Math.min(1, 2 * normalSF(Math.abs(z)));
}

/**
 * Weighted quantile with normalized weights: the smallest value whose
 * cumulative weight share reaches p.
 */
export function weightedQuantile(values: ArrayLike<number>, weights: ArrayLike<number>, p: number): number {
  const n = values.length;
  if (n === 0) return NaN;
  const idx = Array.from({ length: n }, (_, i) => i).sort((a, b) => values[a]! - values[b]!);
  let total = 0;
  for (let i = 0; i < n; i++) total += weights[i]!;
  if (!(total > 0)) return NaN;
  let cum = 0;
  for (const i of idx) {
    cum += weights[i]! / total;
    if (cum >= p) return values[i]!;
  }
  return values[idx[n - 1]!]!;
}

/**
 * Golden-section search for the maximum of f on [lo, hi].
 * The returned point always lies inside the bracket.
 */
export function maximizeOnInterval(
  f: (x: number) => number,
  lo: number,
  hi: number,
  tol = 1e-6,
): number {
  if (hi - lo <= tol) return (lo + hi) / 2;
  const g = (Math.sqrt(5) - 1) / 2;
  let a = lo, b = hi;
  let c = b - g * (b - a);
  let d = a + g * (b - a);
  let fc = f(c), fd = f(d);
  for (let i = 0; i < 200 && b - a > tol; i++) {
    if (fc >= fd) {
      b = d; d = c; fd = fc;
      c = b - g * (b - a); fc = f(c);
    } else {
      a = c; c = d; fc = fd;
      d = a + g * (b - a); fd = f(d);
    }
  }
  return (a + b) / 2;
}

/** Piecewise-linear interpolation on ascending knots, constant beyond the ends. */
export function interpolateLinear(xs: ArrayLike<number>, ys: ArrayLike<number>, x: number): number {
  const last = xs.length - 1;
  if (x <= xs[0]!) return ys[0]!;
  if (x >= xs[last]!) return ys[last]!;
  let lo = 0, hi = last;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (xs[mid]! <= x) lo = mid; else hi = mid;
  }
  const t = (x - xs[lo]!) / (xs[hi]! - xs[lo]!);
  return ys[lo]! + t * (ys[hi]! - ys[lo]!);
}
