// Two-sided 95% Student-t critical values, indexed by degrees of freedom (1..29).
const T_CRITICAL_975 = [
  12.706, 4.303, 3.182, 2.776, 2.571, 2.447, 2.365, 2.306, 2.262, 2.228, 2.201, 2.179, 2.16, 2.145, 2.131, 2.12,
  2.11, 2.101, 2.093, 2.086, 2.08, 2.074, 2.069, 2.064, 2.06, 2.056, 2.052, 2.048, 2.045
]

export const Z_95 = 1.96

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0
  let sum = 0
  for (const v of values) sum += v
  return sum / values.length
}

/** Sample variance (n - 1 denominator); 0 for fewer than two values. */
export function variance(values: readonly number[]): number {
  const n = values.length
  if (n < 2 || isConstant(values, n)) return 0
  const m = mean(values)
  let acc = 0
  for (const v of values) acc += (v - m) ** 2
  return acc / (n - 1)
}

export function stdDeviation(values: readonly number[]): number {
  return Math.sqrt(variance(values))
}

export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0
  const sorted = [...values].sort((a, b) => a - b)
  const index = Math.min(Math.floor(sorted.length * p), sorted.length - 1)
  return sorted[index]
}

export function pearson(xs: readonly number[], ys: readonly number[]): number {
  const n = Math.min(xs.length, ys.length)
  if (n < 2 || isConstant(xs, n) || isConstant(ys, n)) return 0
  const mx = mean(xs.slice(0, n))
  const my = mean(ys.slice(0, n))
  let sxy = 0
  let sxx = 0
  let syy = 0
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx
    const dy = ys[i] - my
    sxy += dx * dy
    sxx += dx * dx
    syy += dy * dy
  }
  if (sxx === 0 || syy === 0) return 0
  return sxy / Math.sqrt(sxx * syy)
}

// exact check: rounding in the mean would otherwise give a tiny spurious variance
function isConstant(values: readonly number[], n: number) {
  for (let i = 1; i < n; i++) if (values[i] !== values[0]) return false
  return true
}

export function tCritical95(degreesOfFreedom: number): number {
  if (degreesOfFreedom < 1) return T_CRITICAL_975[0]
  if (degreesOfFreedom > T_CRITICAL_975.length) return Z_95
  return T_CRITICAL_975[degreesOfFreedom - 1]
}
