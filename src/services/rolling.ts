/**
 * Moving statistics over series that may contain nulls.
 * Nulls are missing observations: they occupy a window slot but are never averaged.
 */

export type NumericSeries = readonly (number | null)[];

/**
 * Trailing simple moving average over the last `window` positions.
 * A value is produced once the window holds at least `minPeriods` non-null observations.
 */
export function rollingMean(values: NumericSeries, window: number, minPeriods = window): (number | null)[] {
  if (window < 1) throw new Error(`window must be >= 1, got ${window}`);
  const out: (number | null)[] = [];
  let sum = 0;
  let count = 0;

  for (let i = 0; i < values.length; i++) {
    const incoming = values[i];
    if (incoming !== null) {
      sum += incoming;
      count += 1;
    }
    if (i >= window) {
      const outgoing = values[i - window];
      if (outgoing !== null) {
        sum -= outgoing;
        count -= 1;
      }
    }
    out.push(count >= Math.max(1, minPeriods) ? sum / count : null);
  }

  return out;
}

/**
 * Exponentially weighted mean with span-based decay, alpha = 2 / (span + 1).
 * Weights are normalised by their sum ("adjusted"), and a missing value still
 * ages the weights of earlier observations.
 */
export function ewmMean(values: NumericSeries, span: number): (number | null)[] {
  if (span < 1) throw new Error(`span must be >= 1, got ${span}`);
  const alpha = 2 / (span + 1);
  const decay = 1 - alpha;
  const out: (number | null)[] = [];
  let weightedSum = 0;
  let weightTotal = 0;

  for (const value of values) {
    weightedSum *= decay;
    weightTotal *= decay;
    if (value !== null) {
      weightedSum += value;
      weightTotal += 1;
    }
    out.push(weightTotal > 0 ? weightedSum / weightTotal : null);
  }

  return out;
}
