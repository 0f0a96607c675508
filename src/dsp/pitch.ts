/**
 * YIN fundamental estimate over one frame. Returns null when no period in
 * the plausible voice range (50-1000 Hz) is found.
 */
export function findPitchYin(signal: ArrayLike<number>, sampleRate: number, threshold: number = 0.3): number | null {
  const half = Math.floor(signal.length / 2);
  const minTau = Math.max(2, Math.floor(sampleRate / 1000));
  const maxTau = Math.min(half, Math.floor(sampleRate / 50));
  if (maxTau <= minTau) return null;

  const diff = new Float64Array(maxTau);
  for (let tau = 1; tau < maxTau; tau++) {
    let sum = 0;
    for (let i = 0; i < half; i++) {
      const d = signal[i] - signal[i + tau];
      sum += d * d;
    }
    diff[tau] = sum;
  }

  // Cumulative mean normalized difference
  const cmndf = new Float64Array(maxTau);
  cmndf[0] = 1;
  let runningSum = 0;
  for (let tau = 1; tau < maxTau; tau++) {
    runningSum += diff[tau];
    cmndf[tau] = runningSum > 0 ? (diff[tau] * tau) / runningSum : 1;
  }

  let tauEstimate = -1;
  for (let tau = minTau; tau < maxTau; tau++) {
    if (cmndf[tau] < threshold) {
      while (tau + 1 < maxTau && cmndf[tau + 1] < cmndf[tau]) tau++;
      tauEstimate = tau;
      break;
    }
  }
  if (tauEstimate === -1) return null;

  // Parabolic refinement around the dip
  let refined = tauEstimate;
  if (tauEstimate > 1 && tauEstimate + 1 < maxTau) {
    const a = cmndf[tauEstimate - 1];
    const b = cmndf[tauEstimate];
    const c = cmndf[tauEstimate + 1];
    const denom = a - 2 * b + c;
    if (denom > 0) refined = tauEstimate + (a - c) / (2 * denom);
  }
  return sampleRate / refined;
}
