const twiddleCache = new Map<number, { cos: Float64Array; sin: Float64Array }>();

function twiddles(n: number) {
  let t = twiddleCache.get(n);
  if (!t) {
    const half = n >> 1;
    t = { cos: new Float64Array(half), sin: new Float64Array(half) };
    for (let k = 0; k < half; k++) {
      t.cos[k] = Math.cos((-2 * Math.PI * k) / n);
      t.sin[k] = Math.sin((-2 * Math.PI * k) / n);
    }
    twiddleCache.set(n, t);
  }
  return t;
}

/** In-place radix-2 FFT. `real.length` must be a power of two. */
export function fft(real: Float64Array, imag: Float64Array) {
  const n = real.length;
  if (!isPowerOfTwo(n)) throw new Error(`FFT length must be a power of 2 (got ${n})`);
  if (imag.length !== n) throw new Error('FFT real/imag length mismatch');

  // Bit-reversal permutation
  let j = 0;
  for (let i = 0; i < n - 1; i++) {
    if (i < j) {
      const tr = real[i], ti = imag[i];
      real[i] = real[j]; imag[i] = imag[j];
      real[j] = tr; imag[j] = ti;
    }
    let m = n >> 1;
    while (j >= m) { j -= m; m >>= 1; }
    j += m;
  }

  const { cos, sin } = twiddles(n);
  for (let size = 2; size <= n; size <<= 1) {
    const halfSize = size >> 1;
    const stride = n / size;
    for (let i = 0; i < n; i += size) {
      for (let k = 0; k < halfSize; k++) {
        const wr = cos[k * stride];
        const wi = sin[k * stride];
        const a = i + k;
        const b = a + halfSize;
        const tr = wr * real[b] - wi * imag[b];
        const ti = wr * imag[b] + wi * real[b];
        real[b] = real[a] - tr;
        imag[b] = imag[a] - ti;
        real[a] += tr;
        imag[a] += ti;
      }
    }
  }
}

/** Periodic Hann window (denominator n), the analysis form for FFT frames. */
export function hannWindow(n: number): Float64Array {
  const w = new Float64Array(n);
  for (let i = 0; i < n; i++) {
    w[i] = 0.5 * (1 - Math.cos((2 * Math.PI * i) / n));
  }
  return w;
}

export function isPowerOfTwo(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

/**
 * Window `frame` and return |X[k]| for k = 0..n/2.
 * Scratch buffers may be passed in to avoid per-frame allocation.
 */
export function magnitudeSpectrum(
  frame: ArrayLike<number>,
  window: Float64Array,
  scratch?: { real: Float64Array; imag: Float64Array },
  out?: Float64Array
): Float64Array {
  const n = window.length;
  const real = scratch?.real ?? new Float64Array(n);
  const imag = scratch?.imag ?? new Float64Array(n);
  for (let i = 0; i < n; i++) {
    real[i] = (i < frame.length ? frame[i] : 0) * window[i];
    imag[i] = 0;
  }
  fft(real, imag);

  const bins = n / 2 + 1;
  const mag = out ?? new Float64Array(bins);
  for (let k = 0; k < bins; k++) {
    mag[k] = Math.sqrt(real[k] * real[k] + imag[k] * imag[k]);
  }
  return mag;
}
