/**
 * AnalysisTask: runs the fingerprint extractor in slices, yielding to the
 * event loop between slices so pad interaction stays responsive.
 *
 * Cancelling (via the handle or an AbortSignal) rejects the promise with
 * ANALYSIS_CANCELLED; the partial accumulator is dropped and nothing is
 * shared with the caller except the final frozen Fingerprint.
 */

import { DEFAULT_FINGERPRINT, type FingerprintConstants } from '../config.js';
import { EngineError } from '../errors.js';
import type { Fingerprint } from '../types/formant.js';
import { SpectrumAccumulator, assertAnalyzable } from './fingerprint.js';

export interface AnalysisOptions {
  constants?: FingerprintConstants;
  /** Frames processed per slice before yielding. */
  framesPerSlice?: number;
  signal?: AbortSignal;
  onProgress?: (fraction: number) => void;
}

export interface AnalysisHandle {
  readonly id: number;
  readonly promise: Promise<Fingerprint>;
  cancel(): void;
  readonly cancelled: boolean;
}

const DEFAULT_FRAMES_PER_SLICE = 32;
let nextTaskId = 0;

function yieldToLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function cancelledError(id: number): EngineError {
  return new EngineError('ANALYSIS_CANCELLED', `Analysis #${id} cancelled`, { details: { taskId: id } });
}

export function startAnalysis(samples: ArrayLike<number>, sampleRate: number, options: AnalysisOptions = {}): AnalysisHandle {
  const id = ++nextTaskId;
  const constants = options.constants ?? DEFAULT_FINGERPRINT;
  const framesPerSlice = Math.max(1, options.framesPerSlice ?? DEFAULT_FRAMES_PER_SLICE);
  const controller = new AbortController();

  const onExternalAbort = () => controller.abort();
  if (options.signal?.aborted) controller.abort();
  else options.signal?.addEventListener('abort', onExternalAbort, { once: true });

  const run = async (): Promise<Fingerprint> => {
    try {
      // Preconditions fail synchronously-fast, before any slicing
      assertAnalyzable(samples, sampleRate, constants);
      const acc = new SpectrumAccumulator(samples, sampleRate);
      while (!acc.done) {
        // Yield first: the handle is returned before any frame is processed
        await yieldToLoop();
        if (controller.signal.aborted) throw cancelledError(id);
        acc.step(framesPerSlice);
        options.onProgress?.(acc.progress);
      }
      if (controller.signal.aborted) throw cancelledError(id);
      return acc.finish(constants);
    } finally {
      options.signal?.removeEventListener('abort', onExternalAbort);
    }
  };

  const promise = run();

  return {
    id,
    promise,
    cancel: () => controller.abort(),
    get cancelled() {
      return controller.signal.aborted;
    },
  };
}
