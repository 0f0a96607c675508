import { EngineError } from '../errors.js';
import type { ABState, FormantVector } from '../types/formant.js';

/**
 * Holds the captured base vector, the latest processed vector and which of
 * the two is audible. Only the session loop writes to it.
 */
export class ABStore {
  private _state: ABState = 'processed';
  private _base: FormantVector | null = null;
  private _processed: FormantVector | null = null;

  get state(): ABState {
    return this._state;
  }

  get base(): FormantVector | null {
    return this._base;
  }

  get processed(): FormantVector | null {
    return this._processed;
  }

  get hasBase(): boolean {
    return this._base !== null;
  }

  setCapturedBase(vector: FormantVector): void {
    this._base = vector;
  }

  setProcessed(vector: FormantVector): void {
    this._processed = vector;
  }

  /** Flip between base and processed. Fails MISSING_BASE before any capture. */
  toggle(): ABState {
    if (!this._base) {
      throw new EngineError('MISSING_BASE', 'Capture a base preset before toggling A/B');
    }
    this._state = this._state === 'base' ? 'processed' : 'base';
    return this._state;
  }

  /** Vector for the audible side, or null when it has not been computed yet. */
  current(): FormantVector | null {
    return this._state === 'base' ? this._base : this._processed;
  }
}
