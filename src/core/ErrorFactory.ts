import type { DecodeError } from '../types';
import type { StateManager } from './StateManager';

/**
 * Creates DecodeError records stamped with the decoder's current progress.
 */
export class ErrorFactory {
  private readonly stateManager: StateManager;

  constructor(stateManager: StateManager) {
    this.stateManager = stateManager;
  }

  public create(message: string): DecodeError {
    const { frameLength, decodedBytes, samplesDecoded } = this.stateManager;
    return {
      message,
      inputBytes: decodedBytes,
      frameLength,
      frameNumber: frameLength > 0 ? Math.floor(decodedBytes / frameLength) : 0,
      outputSamples: samplesDecoded,
    };
  }
}
