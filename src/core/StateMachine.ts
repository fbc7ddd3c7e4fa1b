/**
 * Lifecycle of a `WavStreamDecoder`.
 *
 * - IDLE: waiting for enough bytes to parse the header.
 * - DECODING: header parsed, sample bytes are being decoded.
 * - ENDED: flushed or freed.
 * - ERROR: the header was rejected.
 */
export enum DecoderState {
  DECODING,
  ENDED,
  ERROR,
  IDLE,
}

export class DecoderStateMachine {
  private _state: DecoderState = DecoderState.IDLE;

  public get state(): DecoderState {
    return this._state;
  }

  /**
   * @throws {Error} when `newState` cannot follow the current state, e.g. flushing an ended decoder.
   */
  public transition(newState: DecoderState): void {
    if (!this.isValidTransition(newState)) {
      throw new Error(`Invalid state transition: ${DecoderState[this._state]} -> ${DecoderState[newState]}`);
    }
    this._state = newState;
  }

  private isValidTransition(newState: DecoderState): boolean {
    switch (this._state) {
      case DecoderState.IDLE:
        return newState !== DecoderState.IDLE;
      case DecoderState.DECODING:
        return newState === DecoderState.ENDED || newState === DecoderState.ERROR;
      case DecoderState.ENDED:
      case DecoderState.ERROR:
        return false;
      default:
        return false;
    }
  }

  public reset(): void {
    this._state = DecoderState.IDLE;
  }
}
