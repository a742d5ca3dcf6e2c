/**
 * Cooperative stop flag owned by the scheduler. It is only checked between
 * cases, so a case in flight always finishes.
 */
export class StopToken {
  private requested = false;

  get stopRequested(): boolean {
    return this.requested;
  }

  /** Returns false when a stop had already been requested. */
  request(): boolean {
    if (this.requested) return false;
    this.requested = true;
    return true;
  }
}

export interface SignalTarget {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface StopSignalHandlers {
  onStop?: (signal: NodeJS.Signals) => void;
  onForce: (signal: NodeJS.Signals) => void;
  target?: SignalTarget;
}

/**
 * First SIGINT/SIGTERM asks for a graceful stop; a second one calls
 * `onForce` straight away.
 */
export function installStopSignals(token: StopToken, handlers: StopSignalHandlers): void {
  const handle = (signal: NodeJS.Signals) => {
    if (token.request()) {
      handlers.onStop?.(signal);
    } else {
      handlers.onForce(signal);
    }
  };
  const target = handlers.target ?? process;
  target.on('SIGINT', handle);
  target.on('SIGTERM', handle);
}
