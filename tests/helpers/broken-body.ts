import { Dispatcher } from 'undici';

/** Answers every request with 200 headers, then fails the body stream. */
export class BrokenBodyDispatcher extends Dispatcher {
  constructor(private readonly failure: Error) {
    super();
  }

  dispatch(_options: Dispatcher.DispatchOptions, handler: Dispatcher.DispatchHandlers): boolean {
    setImmediate(() => {
      handler.onConnect?.(() => undefined);
      handler.onHeaders?.(200, [], () => undefined, 'OK');
      setTimeout(() => handler.onError?.(this.failure), 5);
    });
    return true;
  }
}
