/**
 * Cancellation token for the interactive loop
 *
 * Set only by the interrupt handler, read by the loop once per iteration. End
 * of input is seen by the loop directly and never sets the token. The
 * AbortSignal lets a pending input read wake up instead of waiting for a line
 * that will never be sent.
 */

export class CancellationSignal {
  private controller = new AbortController();

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel(): void {
    if (!this.cancelled) {
      this.controller.abort();
    }
  }

  /**
   * Cancel on SIGINT; the listener does nothing else
   *
   * @returns Function that removes the listener
   */
  bindToProcess(target: NodeJS.EventEmitter = process, signal: NodeJS.Signals = 'SIGINT'): () => void {
    const onSignal = () => this.cancel();
    target.on(signal, onSignal);
    return () => {
      target.off(signal, onSignal);
    };
  }
}
