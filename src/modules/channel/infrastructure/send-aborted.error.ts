/** Raised by a transport asked to send after the dispatch timeout aborted it */
export class SendAbortedError extends Error {
  readonly code = 'EABORTED';

  constructor() {
    super('Send aborted by the dispatch timeout');
    this.name = 'SendAbortedError';
  }
}
