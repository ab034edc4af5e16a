/**
 * Raised when the session's internal bookkeeping is inconsistent, e.g. removing
 * an item or marking that the session does not hold. Bad user input never raises.
 */
export class SessionInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionInvariantError';
  }
}
