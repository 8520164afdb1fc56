/**
 * Raised when a temp database cannot be set up.
 *
 * There is one error kind for every setup failure; the message names the cause
 * (no execution path, initdb failure, readiness timeout, database creation,
 * unknown account, container launch).
 */
export class DBSetupError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DBSetupError";
  }
}
