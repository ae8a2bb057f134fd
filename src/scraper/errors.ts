/**
 * Errors a caller must be able to tell apart from crawl outcomes
 */

/**
 * Contradictory or out-of-range invocation parameters
 */
export class InvalidInvocationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInvocationError';
  }
}
