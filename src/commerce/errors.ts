export class CommerceRequestError extends Error {
  constructor(
    message: string,
    readonly operation: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'CommerceRequestError';
  }
}

/**
 * The store rejected the access token (HTTP 401).
 */
export class CommerceAuthError extends CommerceRequestError {
  constructor(operation: string) {
    super('Authentication failed. Please check the store access token.', operation, 401);
    this.name = 'CommerceAuthError';
  }
}
