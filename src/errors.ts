export class InvalidArgumentError extends Error {
  override readonly name = 'InvalidArgumentError';

  constructor(message: string) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class QueryError extends Error {
  override readonly name = 'QueryError';

  constructor(
    message: string,
    readonly sql?: string,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
