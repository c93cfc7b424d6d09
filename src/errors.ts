export class BindingNotFoundError extends Error {
  override readonly name = 'BindingNotFoundError';

  constructor(
    readonly binding: string,
    message?: string,
  ) {
    super(message ?? `No input binding named '${binding}'`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedOperatorError extends Error {
  override readonly name = 'UnsupportedOperatorError';

  constructor(
    readonly operator: string,
    message?: string,
  ) {
    super(message ?? `Unsupported operator: ${operator}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
