export class MalformedQueryError extends Error {
  override readonly name: string = 'MalformedQueryError';

  constructor(message: string) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidQueryGroupError extends MalformedQueryError {
  override readonly name = 'InvalidQueryGroupError';

  constructor(readonly operator: unknown) {
    super(`QueryGroup operator must be "and", "or" or "not"; got ${JSON.stringify(operator)}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedOperatorError extends Error {
  override readonly name = 'UnsupportedOperatorError';

  constructor(
    readonly operator: string,
    readonly backend: string,
    message?: string,
  ) {
    super(message ?? `Operator "${operator}" is not supported by the ${backend} backend`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class KeyExistsError extends Error {
  override readonly name = 'KeyExistsError';

  constructor(
    readonly key: string | number,
    readonly collection: string,
  ) {
    super(`Key (${String(key)}) already exists in collection "${collection}"`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PrimaryKeyError extends Error {
  override readonly name = 'PrimaryKeyError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NoResultsFoundError extends Error {
  override readonly name = 'NoResultsFoundError';

  constructor(message?: string) {
    super(message ?? 'Query for findOne returned no results');
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MultipleResultsFoundError extends Error {
  override readonly name = 'MultipleResultsFoundError';

  constructor(
    readonly count: number,
    message?: string,
  ) {
    super(message ?? `Query for findOne must return exactly one result; returned ${count}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(
    message: string,
    readonly fieldErrors: Record<string, string[]> = {},
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
