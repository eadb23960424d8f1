export class InvariantError extends Error {
  constructor(
    message: string,
    public operation: string,
    public detail?: string
  ) {
    const detailInfo = detail ? ` - ${detail}` : '';
    super(`Invariant violated in '${operation}': ${message}${detailInfo}`);
    this.name = 'InvariantError';
  }
}

export class RuleError extends Error {
  constructor(
    message: string,
    public rule: string,
    public binding?: string
  ) {
    const bindingInfo = binding !== undefined ? ` (binding '${binding}')` : '';
    super(`Invalid rule '${rule}': ${message}${bindingInfo}`);
    this.name = 'RuleError';
  }
}
