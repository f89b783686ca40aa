export class TypeMismatchError extends Error {
  constructor(
    message: string,
    public operation: string,
    public operandType: string
  ) {
    super(`Type mismatch in '${operation}': ${message} (got ${operandType})`);
    this.name = 'TypeMismatchError';
  }
}

export class DomainError extends Error {
  constructor(
    message: string,
    public leftDomain: readonly string[],
    public rightDomain: readonly string[]
  ) {
    super(`Domain error: ${message} (left: ${formatDomain(leftDomain)}, right: ${formatDomain(rightDomain)})`);
    this.name = 'DomainError';
  }
}

/**
 * Format a domain list the way it appears in error messages
 */
export function formatDomain(domain: readonly string[]): string {
  return `[${domain.map(d => `'${d}'`).join(', ')}]`;
}

export class UnsupportedOperationError extends Error {
  constructor(
    message: string,
    public operation: string,
    public reason?: string
  ) {
    const reasonInfo = reason ? ` - ${reason}` : '';
    super(`Unsupported operation '${operation}': ${message}${reasonInfo}`);
    this.name = 'UnsupportedOperationError';
  }
}

/**
 * Raised by leaves that cannot produce a value for the given evaluation context.
 * Constant folding treats it as "not foldable"; every other caller sees it.
 */
export class EvaluationError extends Error {
  constructor(
    message: string,
    public node: string
  ) {
    super(`Cannot evaluate '${node}': ${message}`);
    this.name = 'EvaluationError';
  }
}

export class ShapeError extends Error {
  constructor(
    message: string,
    public leftShape: readonly number[],
    public rightShape: readonly number[]
  ) {
    super(`Shape error: ${message} (${leftShape.join('x')} and ${rightShape.join('x')})`);
    this.name = 'ShapeError';
  }
}

export class SettingsError extends Error {
  constructor(
    message: string,
    public setting: string,
    public value: unknown
  ) {
    super(`Invalid setting '${setting}': ${message} (got ${String(value)})`);
    this.name = 'SettingsError';
  }
}
