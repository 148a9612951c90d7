/**
 * Typed error classes for caller contract violations.
 *
 * Malformed map text is never reported through these; parsers collect
 * it as position-tagged diagnostics instead.
 */

/** Base class for every error the levelscan packages throw. */
export class LevelscanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LevelscanError';
  }
}

/** The calling code broke an API precondition (wrong argument type, bad length, ...). */
export class ContractViolationError extends LevelscanError {
  constructor(
    public readonly argument: string,
    public readonly reason: string,
  ) {
    super(`Invalid argument "${argument}": ${reason}`);
    this.name = 'ContractViolationError';
  }
}

/** Throws unless `source` is a string. Parsers call this on entry. */
export function assertSourceText(source: unknown, argument = 'source'): asserts source is string {
  if (typeof source !== 'string') {
    throw new ContractViolationError(argument, `expected a string, got ${source === null ? 'null' : typeof source}`);
  }
}
