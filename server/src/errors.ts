/** Conditions that make a round unresolvable. Never reported to players as an outcome. */
export class EngineFault extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RandomSourceError extends EngineFault {}

export class InvariantViolation extends EngineFault {}
