// Thrown while planning a composition, before any element of any input
// sequence has been read.
export class CompositionError extends Error {
  constructor(
    message: string,
    public readonly sequenceCount: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class DefinitionError extends CompositionError {
  constructor() {
    super("compose requires at least two sequences, but none were given", 0);
  }
}

export class ArityError extends CompositionError {
  constructor(sequenceCount: number) {
    super(
      `compose requires at least two sequences, but only ${sequenceCount} was given`,
      sequenceCount,
    );
  }
}
