/** A numeric parameter outside the domain ECMA-48 allows for it. */
export class InvalidParameterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidParameterError";
  }
}

/** An intermediate or final byte outside the ECMA-48 column ranges. */
export class InvalidSequenceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidSequenceError";
  }
}

export class OutputClosedError extends Error {
  constructor() {
    super("Output stream is closed");
    this.name = "OutputClosedError";
  }
}
