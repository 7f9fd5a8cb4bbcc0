// src/lr/errors.ts

export type WarnFn = (msg: string) => void;

export class LrError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "LrError";
  }
}

export class FormatError extends LrError {
  public constructor(message: string) {
    super(message);
    this.name = "FormatError";
  }
}

export class PreconditionError extends LrError {
  public constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

export class SizeError extends PreconditionError {
  public constructor(
    message: string,
    public readonly requested: number,
    public readonly minimum: number,
  ) {
    super(message);
    this.name = "SizeError";
  }
}

export class NoCandidateError extends LrError {
  public constructor(
    message: string,
    public readonly i: number,
    public readonly j: number,
  ) {
    super(message);
    this.name = "NoCandidateError";
  }
}

export class InternalConsistencyError extends LrError {
  public constructor(message: string) {
    super(message);
    this.name = "InternalConsistencyError";
  }
}
