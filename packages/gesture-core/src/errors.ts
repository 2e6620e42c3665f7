export class InvalidObservationError extends Error {
  readonly name = "InvalidObservationError";

  constructor(
    readonly handIndex: number,
    readonly reason: string
  ) {
    super(`Invalid hand observation at index ${handIndex}: ${reason}`);
  }
}

export class InvalidPayloadError extends Error {
  readonly name = "InvalidPayloadError";

  constructor(readonly issues: string[]) {
    super(`Invalid hand payload: ${issues.join("; ")}`);
  }
}
