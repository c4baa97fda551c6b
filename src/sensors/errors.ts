export class ConfinementViolationError extends Error {
  readonly expectedThreadId: number;

  readonly actualThreadId: number;

  constructor(expectedThreadId: number, actualThreadId: number) {
    super(
      `Called from thread ${actualThreadId}; this object is confined to thread ${expectedThreadId}`,
    );
    this.name = "ConfinementViolationError";
    this.expectedThreadId = expectedThreadId;
    this.actualThreadId = actualThreadId;
  }
}
