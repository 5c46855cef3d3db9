/** Malformed command input: bad identifiers, unknown levels, boosts or titles. */
export class GameCommandInputError extends Error {
  readonly kind = "InputError" as const;

  constructor(
    message: string,
    public readonly issues: readonly string[] = [message],
  ) {
    super(message);
    this.name = "GameCommandInputError";
  }

  static because(issues: readonly string[]): GameCommandInputError {
    const [only, ...rest] = issues;
    if (only === undefined) {
      return new GameCommandInputError("Invalid command input", []);
    }
    const message = rest.length === 0 ? only : `Invalid command input: ${issues.join("; ")}`;
    return new GameCommandInputError(message, issues);
  }
}
