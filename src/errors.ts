/**
 * Error definitions shared by the three stages
 */

/**
 * Thrown when a stage cannot start: a required input tree is missing or the
 * configuration is invalid. The CLI prints the message and exits non-zero.
 */
export class SetupError extends Error {
  readonly name = "SetupError";

  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(message);
  }
}

/**
 * Thrown while parsing a content file that cannot be injected at all.
 */
export class ContentFileError extends Error {
  readonly name = "ContentFileError";

  /**
   * @param file - Path of the offending content file
   * @param reason - What is wrong with it
   */
  constructor(
    public readonly file: string,
    public readonly reason: string,
  ) {
    super(`${reason} in ${file}`);
  }
}
