export type StructuredErrorKind = "decode" | "validation";

/**
 * Base class for model output that could not be turned into a usable value.
 * `kind` separates malformed output from well-formed but unusable output, so a caller
 * can pick between re-prompting and surfacing the problem.
 */
export class StructuredResponseError extends Error {
  readonly kind: StructuredErrorKind;
  readonly shapeName?: string;

  constructor(kind: StructuredErrorKind, message: string, shapeName?: string) {
    super(message);
    this.name = "StructuredResponseError";
    this.kind = kind;
    this.shapeName = shapeName;
  }
}

export class LLMDecodeError extends StructuredResponseError {
  constructor(message: string, shapeName?: string) {
    super("decode", message, shapeName);
    this.name = "LLMDecodeError";
  }
}

export class LLMValidationError extends StructuredResponseError {
  readonly problems: string[];

  constructor(shapeName: string, problems: string[]) {
    super("validation", `${shapeName} failed validation: ${problems.join("; ")}`, shapeName);
    this.name = "LLMValidationError";
    this.problems = problems;
  }
}
