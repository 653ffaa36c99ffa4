export type EngineErrorCode = "INVALID_CONFIG" | "INVALID_SPAN";

export class EngineError extends Error {
  constructor(
    public code: EngineErrorCode,
    message: string,
    public details?: string[]
  ) {
    super(message);
    this.name = "EngineError";
  }

  static invalidConfig(details: string[]) {
    return new EngineError("INVALID_CONFIG", `invalid engine config: ${details.join("; ")}`, details);
  }

  static invalidSpan(start: number, end: number, length: number) {
    return new EngineError("INVALID_SPAN", `span [${start}, ${end}) does not fit text of length ${length}`);
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
