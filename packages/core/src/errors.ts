export type CoreErrorCode = "INVALID_STATE" | "INVALID_ARGUMENT" | "INVARIANT_VIOLATION";

type CoreErrorOptions = {
  context?: Record<string, unknown>;
  cause?: unknown;
};

export class CoreError extends Error {
  readonly code: CoreErrorCode | string;
  readonly context?: Record<string, unknown>;

  constructor(code: CoreErrorCode | string, message: string, options: CoreErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "CoreError";
    this.code = code;
    this.context = options.context;
  }
}
