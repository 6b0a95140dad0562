/**
 * Error types shared across the launcher core.
 * @module
 */

interface SeekrErrorOptions {
  code?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
}

/**
 * Base error class for all seekr-specific errors.
 */
export class SeekrError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, options?: SeekrErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;
    this.code = options?.code ?? "SEEKR_ERROR";
    this.context = options?.context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

type SubclassOptions = Omit<SeekrErrorOptions, "code">;

/** The configuration file exists but does not validate. */
export class ConfigurationError extends SeekrError {
  constructor(message: string, options?: SubclassOptions) {
    super(message, { ...options, code: "CONFIG_ERROR" });
  }
}

/** A search provider call failed. */
export class ProviderError extends SeekrError {
  readonly busName: string;

  constructor(busName: string, message: string, options?: SubclassOptions) {
    super(message, {
      ...options,
      code: "PROVIDER_ERROR",
      context: { ...options?.context, busName },
    });
    this.busName = busName;
  }
}

/** A search provider call did not answer within its time limit. */
export class ProviderTimeoutError extends SeekrError {
  readonly busName: string;

  constructor(busName: string, call: string, ms: number) {
    super(`D-Bus call to ${call} timed out after ${ms}ms`, {
      code: "PROVIDER_TIMEOUT",
      context: { busName, call, ms },
    });
    this.busName = busName;
  }
}

/** A command-mode subprocess could not be run. */
export class CommandError extends SeekrError {
  constructor(message: string, options?: SubclassOptions) {
    super(message, { ...options, code: "COMMAND_ERROR" });
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  if (
    typeof error === "object" && error !== null && "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/**
 * Races `promise` against a timer. The timer is cleared once the promise
 * settles, so a fast answer leaves nothing scheduled behind it.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  return Promise.race([promise, expired]).finally(() => clearTimeout(timer));
}
