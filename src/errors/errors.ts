/**
 * Engine errors
 *
 * One error class for every failure the engine reports. The `kind` decides
 * how the orchestrator treats it: structural kinds abort a command before any
 * remote mutation, `RemoteCallFailed` is folded into the outcome per item.
 */

export const ERROR_KINDS = [
  "InvalidVersion",
  "InvalidArgument",
  "MissingSigningKey",
  "RemoteCallFailed",
  "NoDependentPublishes",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/** Kinds that indicate an input or configuration defect, not a remote condition */
export const STRUCTURAL_ERROR_KINDS: readonly ErrorKind[] = [
  "InvalidVersion",
  "InvalidArgument",
  "MissingSigningKey",
];

export interface EngineErrorOptions {
  /** Human-readable label of the item the error is about */
  item?: string;
  /** HTTP status code, when the error came from a response */
  status?: number;
  cause?: unknown;
}

export class EngineError extends Error {
  readonly kind: ErrorKind;
  readonly item?: string;
  readonly status?: number;

  constructor(kind: ErrorKind, message: string, options: EngineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "EngineError";
    this.kind = kind;
    this.item = options.item;
    this.status = options.status;
  }

  get structural(): boolean {
    return STRUCTURAL_ERROR_KINDS.includes(this.kind);
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Normalize anything thrown into an EngineError.
 * EngineErrors pass through untouched; everything else gets `fallback` kind.
 */
export function toEngineError(
  err: unknown,
  fallback: ErrorKind,
  item?: string
): EngineError {
  if (isEngineError(err)) {
    return err;
  }
  return new EngineError(fallback, errorMessage(err), { item, cause: err });
}

/**
 * Result of a single fallible operation
 */
export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: EngineError };

/**
 * Run an async operation and capture its failure as a Result instead of a
 * rejection. Errors that are not EngineErrors become `fallback` kind.
 */
export async function attempt<T>(
  operation: () => Promise<T>,
  fallback: ErrorKind,
  item?: string
): Promise<Result<T>> {
  try {
    return { success: true, data: await operation() };
  } catch (err) {
    return { success: false, error: toEngineError(err, fallback, item) };
  }
}
