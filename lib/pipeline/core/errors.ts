/**
 * Error taxonomy for the pipeline.
 *
 * A single PipelineError class carries a `kind` tag and a typed `detail`
 * payload. Callers narrow with isPipelineError(err, kind) instead of
 * checking subclasses. The underlying cause stays on the standard
 * `cause` property so the full chain survives re-wrapping.
 */

// ============================================================================
// Kinds and details
// ============================================================================

export type GatewayFailure = "authentication" | "rate-limit" | "timeout" | "provider";

export type ResourceBoundaryReason = "outside-root" | "size-ceiling" | "count-ceiling";

export interface TaskFailureSummary {
  id: string;
  message: string;
}

export type ErrorDetail =
  | { kind: "validation"; issues: string[] }
  | { kind: "step"; step: string; attempt: number; context: Record<string, unknown> }
  | { kind: "aggregate-task"; failures: TaskFailureSummary[]; total: number }
  | { kind: "invalid-dimension"; width: number; height: number }
  | { kind: "resource-boundary"; reason: ResourceBoundaryReason; destination: string }
  | { kind: "gateway"; failure: GatewayFailure; retryable: boolean; statusCode?: number }
  | { kind: "cancelled"; reason: string };

export type ErrorKind = ErrorDetail["kind"];

export type DetailOf<K extends ErrorKind> = Extract<ErrorDetail, { kind: K }>;

export class PipelineError<K extends ErrorKind = ErrorKind> extends Error {
  readonly detail: DetailOf<K>;

  constructor(detail: DetailOf<K>, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.detail = detail;
  }
}

export function isPipelineError<K extends ErrorKind>(
  err: unknown,
  kind?: K
): err is PipelineError<K> {
  if (!(err instanceof PipelineError)) return false;
  return kind === undefined || err.detail.kind === kind;
}

// ============================================================================
// Constructors
// ============================================================================

export function validationError(
  issues: string[],
  cause?: unknown
): PipelineError<"validation"> {
  return new PipelineError<"validation">(
    { kind: "validation", issues },
    `Validation failed: ${issues.join("; ")}`,
    { cause }
  );
}

export function stepError(
  step: string,
  attempt: number,
  cause: unknown,
  context: Record<string, unknown> = {}
): PipelineError<"step"> {
  return new PipelineError<"step">(
    { kind: "step", step, attempt, context },
    `Step "${step}" failed after ${attempt} attempt${attempt === 1 ? "" : "s"}: ${messageOf(cause)}`,
    { cause }
  );
}

export function aggregateTaskError(
  failures: TaskFailureSummary[],
  total: number
): PipelineError<"aggregate-task"> {
  return new PipelineError<"aggregate-task">(
    { kind: "aggregate-task", failures, total },
    `${failures.length} of ${total} tasks failed` +
      (failures.length > 0 ? ` (first: ${failures[0].id}: ${failures[0].message})` : "")
  );
}

export function invalidDimensionError(
  width: number,
  height: number
): PipelineError<"invalid-dimension"> {
  return new PipelineError<"invalid-dimension">(
    { kind: "invalid-dimension", width, height },
    `Invalid coordinate space ${width}x${height}`
  );
}

export function resourceBoundaryError(
  reason: ResourceBoundaryReason,
  destination: string,
  message: string
): PipelineError<"resource-boundary"> {
  return new PipelineError<"resource-boundary">(
    { kind: "resource-boundary", reason, destination },
    message
  );
}

export function gatewayError(
  failure: GatewayFailure,
  message: string,
  options: { retryable?: boolean; statusCode?: number; cause?: unknown } = {}
): PipelineError<"gateway"> {
  return new PipelineError<"gateway">(
    {
      kind: "gateway",
      failure,
      retryable: options.retryable ?? failure !== "authentication",
      statusCode: options.statusCode,
    },
    message,
    { cause: options.cause }
  );
}

export function cancelledError(reason: string): PipelineError<"cancelled"> {
  return new PipelineError<"cancelled">({ kind: "cancelled", reason }, `Cancelled: ${reason}`);
}

// ============================================================================
// Error records and formatting
// ============================================================================

/** Failure summary attached to a Failed pipeline state. */
export interface ErrorRecord {
  step: string;
  attempt: number;
  cause: unknown;
  context: Record<string, unknown>;
}

export function toErrorRecord(err: PipelineError<"step">): ErrorRecord {
  return {
    step: err.detail.step,
    attempt: err.detail.attempt,
    cause: err.cause,
    context: err.detail.context,
  };
}

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Flatten an error and its causes into one line, outermost first.
 */
export function describeError(err: unknown): string {
  const parts: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = err;
  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    parts.push(messageOf(current));
    current = current instanceof Error ? current.cause : undefined;
  }
  return parts.join(" <- ");
}
