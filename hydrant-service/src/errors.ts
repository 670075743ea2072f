export type PipelineErrorReason =
  | "upstream_fetch"
  | "payload_parse"
  | "empty_valid_set"
  | "empty_transform"
  | "storage_write"
  | "unclassified";

export class PipelineError extends Error {
  readonly reason: PipelineErrorReason;

  constructor(reason: PipelineErrorReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.reason = reason;
    Object.setPrototypeOf(this, PipelineError.prototype);
  }
}

export function messageFrom(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  if (typeof err === "object" && err && "message" in err && typeof (err as { message?: unknown }).message === "string") {
    return (err as { message: string }).message;
  }
  return String(err);
}

export function toPipelineError(err: unknown, fallback: PipelineErrorReason = "unclassified"): PipelineError {
  if (err instanceof PipelineError) return err;
  return new PipelineError(fallback, messageFrom(err), { cause: err });
}

export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
