export type TrackerErrorCode = "no_total_yet" | "invalid_viewer";

export class TrackerError extends Error {
  readonly code: TrackerErrorCode;

  constructor(code: TrackerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Sharing or publishing was requested before any contribution was accepted. */
export class NoTotalYetError extends TrackerError {
  constructor(identity: string) {
    super("no_total_yet", `${identity} has no accumulated total yet`);
  }
}

export class InvalidViewerError extends TrackerError {
  constructor(message: string) {
    super("invalid_viewer", message);
  }
}

export function trackerErrorStatus(error: TrackerError): number {
  return error.code === "no_total_yet" ? 409 : 400;
}
