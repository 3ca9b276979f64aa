export type TrackerErrorCode = 'MALFORMED_COMMAND';

/**
 * Raised while turning a raw command line into a {@link TrackerCommand}.
 * The protocol handler converts it into an error response; it never
 * crosses the connection boundary.
 */
export class TrackerError extends Error {
  readonly code: TrackerErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: TrackerErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'TrackerError';
    this.code = code;
    this.context = context;
  }
}
