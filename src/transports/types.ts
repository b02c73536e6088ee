/**
 * Transport Types
 *
 * A transport moves one hex-encoded message in or out of the process.
 * The pipeline only ever sees text; decoding happens in the core.
 */

/**
 * Supplies the raw hex text of one message
 */
export interface InputSource {
  /** Short label for logs, e.g. "stdin" or "queue:byteproc:input" */
  readonly label: string;

  /** Read one complete message, with surrounding whitespace trimmed */
  receive(): Promise<string>;

  /** Release connections; called once whether or not receive succeeded */
  close(): Promise<void>;
}

/**
 * Accepts the hex text of the processed message
 */
export interface OutputSink {
  readonly label: string;

  /** Deliver one complete message */
  send(hex: string): Promise<void>;

  close(): Promise<void>;
}
