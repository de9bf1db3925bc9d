/**
 * Message channel seams. The server and the workers only talk through these;
 * HTTP, Pub/Sub and in-process implementations plug in behind them.
 */

/** Client side of a request/reply channel. One exchange may be outstanding at a time. */
export interface RequestChannel {
  /** Dispatch a request. false when the channel is closed or an exchange is still outstanding. */
  send(payload: string, timeoutMs: number): Promise<boolean>;
  /** Wait for the reply of the outstanding exchange; null on timeout or transport error. */
  receive(timeoutMs: number): Promise<string | null>;
  /** An exchange is outstanding. false again once its reply arrived or its transport failed. */
  readonly awaitingReply: boolean;
  /** Abandon the outstanding exchange, if any. The server's reply to it will fail. */
  cancel(): void;
  close(): Promise<void>;
}

/** A request received by the server, answered exactly once. */
export interface IncomingRequest {
  readonly payload: string;
  /** Send the reply; false when it could not be delivered within timeoutMs. */
  reply(payload: string, timeoutMs: number): Promise<boolean>;
}

/** Server side of a request/reply channel. */
export interface ReplyChannel {
  /** Next request in arrival order; null on timeout or once closed. No timeout waits indefinitely. */
  receive(timeoutMs?: number): Promise<IncomingRequest | null>;
  close(): Promise<void>;
}

/** Subscribe side of the control channel. */
export interface Subscriber {
  receive(timeoutMs?: number): Promise<string | null>;
  close(): Promise<void>;
}

/** Publish side used for status notifications. */
export interface Publisher {
  publish(message: string): Promise<void>;
}
