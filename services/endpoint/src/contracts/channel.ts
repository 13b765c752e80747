/**
 * Transport handle the broker writes to. The WebSocket adapter implements it in
 * production; tests substitute an in-memory channel.
 */
export interface PeerChannel {
  /** Resolves once the frame is handed to the transport, rejects when the write fails. */
  send(payload: string): Promise<void>;
  close(code?: number, reason?: string): void;
}
