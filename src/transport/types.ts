/**
 * Transport Types
 */

/**
 * Long-lived bidirectional channel carrying one message per frame
 */
export interface DuplexChannel {
  readonly address: string;
  readonly isOpen: boolean;

  /**
   * Take the next complete inbound frame, if one has arrived. A frame is
   * handed out once and never kept by the channel afterwards.
   */
  tryRead(): Buffer | undefined;

  /**
   * Resolve true once a frame is readable, false on timeout, abort or close
   */
  waitReadable(timeoutMs: number, signal?: AbortSignal): Promise<boolean>;

  /** Write one frame. Rejects with a TransportError on failure. */
  send(data: string): Promise<void>;

  close(): Promise<void>;
}

/**
 * Connection factory for the two exchange patterns the bridge uses
 */
export interface Transport {
  /**
   * One-shot request/reply: connect, write one frame, wait for exactly one
   * reply frame, disconnect.
   */
  request(address: string, payload: string, timeoutMs: number): Promise<string>;

  /** Open a persistent duplex channel */
  connect(address: string): Promise<DuplexChannel>;
}
