/** A live client transport as seen by the connection registry. */
export interface Connection {
  /** Resolves once the frame is handed to the transport; rejects when it is dead */
  send(data: string): Promise<void>;
  close(): Promise<void>;
}
