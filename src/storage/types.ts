/**
 * Key-value store with pub/sub, shared by the coordinator, the message bus
 * (indirect delivery path) and the session manager.
 */

/** Called with the raw string payload published on a channel. */
export type ChannelHandler = (message: string) => void;

export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  /** Store `value`; when `expireSeconds` is given the key expires after it. */
  set(key: string, value: string, expireSeconds?: number): Promise<void>;
  /** Returns the number of keys removed (0 or 1). */
  delete(key: string): Promise<number>;
  exists(key: string): Promise<boolean>;
  /** Returns the number of subscribers that received the message. */
  publish(channel: string, message: string): Promise<number>;
  /** Returns a function that removes this handler. */
  subscribe(channel: string, handler: ChannelHandler): Promise<() => Promise<void>>;
  /** Round-trip check used by the health endpoint. */
  ping(): Promise<boolean>;
  close(): Promise<void>;
}
