/**
 * The subset of a fetch `Response` the key fetcher reads.
 */
export interface KeyServiceResponse {
  status: number;
  json(): Promise<unknown>;
  /** Unread body, cancelled when the status is not 200 to release the connection */
  body?: { cancel(): Promise<void> } | null;
}

/**
 * Performs a GET request for a discovery document or key set.
 * Injected into the guard so tests and hosts can supply their own transport.
 */
export type KeyServiceFetch = (url: string) => Promise<KeyServiceResponse>;
