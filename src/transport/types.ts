/**
 * Transport boundary types.
 * The orchestrator talks to the network exclusively through `Transport`,
 * never with fetch directly.
 */

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS', 'TRACE'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/** Per-call options passed through the orchestrator unmodified. */
export interface TransportOptions {
  /** Per-attempt timeout in milliseconds; overrides the transport default. */
  timeoutMs?: number;
  /** Cancels the call, including any wait between attempts. */
  signal?: AbortSignal;
}

/** Response as seen by the orchestrator: status plus header lookup. */
export interface TransportResponse {
  readonly status: number;
  readonly headers: Headers;
  /** Case-insensitive header lookup. */
  header(name: string): string | null;
  /**
   * Body as text. Safe to call more than once. Rejects when the body cannot
   * be read within the attempt's timeout.
   */
  text(): Promise<string>;
  /** Body parsed as JSON. */
  json(): Promise<unknown>;
}

/**
 * Performs one logical HTTP exchange. Implementations may retry internally
 * at the connection level, but resolve with whatever response they end on;
 * only connection failures and timeouts reject.
 */
export interface Transport {
  execute(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    body: unknown,
    options?: TransportOptions,
  ): Promise<TransportResponse>;
}
