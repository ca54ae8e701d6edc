export interface Logger {
  debug?(message: string, meta?: unknown): void;
  info?(message: string, meta?: unknown): void;
  warn?(message: string, meta?: unknown): void;
  error?(message: string, meta?: unknown): void;
}

export interface HttpTransport {
  (url: string, init: RequestInit): Promise<Response>;
}

/**
 * Resolves `true` when `hostname` looks reachable. Clients call it with the
 * host of the endpoint they are about to hit, before issuing any request.
 */
export interface ConnectivityCheck {
  (hostname: string): Promise<boolean>;
}
