/**
 * @libs/http-client-core
 *
 * Interfaces shared by the API client libraries, plus the default
 * implementations they fall back to when the caller injects nothing.
 */

export type { Logger, HttpTransport, ConnectivityCheck } from './types';
export { ConsoleLogger } from './consoleLogger';
export { createDnsConnectivityCheck } from './connectivity';
