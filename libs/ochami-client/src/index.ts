/**
 * @libs/ochami-client
 *
 * OCHAMI backend for the cluster-management dispatcher.
 *
 * ## Architecture
 *
 * - **Dispatcher**: one method per capability, SMD / BSS / PCS routes
 * - **Fan-out**: per-host or batched requests, aggregated into a BatchResult
 * - **Schemas**: zod validation of every response, mapped to domain types
 *
 * ## Usage
 *
 * ```typescript
 * import { createOchamiDispatcherFromEnv } from '@libs/ochami-client';
 *
 * // Reads OCHAMI_BASE_URL, ACCESS_TOKEN, OCHAMI_ROOT_CERT, SOCKS5, ...
 * const dispatcher = createOchamiDispatcherFromEnv();
 *
 * const status = await dispatcher.getPowerStatus('x1000c0s[0-3]b0n0');
 * if (status.status !== 'success') {
 *   for (const outcome of status.outcomes) {
 *     if (!outcome.ok) console.warn(outcome.host, outcome.error.kind);
 *   }
 * }
 * ```
 */
export { OchamiDispatcher, createOchamiDispatcher } from './ochamiDispatcher';
export { createOchamiDispatcherFromEnv } from './fromEnv';
export {
  DEFAULT_BATCH_SIZE,
  DEFAULT_POWER_POLL_INTERVAL_MS,
  DEFAULT_POWER_POLL_MAX_ATTEMPTS,
  ochamiConfigFromEnv,
  resolveOchamiSettings,
  type OchamiConfig,
  type OchamiSettings,
} from './config';
export { chunk, dispatchInBatches, dispatchPerHost, type FanOutContext, type HostValues } from './fanOut';
