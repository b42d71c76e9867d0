import { ochamiConfigFromEnv, type OchamiConfig } from './config';
import { OchamiDispatcher } from './ochamiDispatcher';

/**
 * Creates an OCHAMI dispatcher from `OCHAMI_*`, `ACCESS_TOKEN` and `SOCKS5`
 * environment variables, with `overrides` applied last.
 */
export function createOchamiDispatcherFromEnv(overrides: Partial<OchamiConfig> = {}): OchamiDispatcher {
  return new OchamiDispatcher(ochamiConfigFromEnv(overrides));
}
