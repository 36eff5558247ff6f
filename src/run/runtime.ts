/**
 * Wires configuration, the Yahoo source, state and artifact stores into one
 * orchestrator and query facade. Shared by the entry scripts.
 */

import { getConfig, type AppConfig } from '@/core/config';
import { getEnvConfig, type EnvConfig } from '@/core/env';
import { SmtpNotifier } from '@/lib/mailer';
import { YahooFinanceClient } from '@/providers/yahoo_client';
import type { MarketDataSource } from '@/providers/types';
import { ArtifactStore } from './files';
import { JobOrchestrator } from './orchestrator';
import { QueryFacade } from './query';
import { JobStateStore } from './state';

export interface RuntimeOptions {
  notify: boolean;
  env?: EnvConfig;
  config?: AppConfig;
  source?: MarketDataSource;
}

export interface Runtime {
  env: EnvConfig;
  config: AppConfig;
  store: JobStateStore;
  artifacts: ArtifactStore;
  orchestrator: JobOrchestrator;
  facade: QueryFacade;
}

export function createRuntime(options: RuntimeOptions): Runtime {
  const env = options.env ?? getEnvConfig();
  const config = options.config ?? getConfig();

  const store = new JobStateStore();
  const artifacts = new ArtifactStore(env.outputDir, env.timeZone);
  const orchestrator = new JobOrchestrator({
    source: options.source ?? new YahooFinanceClient({ timeoutMs: env.fetchTimeoutMs }),
    store,
    artifacts,
    instruments: config.instruments,
    benchmarks: config.benchmarks,
    macro: config.macro,
    timeZone: env.timeZone,
    notifier: options.notify ? new SmtpNotifier(env) : null,
    notify: options.notify,
    fetch: { minIntervalMs: env.requestSpacingMs, timeoutMs: env.fetchTimeoutMs },
  });
  const facade = new QueryFacade(store, orchestrator, env.timeZone);

  return { env, config, store, artifacts, orchestrator, facade };
}
