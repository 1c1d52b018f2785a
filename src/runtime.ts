import { createDefaultRegistry } from './analyzers/registry.js';
import type { AppConfig } from './config/config.js';
import { createDefaultHooks } from './hooks/index.js';
import type { SessionStore } from './persistence/types.js';
import { SessionManager } from './session/manager.js';
import { createSessionStore } from './session/store.js';

export interface RuntimeOptions {
  repoRoot: string;
  store?: SessionStore;
}

export function createSessionManager(config: AppConfig, options: RuntimeOptions): SessionManager {
  const store = options.store ?? createSessionStore({
    redisUrl: config.redisUrl,
    stateDir: config.stateDir,
    repoRoot: options.repoRoot,
  });

  return new SessionManager({
    store,
    hooks: createDefaultHooks(config.anthropicApiKey),
    settings: {
      weights: config.weights,
      coChangeThreshold: config.coChange.threshold,
      analyzers: createDefaultRegistry(),
    },
    defaultScheme: config.defaultScheme,
  });
}
