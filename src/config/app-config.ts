/**
 * Process settings with environment overrides
 */

import { resolve } from 'node:path';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface OperatorSettings {
  /** Directory holding metadata.yaml and config.yaml */
  charmDir: string;
  logLevel: LogLevel;
  kubernetes: {
    namespace: string;
    /** Path to a kubeconfig file; the default loading rules apply when unset */
    kubeconfig: string | undefined;
  };
}

function createDefaultSettings(): OperatorSettings {
  return {
    charmDir: process.cwd(),
    logLevel: 'info',
    kubernetes: {
      namespace: 'default',
      kubeconfig: undefined,
    },
  };
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create settings from the process environment
 */
export function createSettings(env: NodeJS.ProcessEnv = process.env): OperatorSettings {
  const defaults = createDefaultSettings();

  return {
    charmDir: env.CHARM_DIR ? resolve(env.CHARM_DIR) : defaults.charmDir,
    logLevel: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : defaults.logLevel,
    kubernetes: {
      namespace: env.K8S_NAMESPACE || env.KUBE_NAMESPACE || defaults.kubernetes.namespace,
      kubeconfig: env.OPERATOR_KUBECONFIG || defaults.kubernetes.kubeconfig,
    },
  };
}
