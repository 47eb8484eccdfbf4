/**
 * Centralized Configuration Defaults
 *
 * Single source of truth for default values used throughout the operator.
 */

/**
 * Charm option defaults, used when config.yaml does not provide one
 */
export const DEFAULT_CHARM_OPTIONS = {
  environment: '',
  external_hostname: '',
  external_port: 8080,
  startup_command: '/srv/gunicorn/run',
  app_wsgi: 'app:app',
} as const;

/**
 * Names inside the workload layer
 */
export const DEFAULT_WORKLOAD = {
  serviceName: 'gunicorn',
  checkName: 'gunicorn-ready',
  layerLabel: 'gunicorn',
  summary: 'gunicorn layer',
  serviceSummary: 'gunicorn service',
} as const;

/**
 * Well-known relation names
 */
export const RELATION_NAMES = {
  postgresql: 'pg',
  mongodb: 'mongodb_client',
  ingress: 'ingress',
  peer: 'peer',
} as const;

/**
 * Default network configuration
 */
export const DEFAULT_NETWORK = {
  loopback: '127.0.0.1',
} as const;
