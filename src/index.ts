/**
 * Main export file for library consumers
 */

export * from './domain/types';
export * from './config';
export * from './core/templates';
export * from './core/relations';
export * from './core/workload';
export * from './core/operator';
export * from './infrastructure/kubernetes';
export * from './infrastructure/model';
export { createLogger, createTimer, type Logger, type Timer } from './lib/logger';
export {
  OperatorError,
  ConfigurationError,
  KubernetesError,
  ErrorCodes,
  isOperatorError,
  errorMessage,
  type ErrorCode,
} from './lib/errors';
