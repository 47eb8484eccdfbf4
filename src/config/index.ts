/**
 * Configuration exports
 */

export * from './defaults';
export * from './charm-config';
export * from './metadata';
export * from './app-config';
