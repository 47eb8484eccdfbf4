/**
 * Charm configuration
 *
 * Option declarations live in config.yaml; values set by the operator
 * framework are merged over those defaults and validated with zod.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import yaml from 'yaml';
import { Success, Failure, type Result } from '../domain/types';
import { ConfigurationError, ErrorCodes, errorMessage } from '../lib/errors';
import { DEFAULT_CHARM_OPTIONS } from './defaults';

export const charmConfigSchema = z.object({
  environment: z.string().default(DEFAULT_CHARM_OPTIONS.environment),
  external_hostname: z.string().default(DEFAULT_CHARM_OPTIONS.external_hostname),
  external_port: z.number().int().min(1).max(65535).default(DEFAULT_CHARM_OPTIONS.external_port),
  startup_command: z.string().min(1).default(DEFAULT_CHARM_OPTIONS.startup_command),
  app_wsgi: z.string().min(1).default(DEFAULT_CHARM_OPTIONS.app_wsgi),
});

export type CharmConfig = z.infer<typeof charmConfigSchema>;

const optionSchema = z.object({
  type: z.enum(['string', 'int', 'float', 'boolean']),
  description: z.string().optional(),
  default: z.union([z.string(), z.number(), z.boolean()]).optional(),
});

const configFileSchema = z.object({
  options: z.record(optionSchema).default({}),
});

export type ConfigOption = z.infer<typeof optionSchema>;

/**
 * Parse the contents of config.yaml into option declarations
 */
export function parseConfigOptions(source: string): Record<string, ConfigOption> {
  let raw: unknown;
  try {
    raw = yaml.parse(source);
  } catch (error) {
    throw new ConfigurationError(
      `config.yaml is not valid YAML: ${errorMessage(error)}`,
      ErrorCodes.CONFIG_INVALID,
    );
  }

  const parsed = configFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      `config.yaml does not declare valid options: ${formatIssues(parsed.error)}`,
      ErrorCodes.CONFIG_INVALID,
    );
  }
  return parsed.data.options;
}

export function loadConfigOptions(path: string): Record<string, ConfigOption> {
  let source: string;
  try {
    source = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read ${path}`,
      ErrorCodes.FILE_NOT_FOUND,
      { path },
      error instanceof Error ? error : undefined,
    );
  }
  return parseConfigOptions(source);
}

/**
 * Default values declared by the options
 */
export function optionDefaults(options: Record<string, ConfigOption>): Record<string, unknown> {
  const defaults: Record<string, unknown> = {};
  for (const [name, option] of Object.entries(options)) {
    if (option.default !== undefined) {
      defaults[name] = option.default;
    }
  }
  return defaults;
}

/**
 * Validate configured values merged over the declared defaults
 */
export function resolveCharmConfig(
  values: Record<string, unknown>,
  options: Record<string, ConfigOption> = {},
): Result<CharmConfig> {
  const parsed = charmConfigSchema.safeParse({ ...optionDefaults(options), ...values });
  if (!parsed.success) {
    return Failure(formatIssues(parsed.error));
  }
  return Success(parsed.data);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
