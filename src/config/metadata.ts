/**
 * Charm metadata
 *
 * metadata.yaml declares the application name, its workload container and the
 * relations it takes part in. A `requires` entry may carry `required: true`,
 * which keeps the workload blocked until that relation has data.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import yaml from 'yaml';
import { ConfigurationError, ErrorCodes, errorMessage } from '../lib/errors';

const relationSpecSchema = z.object({
  interface: z.string().min(1),
  limit: z.number().int().positive().optional(),
  required: z.boolean().optional(),
});

const metadataSchema = z.object({
  name: z.string().min(1),
  'display-name': z.string().optional(),
  summary: z.string().optional(),
  description: z.string().optional(),
  containers: z.record(z.object({ resource: z.string().optional() }).passthrough()).default({}),
  peers: z.record(relationSpecSchema).default({}),
  provides: z.record(relationSpecSchema).default({}),
  requires: z.record(relationSpecSchema).default({}),
});

export type RelationSpec = z.infer<typeof relationSpecSchema>;
export type CharmMetadata = z.infer<typeof metadataSchema>;

export function parseMetadata(source: string): CharmMetadata {
  let raw: unknown;
  try {
    raw = yaml.parse(source);
  } catch (error) {
    throw new ConfigurationError(
      `metadata.yaml is not valid YAML: ${errorMessage(error)}`,
      ErrorCodes.METADATA_INVALID,
    );
  }

  const parsed = metadataSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`metadata.yaml is invalid: ${issues}`, ErrorCodes.METADATA_INVALID);
  }
  return parsed.data;
}

export function loadMetadata(path: string): CharmMetadata {
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
  return parseMetadata(source);
}

/**
 * Workload container name: the application name without its `-k8s` suffix
 */
export function containerName(metadata: CharmMetadata): string {
  return metadata.name.replace(/-k8s$/, '');
}

/**
 * Relations that must have data before the workload may start, sorted
 */
export function requiredRelations(metadata: CharmMetadata): string[] {
  return Object.entries(metadata.requires)
    .filter(([, spec]) => spec.required === true)
    .map(([name]) => name)
    .sort();
}

export function peerRelationName(metadata: CharmMetadata): string | undefined {
  return Object.keys(metadata.peers)[0];
}
