/**
 * CLI command implementations, kept apart from argument parsing so they can
 * be driven directly.
 */

import * as yaml from 'js-yaml';
import type { Logger } from '../src/lib/logger';
import { describeRenderError } from '../src/domain/types';
import { renderEnvironment } from '../src/core/templates';
import { buildRelationContext } from '../src/core/relations';
import { createRecordingWorkload, type Workload } from '../src/core/workload';
import { GunicornOperator } from '../src/core/operator';
import {
  DEFAULT_WORKLOAD,
  peerRelationName,
  requiredRelations,
  type CharmMetadata,
  type ConfigOption,
} from '../src/config';
import { createStateModel, type UnitState } from '../src/infrastructure/model';

export const EXIT_CODES = {
  ok: 0,
  error: 1,
  renderFailed: 2,
  notActive: 3,
} as const;

export interface CommandIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface RenderCommandInput {
  metadata: CharmMetadata;
  state: UnitState;
  /** Template text; falls back to the state's `environment` config value */
  template?: string;
  /** Extra relations to treat as required */
  require?: string[];
}

export function runRender(input: RenderCommandInput, io: CommandIO, logger: Logger): number {
  const model = createStateModel(input.state, input.metadata.name);
  const configured = model.config().environment;
  const template = input.template ?? (typeof configured === 'string' ? configured : '');

  const context = buildRelationContext(
    model.relations(),
    {
      database: model.appName,
      unitName: model.unitName,
      peerRelation: peerRelationName(input.metadata),
    },
    logger,
  );

  const result = renderEnvironment(template, context, {
    requiredRelations: [...requiredRelations(input.metadata), ...(input.require ?? [])],
  });
  if (!result.ok) {
    io.stderr(`${describeRenderError(result.error)}\n`);
    return EXIT_CODES.renderFailed;
  }

  io.stdout(yaml.dump(result.value, { sortKeys: true }));
  return EXIT_CODES.ok;
}

export interface ReconcileCommandInput {
  metadata: CharmMetadata;
  configOptions: Record<string, ConfigOption>;
  state: UnitState;
  /** Print the layer instead of applying it */
  dryRun: boolean;
  /** Workload used when not a dry run */
  createWorkload: () => Workload;
}

export async function runReconcile(
  input: ReconcileCommandInput,
  io: CommandIO,
  logger: Logger,
): Promise<number> {
  const model = createStateModel(input.state, input.metadata.name);
  const recording = input.dryRun ? createRecordingWorkload() : undefined;

  const operator = new GunicornOperator({
    model,
    workload: recording ?? input.createWorkload(),
    metadata: input.metadata,
    configOptions: input.configOptions,
    logger,
  });

  const status = await operator.handle({ type: 'config-changed' });
  io.stdout(`${status.name}${status.message ? `: ${status.message}` : ''}\n`);

  const layer = recording?.layers.get(DEFAULT_WORKLOAD.layerLabel);
  if (layer) {
    io.stdout(yaml.dump(layer));
  }

  return status.name === 'active' ? EXIT_CODES.ok : EXIT_CODES.notActive;
}
