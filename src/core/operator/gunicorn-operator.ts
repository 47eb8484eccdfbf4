/**
 * Gunicorn Operator
 *
 * Event-driven controller for the gunicorn workload. Every event ends in a
 * fresh render of the environment from configuration and relation data;
 * nothing rendered is kept between events. Failures leave the unit blocked
 * with a readable reason until a later event fixes the inputs.
 */

import * as yaml from 'js-yaml';
import type { Logger } from 'pino';
import {
  Success,
  Failure,
  ActiveStatus,
  BlockedStatus,
  MaintenanceStatus,
  describeRenderError,
  type Result,
  type UnitStatus,
  type WorkloadLayer,
  type RelationContext,
  type RelationInstance,
} from '../../domain/types';
import { createTimer } from '../../lib/logger';
import { errorMessage } from '../../lib/errors';
import { RELATION_NAMES, DEFAULT_WORKLOAD } from '../../config/defaults';
import { resolveCharmConfig, type CharmConfig, type ConfigOption } from '../../config/charm-config';
import { peerRelationName, requiredRelations, type CharmMetadata } from '../../config/metadata';
import { renderEnvironment } from '../templates';
import {
  buildRelationContext,
  ingressRequirements,
  mongodbCredentials,
  peerHasCredentials,
  primaryInstance,
  toIngressData,
  toPeerData,
} from '../relations';
import { buildLayer, defaultEnvironment, mergeEnvironment, type Workload } from '../workload';
import type { OperatorEvent, OperatorModel } from './types';

export interface GunicornOperatorOptions {
  model: OperatorModel;
  workload: Workload;
  metadata: CharmMetadata;
  /** Option declarations from config.yaml */
  configOptions?: Record<string, ConfigOption>;
  logger: Logger;
}

export interface PreparedWorkload {
  config: CharmConfig;
  layer: WorkloadLayer;
}

export class GunicornOperator {
  private readonly model: OperatorModel;
  private readonly workload: Workload;
  private readonly metadata: CharmMetadata;
  private readonly configOptions: Record<string, ConfigOption>;
  private readonly logger: Logger;

  constructor(options: GunicornOperatorOptions) {
    this.model = options.model;
    this.workload = options.workload;
    this.metadata = options.metadata;
    this.configOptions = options.configOptions ?? {};
    this.logger = options.logger.child({ component: 'GunicornOperator' });
  }

  /**
   * Handle one framework event. Events are processed one at a time.
   */
  async handle(event: OperatorEvent): Promise<UnitStatus> {
    this.logger.debug({ event }, 'Handling event');

    switch (event.type) {
      case 'relation-joined':
        this.onRelationJoined(event.relation, event.relationId);
        break;
      case 'relation-changed':
        this.onRelationChanged(event.relation, event.relationId);
        break;
      case 'relation-departed':
        this.onRelationDeparted(event.relation);
        break;
      case 'config-changed':
      case 'workload-ready':
        break;
    }

    return this.configureWorkload();
  }

  /**
   * Validate config, render the environment and build the layer
   */
  prepareWorkload(): Result<PreparedWorkload> {
    const config = resolveCharmConfig(this.model.config(), this.configOptions);
    if (!config.ok) {
      this.logger.error({ error: config.error }, 'Invalid charm configuration');
      return Failure(`Invalid config: ${config.error}`);
    }

    const context = this.relationContext();
    const rendered = renderEnvironment(config.value.environment, context, {
      requiredRelations: requiredRelations(this.metadata),
    });
    if (!rendered.ok) {
      const reason = describeRenderError(rendered.error);
      if (rendered.error.kind === 'MissingRelationData') {
        this.logger.info({ missing: rendered.error }, reason);
      } else {
        this.logger.error({ error: rendered.error }, reason);
      }
      return Failure(reason);
    }

    const environment = mergeEnvironment(
      defaultEnvironment(this.model.appName, config.value),
      rendered.value,
    );
    return Success({ config: config.value, layer: buildLayer(environment, config.value) });
  }

  /**
   * Configure the workload container and report the resulting status
   */
  async configureWorkload(): Promise<UnitStatus> {
    const timer = createTimer(this.logger, 'configure-workload');

    const prepared = this.prepareWorkload();
    if (!prepared.ok) {
      timer.end({ status: 'blocked' });
      return this.setStatus(BlockedStatus(prepared.error));
    }

    this.publishIngress(prepared.value.config);

    if (!(await this.workload.canConnect())) {
      this.logger.debug('Waiting for the workload to start');
      timer.end({ status: 'maintenance' });
      return this.setStatus(MaintenanceStatus('waiting for workload to start'));
    }

    this.logger.debug(`About to add layer:\n${yaml.dump(prepared.value.layer)}`);
    try {
      await this.workload.addLayer(DEFAULT_WORKLOAD.layerLabel, prepared.value.layer);
      await this.workload.replan();
    } catch (error) {
      timer.error(error);
      return this.setStatus(BlockedStatus(`Failed to apply workload layer: ${errorMessage(error)}`));
    }

    timer.end({ status: 'active' });
    return this.setStatus(ActiveStatus());
  }

  private relationContext(): RelationContext {
    return buildRelationContext(
      this.model.relations(),
      {
        database: this.model.appName,
        unitName: this.model.unitName,
        peerRelation: peerRelationName(this.metadata),
      },
      this.logger,
    );
  }

  private onRelationJoined(relation: string, relationId: number): void {
    if (relation !== RELATION_NAMES.postgresql && relation !== RELATION_NAMES.mongodb) {
      return;
    }
    if (!this.model.isLeader()) {
      return;
    }
    // Providers create a database named like this application
    this.model.setLocalAppData(relation, relationId, { database: this.model.appName });
    this.logger.info({ relation, database: this.model.appName }, 'Requested database');
  }

  private onRelationChanged(relation: string, relationId: number): void {
    if (relation !== RELATION_NAMES.mongodb || !this.model.isLeader()) {
      return;
    }

    const instance = this.model.relations()[relation]?.find((r) => r.id === relationId);
    const credentials = instance ? mongodbCredentials(instance.appData, this.model.appName) : undefined;
    if (!credentials) {
      return;
    }

    const peer = this.peerInstance();
    if (!peer) {
      this.logger.warn('Peer relation not established yet, cannot share MongoDB credentials');
      return;
    }
    if (peerHasCredentials(peer.localAppData, credentials)) {
      return;
    }
    this.model.setLocalAppData(peer.name, peer.id, toPeerData(credentials));
    this.logger.info({ database: credentials.database }, 'Shared MongoDB credentials with peers');
  }

  private onRelationDeparted(relation: string): void {
    if (relation !== RELATION_NAMES.mongodb || !this.model.isLeader()) {
      return;
    }
    // An instance whose units have all departed no longer provides credentials
    const remaining = (this.model.relations()[relation] ?? []).filter(
      (instance) => Object.keys(instance.units).length > 0,
    );
    if (remaining.length > 0) {
      return;
    }

    const peer = this.peerInstance();
    if (!peer) {
      return;
    }
    const cleared = Object.fromEntries(
      Object.keys(peer.localAppData)
        .filter((key) => key.startsWith('mongodb-'))
        .map((key): [string, string] => [key, '']),
    );
    if (Object.keys(cleared).length > 0) {
      this.model.setLocalAppData(peer.name, peer.id, cleared);
      this.logger.info('Removed MongoDB credentials from peer data');
    }
  }

  private peerInstance(): RelationInstance | undefined {
    const peerName = peerRelationName(this.metadata);
    return peerName ? primaryInstance(this.model.relations()[peerName], this.logger) : undefined;
  }

  private publishIngress(config: CharmConfig): void {
    if (!this.model.isLeader()) {
      return;
    }
    const data = toIngressData(
      ingressRequirements(this.model.appName, config.external_hostname, config.external_port),
    );
    for (const instance of this.model.relations()[RELATION_NAMES.ingress] ?? []) {
      this.model.setLocalAppData(instance.name, instance.id, data);
    }
  }

  private setStatus(status: UnitStatus): UnitStatus {
    this.model.setStatus(status);
    return status;
  }
}
