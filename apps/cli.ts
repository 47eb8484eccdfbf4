#!/usr/bin/env node
/**
 * gunicorn-operator CLI
 */

import { program } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { exit, argv } from 'node:process';
import { createLogger, type Logger } from '../src/lib/logger';
import { errorMessage, isOperatorError } from '../src/lib/errors';
import {
  containerName,
  createSettings,
  loadConfigOptions,
  loadMetadata,
} from '../src/config';
import { createDeploymentApi, createDeploymentWorkload } from '../src/infrastructure/kubernetes';
import { loadUnitState, parseUnitState } from '../src/infrastructure/model';
import { EXIT_CODES, runReconcile, runRender, type CommandIO } from './commands';

// apps/ in development, dist/apps/ once built
const packageJsonPath = __dirname.includes('dist')
  ? join(__dirname, '../../package.json')
  : join(__dirname, '../package.json');
const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
const version =
  typeof packageJson === 'object' &&
  packageJson !== null &&
  'version' in packageJson &&
  typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

const settings = createSettings();

// Lazy logger creation to avoid opening stderr on --help
let _logger: Logger | undefined;
function getLogger(): Logger {
  if (!_logger) {
    _logger = createLogger({ name: 'cli', level: settings.logLevel, toStderr: true });
  }
  return _logger;
}

const io: CommandIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

const parseList = (value: string): string[] =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

interface RenderCliOptions {
  template?: string;
  state?: string;
  require?: string[];
  charmDir: string;
}

interface ReconcileCliOptions {
  state: string;
  deployment?: string;
  namespace: string;
  kubeconfig?: string;
  dryRun?: boolean;
  charmDir: string;
}

program
  .name('gunicorn-operator')
  .description('Render relation-driven environments for gunicorn workloads on Kubernetes')
  .version(version);

program
  .command('render')
  .description('render the environment template against relation data and print it as YAML')
  .option('-t, --template <file>', 'template file (default: the environment value in the state file)')
  .option('-s, --state <file>', 'unit state file with config and relation data')
  .option('-r, --require <relations>', 'comma separated relations that must be joined', parseList)
  .option('--charm-dir <dir>', 'directory holding metadata.yaml and config.yaml', settings.charmDir)
  .action((options: RenderCliOptions) => {
    const metadata = loadMetadata(join(options.charmDir, 'metadata.yaml'));
    const state = options.state ? loadUnitState(options.state) : parseUnitState('');
    const template = options.template ? readFileSync(options.template, 'utf-8') : undefined;

    exit(runRender({ metadata, state, template, require: options.require }, io, getLogger()));
  });

program
  .command('reconcile')
  .description('run a config-changed event for the unit and apply the result to its Deployment')
  .requiredOption('-s, --state <file>', 'unit state file with config and relation data')
  .option('-d, --deployment <name>', 'deployment to update (default: the application name)')
  .option('-n, --namespace <namespace>', 'namespace of the deployment', settings.kubernetes.namespace)
  .option('--kubeconfig <path>', 'kubeconfig file (default: standard loading rules)')
  .option('--dry-run', 'print the workload layer instead of applying it')
  .option('--charm-dir <dir>', 'directory holding metadata.yaml and config.yaml', settings.charmDir)
  .action(async (options: ReconcileCliOptions) => {
    const logger = getLogger();
    const metadata = loadMetadata(join(options.charmDir, 'metadata.yaml'));
    const configOptions = loadConfigOptions(join(options.charmDir, 'config.yaml'));
    const state = loadUnitState(options.state);

    const code = await runReconcile(
      {
        metadata,
        configOptions,
        state,
        dryRun: options.dryRun === true,
        createWorkload: () =>
          createDeploymentWorkload(
            createDeploymentApi(logger, options.kubeconfig ?? settings.kubernetes.kubeconfig),
            {
              namespace: options.namespace,
              deployment: options.deployment ?? state.app ?? metadata.name,
              container: containerName(metadata),
            },
            logger,
          ),
      },
      io,
      logger,
    );
    exit(code);
  });

program.parseAsync(argv).catch((error: unknown) => {
  if (isOperatorError(error)) {
    getLogger().error({ error: error.toJSON() }, error.message);
  } else {
    getLogger().error({ error: errorMessage(error) }, 'Command failed');
  }
  io.stderr(`Error: ${errorMessage(error)}\n`);
  exit(EXIT_CODES.error);
});
