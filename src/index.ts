#!/usr/bin/env node
/**
 * devshelf - CLI Entry Point
 *
 * Scans project folders, merges what every machine has reported and writes
 * a single dashboard page. Optionally serves it through a local relay.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as path from 'path';
import { loadSettings, type Settings } from './config/settings.js';
import { describeError, isConfigError } from './errors.js';
import { parseRemoteUrl, identityKey, identityWebUrl } from './catalog/remote-identity.js';
import {
  discoverLocal,
  generateDashboard,
  syncMachineState,
  renderCatalog,
  renderGenerateSummary,
  renderScanResults,
  renderWarnings,
  PinStore,
  startServer,
  type GeneratePhase,
  type GenerateResult,
} from './dashboard/index.js';

const PHASE_TEXT: Record<GeneratePhase, string> = {
  scan: 'Scanning project folders...',
  remote: 'Listing remote repositories...',
  merge: 'Merging machine state...',
  render: 'Rendering dashboard...',
  write: 'Writing dashboard...',
};

interface GlobalOptions {
  config?: string;
}

interface ServeOptions {
  port?: string;
  open: boolean;
}

const program = new Command();

program
  .name('devshelf')
  .description('Catalog of your projects across folders, machines and remotes')
  .version('1.0.0')
  .option('-c, --config <path>', 'Config file (default ~/.devshelf/config.json)');

function settingsFor(command: Command): Settings {
  const options = command.optsWithGlobals<GlobalOptions>();
  return loadSettings({ configPath: options.config });
}

function parsePort(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

async function generateWithSpinner(settings: Settings): Promise<GenerateResult> {
  const spinner = ora({ text: PHASE_TEXT.scan, color: 'cyan' }).start();
  try {
    const result = await generateDashboard(settings, {
      onPhase: phase => {
        spinner.text = PHASE_TEXT[phase];
      },
    });
    spinner.stop();
    return result;
  } catch (error) {
    spinner.stop();
    throw error;
  }
}

async function serve(settings: Settings, initial: GenerateResult, options: ServeOptions): Promise<void> {
  const server = await startServer({
    settings,
    initial,
    port: parsePort(options.port),
    openBrowser: options.open,
  });

  console.log(chalk.green(`\n  Dashboard running at ${chalk.bold(server.url)}`));
  console.log(chalk.gray('  Press Ctrl+C to stop\n'));

  process.once('SIGINT', () => {
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(chalk.red(`Error stopping server: ${describeError(error)}`));
        process.exit(1);
      },
    );
  });
}

/**
 * Generate the dashboard (default command)
 */
program
  .option('-s, --serve', 'Serve the dashboard through the local relay after generating')
  .option('-p, --port <port>', 'Relay port')
  .option('--no-open', "Don't open a browser when serving")
  .action(async (options: ServeOptions & { serve?: boolean }, command: Command) => {
    const settings = settingsFor(command);
    const result = await generateWithSpinner(settings);

    console.log(renderWarnings(result.warnings));
    console.log(renderGenerateSummary(result.outputPath, result.entries));

    if (options.serve) {
      await serve(settings, result, options);
    }
  });

/**
 * List local projects without writing anything
 */
program
  .command('scan')
  .description('Scan the configured roots and list the projects found')
  .action((_options: object, command: Command) => {
    const settings = settingsFor(command);
    const catalog = discoverLocal(settings);

    for (const project of catalog.projects) {
      const { record } = project;
      const origin = project.identity ? chalk.gray(identityKey(project.identity)) : chalk.gray('(no remote)');
      console.log(`  ${chalk.white.bold(record.title)} ${chalk.gray(`[${record.id}]`)}`);
      console.log(`    ${chalk.cyan(record.localPath)}`);
      console.log(`    ${origin}`);
    }

    console.log(renderWarnings(catalog.warnings));
    console.log(renderScanResults(catalog.records.length, catalog.scanned, catalog.skipped));
  });

/**
 * Rewrite this machine's state document only
 */
program
  .command('sync')
  .description("Rewrite this machine's state document in the shared state directory")
  .action((_options: object, command: Command) => {
    const settings = settingsFor(command);
    const result = syncMachineState(settings);
    const repos = Object.keys(result.document.repos).length;

    console.log(renderWarnings(result.warnings));
    console.log(chalk.green(`✓ ${result.document.machineName}: ${repos} repositor${repos === 1 ? 'y' : 'ies'} recorded`));
    console.log(chalk.gray(`  ${path.join(settings.stateDir, `${settings.machineId}.json`)}\n`));
  });

/**
 * Generate, then serve through the relay
 */
program
  .command('serve')
  .description('Generate the dashboard and serve it on localhost')
  .action(async (_options: object, command: Command) => {
    // --port and --no-open are program options, so they are accepted after "serve" too
    const options = command.optsWithGlobals<ServeOptions>();
    const settings = settingsFor(command);
    const result = await generateWithSpinner(settings);
    console.log(renderWarnings(result.warnings));
    console.log(renderCatalog(result.entries, result.machines));
    await serve(settings, result, options);
  });

/**
 * Toggle a pin
 */
program
  .command('pin <path>')
  .description('Pin or unpin a project on the dashboard')
  .action((projectPath: string, _options: object, command: Command) => {
    const settings = settingsFor(command);
    const pinned = new PinStore(settings.pinnedFile).toggle(projectPath);
    const resolved = path.resolve(projectPath);
    console.log(pinned ? chalk.green(`Pinned: ${resolved}`) : chalk.yellow(`Unpinned: ${resolved}`));
  });

/**
 * Show the canonical identity of a remote URL
 */
program
  .command('identity <url>')
  .description('Show the canonical identity of a remote URL')
  .action((url: string) => {
    const identity = parseRemoteUrl(url);
    if (!identity) {
      console.log(chalk.red(`Unrecognized remote URL: ${url}`));
      process.exitCode = 1;
      return;
    }
    console.log(chalk.white.bold(identityKey(identity)));
    console.log(chalk.gray(`  ${identityWebUrl(identity)}`));
  });

program.parseAsync().catch((error: unknown) => {
  if (isConfigError(error)) {
    console.error(chalk.red(`\n  ${error.message}\n`));
    process.exit(2);
  }
  console.error(chalk.red(`\n  Error: ${describeError(error)}\n`));
  process.exit(1);
});
