import { existsSync } from 'node:fs';
import { Command } from 'commander';
import {
  appIdentity,
  catalogIssues,
  createCollaborators,
  Diagnostics,
  isCatalogValid,
  latestVersion,
  SourceManager,
  type Collaborators,
  type DiagnosticLevel,
  type RuntimeOptions,
} from '@appsource/core';
import { getConfigPath, maskedToken, readConfig, resolveRuntimeConfig, updateConfig } from './config.js';
import { CliError, EXIT_INVALID_CATALOG } from './errors.js';
import { renderDiagnostics, renderOutput, type CommandName, type CommandOutputs, type OutputMode } from './output.js';
import { loadSources } from './sources.js';

interface GlobalOptions {
  json?: boolean;
  human?: boolean;
  logLevel?: string;
  githubToken?: string;
  timeout?: string;
  retries?: string;
}

export interface ProgramDeps {
  createCollaborators: (options: RuntimeOptions) => Collaborators;
}

const LOG_LEVELS: readonly DiagnosticLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is DiagnosticLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function pickOutputMode(options: GlobalOptions): OutputMode {
  if (options.human) {
    return 'human';
  }
  if (options.json) {
    return 'json';
  }
  if (!process.stdout.isTTY) {
    return 'json';
  }
  return 'human';
}

function pickLogLevel(options: GlobalOptions): DiagnosticLevel {
  const level = (options.logLevel ?? 'info').toLowerCase();
  if (!isLogLevel(level)) {
    throw new CliError('VALIDATION_ERROR', `--log-level must be one of: ${LOG_LEVELS.join(', ')}`, 1);
  }
  return level;
}

function printData<C extends CommandName>(command: C, data: CommandOutputs[C], mode: OutputMode) {
  console.log(renderOutput(command, data, mode));
}

interface Session {
  mode: OutputMode;
  diagnostics: Diagnostics;
  collaborators: Collaborators;
}

/**
 * Resolves the runtime config for one command and writes whatever the core
 * recorded to stderr once the action settles, failed or not.
 */
async function withSession(command: Command, deps: ProgramDeps, action: (session: Session) => Promise<void>) {
  const global = command.parent?.opts<GlobalOptions>() ?? {};
  const mode = pickOutputMode(global);
  const threshold = pickLogLevel(global);
  const runtime = resolveRuntimeConfig({
    githubToken: global.githubToken,
    timeout: global.timeout,
    retries: global.retries,
  });
  const diagnostics = new Diagnostics();

  try {
    await action({ mode, diagnostics, collaborators: deps.createCollaborators(runtime) });
  } finally {
    for (const line of renderDiagnostics(diagnostics.all(), mode, threshold)) {
      console.error(line);
    }
  }
}

export function createProgram(deps: ProgramDeps = { createCollaborators }) {
  const program = new Command();

  program
    .name('appsource')
    .description('Maintain app source catalogs from release feeds and other catalogs')
    .version(process.env.npm_package_version ?? '0.1.0')
    .option('--json', 'Render machine-parseable JSON output')
    .option('--human', 'Render human-readable output')
    .option('--log-level <level>', 'Lowest diagnostic level written to stderr (debug|info|warn|error)', 'info')
    .option('--github-token <token>', 'Token for the GitHub API and release uploads')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds')
    .option('--retries <n>', 'Retries for failed requests');

  program.addHelpText(
    'after',
    '\nDefault output is human-readable in TTY and JSON when piped/non-interactive.\nEnv overrides: `APPSOURCE_GITHUB_TOKEN` (or `GITHUB_TOKEN`), `APPSOURCE_REQUEST_TIMEOUT_MS`, `APPSOURCE_RETRIES`.',
  );

  program
    .command('init <catalog>')
    .description('Create an empty catalog file')
    .requiredOption('--name <name>', 'Catalog name')
    .requiredOption('--identifier <identifier>', 'Catalog identifier, e.g. com.example.source')
    .option('--force', 'Overwrite an existing file')
    .action(
      async (path: string, options: { name: string; identifier: string; force?: boolean }, command: Command) => {
        await withSession(command, deps, async ({ mode, diagnostics, collaborators }) => {
          if (existsSync(path) && !options.force) {
            throw new CliError('CATALOG_EXISTS', `${path} already exists; pass --force to overwrite it`, 1, { path });
          }

          const manager = SourceManager.create(
            { name: options.name, identifier: options.identifier },
            path,
            { collaborators, diagnostics },
          );
          await manager.save();
          printData('init', { path, name: options.name, identifier: options.identifier }, mode);
        });
      },
    );

  program
    .command('update <catalog>')
    .description('Pull new versions from every configured source and save the catalog')
    .requiredOption('--sources <file>', 'Sources file (path or URL)')
    .option('--compact', 'Write the catalog without whitespace')
    .option('--full', 'Keep fields this tool does not know about')
    .option('--no-backfill', 'Skip hashing versions that have no sha256')
    .option('--no-enrich', 'Do not hash or inspect newly accepted versions')
    .action(
      async (
        path: string,
        options: { sources: string; compact?: boolean; full?: boolean; backfill: boolean; enrich: boolean },
        command: Command,
      ) => {
        await withSession(command, deps, async ({ mode, diagnostics, collaborators }) => {
          const manager = await SourceManager.open(path, { collaborators, diagnostics });
          const sources = await loadSources(options.sources, collaborators.documents);

          const summary = await manager.runUpdate(sources.sources, { enrich: options.enrich });
          const backfill = options.backfill ? await manager.backfillHashesAndPermissions() : undefined;
          const overridesApplied = sources.overrides ? manager.applyManualOverrides(sources.overrides) : [];
          await manager.save(path, { pretty: !options.compact, fullDocument: options.full });

          printData(
            'update',
            {
              path,
              appsUpdated: summary.appsUpdated,
              appsAdded: summary.appsAdded,
              newsAdded: summary.newsAdded,
              failures: summary.failures,
              backfill,
              overridesApplied,
            },
            mode,
          );
        });
      },
    );

  program
    .command('add <catalog>')
    .description('Add an app built from a package file')
    .requiredOption('--url <downloadURL>', 'Where users download the package')
    .option('--package <path>', 'Local copy of the package (otherwise it is downloaded)')
    .option('--name <name>', 'App name')
    .option('--developer <name>', 'Developer name')
    .option('--description <text>', 'App description')
    .option('--icon <url>', 'Icon URL')
    .action(
      async (
        path: string,
        options: { url: string; package?: string; name?: string; developer?: string; description?: string; icon?: string },
        command: Command,
      ) => {
        await withSession(command, deps, async ({ mode, diagnostics, collaborators }) => {
          const manager = await SourceManager.open(path, { collaborators, diagnostics });
          const app = await manager.buildAppFromPackage(options.url, options.package, {
            name: options.name,
            developerName: options.developer,
            localizedDescription: options.description,
            iconURL: options.icon,
          });

          const result = manager.addApp(app);
          if (!result.added) {
            throw new CliError('APP_NOT_ADDED', result.reason, 1, { appID: appIdentity(app) });
          }
          await manager.save();
          printData(
            'add',
            { path, added: true, appID: appIdentity(app), name: app.name, version: latestVersion(app)?.version },
            mode,
          );
        });
      },
    );

  program
    .command('backfill <catalog>')
    .description('Hash versions and read permissions that are not in the catalog yet')
    .option('--all', 'Every version, not only the latest of each app')
    .option('--force', 'Recompute values that are already present')
    .action(async (path: string, options: { all?: boolean; force?: boolean }, command: Command) => {
      await withSession(command, deps, async ({ mode, diagnostics, collaborators }) => {
        const manager = await SourceManager.open(path, { collaborators, diagnostics });
        const summary = await manager.backfillHashesAndPermissions(!options.all, options.force ?? false);
        await manager.save();
        printData('backfill', { path, ...summary }, mode);
      });
    });

  program
    .command('validate <catalog>')
    .description('Report missing keys and unknown privacy categories')
    .action(async (path: string, _options: unknown, command: Command) => {
      await withSession(command, deps, async ({ mode, diagnostics, collaborators }) => {
        const manager = await SourceManager.open(path, { collaborators, diagnostics });
        const valid = isCatalogValid(manager.catalog);
        const issues = catalogIssues(manager.catalog);
        printData('validate', { path, valid, apps: manager.catalog.apps.length, issues }, mode);

        if (!valid) {
          throw new CliError('CATALOG_INVALID', `${path} is not a valid catalog`, EXIT_INVALID_CATALOG, {
            errors: issues.filter((issue) => issue.severity === 'error').length,
          });
        }
      });
    });

  program
    .command('config')
    .description('Store --github-token, --timeout and --retries in the user config file')
    .action((_options: unknown, command: Command) => {
      const global = command.parent?.opts<GlobalOptions>() ?? {};
      const path = getConfigPath();
      const hasUpdates = [global.githubToken, global.timeout, global.retries].some((value) => value !== undefined);
      const config = hasUpdates
        ? updateConfig({ githubToken: global.githubToken, timeout: global.timeout, retries: global.retries }, path)
        : readConfig(path);

      printData(
        'config',
        {
          path,
          githubToken: config.githubToken ? maskedToken(config.githubToken) : undefined,
          requestTimeoutMs: config.requestTimeoutMs,
          retries: config.retries,
        },
        pickOutputMode(global),
      );
    });

  return program;
}
