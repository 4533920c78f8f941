import {
  levelAtLeast,
  type BackfillSummary,
  type CatalogIssue,
  type ConfigFailure,
  type Diagnostic,
  type DiagnosticLevel,
} from '@appsource/core';

export type OutputMode = 'json' | 'human';
const OUTPUT_SCHEMA_VERSION = '1.0.0';

export interface InitOutput {
  path: string;
  name: string;
  identifier: string;
}

export interface UpdateOutput {
  path: string;
  appsUpdated: number;
  appsAdded: number;
  newsAdded: number;
  failures: ConfigFailure[];
  backfill?: BackfillSummary;
  overridesApplied: string[];
}

export interface AddOutput {
  path: string;
  added: boolean;
  appID?: string;
  name?: string;
  version?: string;
  reason?: string;
}

export interface BackfillOutput extends BackfillSummary {
  path: string;
}

export interface ValidateOutput {
  path: string;
  valid: boolean;
  apps: number;
  issues: CatalogIssue[];
}

export interface ConfigOutput {
  path: string;
  githubToken?: string;
  requestTimeoutMs?: number;
  retries?: number;
}

export interface CommandOutputs {
  init: InitOutput;
  update: UpdateOutput;
  add: AddOutput;
  backfill: BackfillOutput;
  validate: ValidateOutput;
  config: ConfigOutput;
}

export type CommandName = keyof CommandOutputs;

function bulletList(items: string[]) {
  return items.map((item) => `- ${item}`).join('\n');
}

function plural(count: number, noun: string) {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

const humanRenderers: { [C in CommandName]: (data: CommandOutputs[C]) => string } = {
  init: (data) => `Created ${data.name} (${data.identifier}) at ${data.path}`,
  update: renderUpdateHuman,
  add: (data) =>
    data.added
      ? `Added ${data.name ?? data.appID ?? 'app'} ${data.version ?? ''}`.trimEnd()
      : `Not added: ${data.reason ?? 'unknown reason'}`,
  backfill: (data) =>
    `Backfill of ${data.path}: ${data.enriched} enriched, ${data.skipped} skipped, ${data.failed} failed`,
  validate: renderValidateHuman,
  config: (data) =>
    [
      `config: ${data.path}`,
      `github token: ${data.githubToken ?? 'unset'}`,
      `timeout: ${data.requestTimeoutMs === undefined ? 'default' : `${data.requestTimeoutMs}ms`}`,
      `retries: ${data.retries ?? 'default'}`,
    ].join('\n'),
};

function renderUpdateHuman(data: UpdateOutput) {
  const lines = [
    `Updated ${data.path}`,
    `${plural(data.appsUpdated, 'app')} updated, ${plural(data.appsAdded, 'app')} added, ${plural(
      data.newsAdded,
      'news article',
    )} added`,
  ];
  if (data.backfill) {
    lines.push(`backfill: ${data.backfill.enriched} enriched, ${data.backfill.failed} failed`);
  }
  if (data.overridesApplied.length > 0) {
    lines.push(`overrides: ${data.overridesApplied.join(', ')}`);
  }
  if (data.failures.length > 0) {
    lines.push(
      `${plural(data.failures.length, 'source')} failed:`,
      bulletList(data.failures.map((failure) => `#${failure.index} ${failure.kind ?? '?'} [${failure.code}] ${failure.message}`)),
    );
  }
  return lines.join('\n');
}

function renderValidateHuman(data: ValidateOutput) {
  const header = data.valid
    ? `${data.path} is valid (${plural(data.apps, 'app')})`
    : `${data.path} is invalid (${plural(data.apps, 'app')})`;
  if (data.issues.length === 0) {
    return header;
  }
  return [header, bulletList(data.issues.map((issue) => `${issue.severity}: ${issue.path}: ${issue.message}`))].join(
    '\n',
  );
}

export function renderOutput<C extends CommandName>(command: C, data: CommandOutputs[C], mode: OutputMode) {
  if (mode === 'json') {
    return JSON.stringify(
      {
        ok: true,
        schema_version: OUTPUT_SCHEMA_VERSION,
        command,
        data,
      },
      null,
      2,
    );
  }

  const render: (data: CommandOutputs[C]) => string = humanRenderers[command];
  return render(data);
}

/** One line per diagnostic at or above `threshold`: JSON lines, or `[appsource] level evt: msg`. */
export function renderDiagnostics(entries: readonly Diagnostic[], mode: OutputMode, threshold: DiagnosticLevel) {
  return entries
    .filter((entry) => levelAtLeast(entry.level, threshold))
    .map((entry) => (mode === 'json' ? JSON.stringify(entry) : `[appsource] ${entry.level} ${entry.evt}: ${entry.msg}`));
}
