/**
 * CLI commands
 *
 * Each command works on one device's AlertStore. Results go to `out`, one
 * line per item; diagnostics go to the logger.
 */

import { resolve, basename } from 'path';
import {
  isAlertStoreError,
  isLifecycleState,
  type AlertDraft,
  type AlertStore,
  type ApplyResult,
  type FileSystemAdapter,
  type FileWatcher,
  type Logger,
  type MetadataEntries,
  type SyncPayload,
  type SyncPoolMetricsCallbacks,
} from '@geoalerts/shared';
import type { ResolvedStationConfig } from '../config/manager';
import { InboxWatcher } from '../sync/inbox-watcher';
import { decodePayload, encodePayload, payloadFileName } from '../sync/payload-file';
import { COMMANDS, type CliArgs, type CommandName } from './cli-parser';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CommandContext {
  store: AlertStore;
  /** Used for reading input files and writing exports */
  fs: FileSystemAdapter;
  config: ResolvedStationConfig;
  logger: Logger;
  out: (line: string) => void;
  now?: () => Date;
  metrics?: SyncPoolMetricsCallbacks;
  /** Needed by `watch` */
  createWatcher?: () => FileWatcher;
  /** Needed by `watch`; resolves when the process should exit */
  waitForShutdown?: () => Promise<void>;
}

type CommandHandler = (args: CliArgs, ctx: CommandContext) => Promise<number>;

export const USAGE = [
  'Usage: geoalerts <command> [--config=path] [options]',
  '',
  '  create  --title= --lat= --lon= [--body=] [--ttl=seconds] [--signature=] [--created=iso] [--author=]',
  '  attach  <recordPath> <file>...',
  '  comment <recordPath> --body= [--author=] [--signature=] [--created=iso]',
  '  expire  <recordPath> [--close]',
  '  sweep   [--now=iso]',
  '  show    <recordPath>',
  '  list    [--state=active|expired]',
  '  export  <recordPath> --out=dir',
  '  apply   <payloadFile>...',
  '  watch   [--inbox=dir]',
].join('\n');

function requireOption(args: CliArgs, key: string): string {
  const value = args.options[key];
  if (value === undefined || value === '' || value === 'true') {
    throw new UsageError(`--${key}=<value> is required`);
  }
  return value;
}

function requirePositional(args: CliArgs, index: number, name: string): string {
  const value = args.positionals[index];
  if (value === undefined) {
    throw new UsageError(`<${name}> is required`);
  }
  return value;
}

function parseNumberOption(args: CliArgs, key: string): number {
  const raw = requireOption(args, key);
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new UsageError(`--${key} must be a number, got "${raw}"`);
  }
  return value;
}

function parseDateOption(args: CliArgs, key: string, fallback: () => Date): Date {
  const raw = args.options[key];
  if (raw === undefined) {
    return fallback();
  }
  const date = new Date(raw);
  if (Number.isNaN(date.getTime())) {
    throw new UsageError(`--${key} must be an ISO-8601 timestamp, got "${raw}"`);
  }
  return date;
}

function clock(ctx: CommandContext): () => Date {
  return ctx.now ?? (() => new Date());
}

function describeResult(result: ApplyResult): string {
  return result.conflictPath
    ? `${result.outcome} ${result.target} -> ${result.conflictPath}`
    : `${result.outcome} ${result.target}`;
}

const create: CommandHandler = async (args, ctx) => {
  const metadata: Array<readonly [string, string]> = [];
  const ttl = args.options['ttl'];
  if (ttl !== undefined) {
    if (!/^[1-9]\d*$/.test(ttl)) {
      throw new UsageError(`--ttl must be a positive number of seconds, got "${ttl}"`);
    }
    metadata.push(['ttl', ttl]);
  }

  const draft: AlertDraft = {
    title: requireOption(args, 'title'),
    createdAt: parseDateOption(args, 'created', clock(ctx)),
    coordinates: { lat: parseNumberOption(args, 'lat'), lon: parseNumberOption(args, 'lon') },
    authorDeviceId: args.options['author'] ?? ctx.config.deviceId,
    body: args.options['body'] ?? '',
    signature: args.options['signature'],
    metadata,
  };

  ctx.out(await ctx.store.records.create(draft));
  return EXIT_OK;
};

const attach: CommandHandler = async (args, ctx) => {
  const recordPath = requirePositional(args, 0, 'recordPath');
  const files = args.positionals.slice(1);
  if (files.length === 0) {
    throw new UsageError('at least one <file> is required');
  }

  // Sequential, so photo numbers follow argument order
  for (const file of files) {
    const bytes = await ctx.fs.readFile(resolve(file));
    const result = await ctx.store.attachments.attach(recordPath, basename(file), bytes);
    ctx.out(result.relativePath);
  }
  return EXIT_OK;
};

const comment: CommandHandler = async (args, ctx) => {
  const recordPath = requirePositional(args, 0, 'recordPath');
  const filename = await ctx.store.comments.append(recordPath, {
    createdAt: parseDateOption(args, 'created', clock(ctx)),
    authorCallsign: args.options['author'] ?? ctx.config.deviceId,
    body: requireOption(args, 'body'),
    signature: args.options['signature'],
  });
  ctx.out(filename);
  return EXIT_OK;
};

const expire: CommandHandler = async (args, ctx) => {
  const recordPath = requirePositional(args, 0, 'recordPath');
  const change =
    args.options['close'] === 'true'
      ? await ctx.store.lifecycle.close(recordPath)
      : await ctx.store.lifecycle.expire(recordPath);
  ctx.out(change.path);
  return EXIT_OK;
};

const sweep: CommandHandler = async (args, ctx) => {
  const result = await ctx.store.lifecycle.sweep(parseDateOption(args, 'now', clock(ctx)));
  for (const change of result.expired) {
    ctx.out(`expired ${change.path}`);
  }
  for (const failure of result.failures) {
    ctx.out(`failed ${failure.path}: ${failure.error.message}`);
  }
  return result.failures.length > 0 ? EXIT_FAILURE : EXIT_OK;
};

function formatMetadata(metadata: MetadataEntries): string[] {
  return metadata.map(([key, value]) => `${key}: ${value}`);
}

const show: CommandHandler = async (args, ctx) => {
  const recordPath = requirePositional(args, 0, 'recordPath');
  const record = await ctx.store.records.read(await ctx.store.records.locateOrThrow(recordPath, 'show'));
  const attachments = await ctx.store.attachments.list(record.path);
  const comments = await ctx.store.comments.list(record.path);

  ctx.out(`path: ${record.path}`);
  ctx.out(`title: ${record.title}`);
  ctx.out(`created: ${record.createdAt.toISOString()}`);
  ctx.out(`coordinates: ${record.coordinates.lat}, ${record.coordinates.lon}`);
  ctx.out(`author: ${record.authorDeviceId}`);
  ctx.out(`state: ${record.lifecycleState}`);
  formatMetadata(record.metadata).forEach((line) => ctx.out(line));
  ctx.out('');
  ctx.out(record.body);
  ctx.out('');
  ctx.out(`attachments: ${attachments.length > 0 ? attachments.join(', ') : '(none)'}`);
  ctx.out(`comments: ${comments.length}`);
  for (const entry of comments) {
    ctx.out(`  ${entry.createdAt.toISOString()} ${entry.authorCallsign}: ${entry.body}`);
  }
  return EXIT_OK;
};

const list: CommandHandler = async (args, ctx) => {
  const state = args.options['state'];
  if (state !== undefined && !isLifecycleState(state)) {
    throw new UsageError(`--state must be active or expired, got "${state}"`);
  }
  for (const path of await ctx.store.records.list(state)) {
    ctx.out(path);
  }
  return EXIT_OK;
};

const exportRecord: CommandHandler = async (args, ctx) => {
  const recordPath = requirePositional(args, 0, 'recordPath');
  const outDir = resolve(requireOption(args, 'out'));
  const sentAt = clock(ctx)().toISOString();

  const payloads = await ctx.store.records.exportPayloads(recordPath);
  await ctx.fs.mkdir(outDir);
  for (const [index, payload] of payloads.entries()) {
    const filename = payloadFileName(index, payload);
    const text = encodePayload({ ...payload, header: { originDeviceId: ctx.config.deviceId, sentAt } });
    await ctx.fs.writeFile(ctx.fs.joinPath(outDir, filename), new TextEncoder().encode(text));
    ctx.out(filename);
  }
  return EXIT_OK;
};

type Settled = { ok: true; result: ApplyResult } | { ok: false; error: unknown };

const apply: CommandHandler = async (args, ctx) => {
  if (args.positionals.length === 0) {
    throw new UsageError('at least one <payloadFile> is required');
  }

  const pool = ctx.store.createWorkerPool({ metrics: ctx.metrics });
  try {
    // Submit in argument order; the pool keeps that order per record
    const pending: Array<Promise<Settled>> = [];
    for (const file of args.positionals) {
      let payload: SyncPayload;
      try {
        const text = new TextDecoder().decode(await ctx.fs.readFile(resolve(file)));
        payload = decodePayload(text, basename(file));
      } catch (error) {
        pending.push(Promise.resolve<Settled>({ ok: false, error }));
        continue;
      }
      pending.push(
        pool.submit(payload).then(
          (result): Settled => ({ ok: true, result }),
          (error: unknown): Settled => ({ ok: false, error })
        )
      );
    }

    let failed = 0;
    for (const [index, settled] of (await Promise.all(pending)).entries()) {
      if (settled.ok) {
        ctx.out(describeResult(settled.result));
      } else {
        failed++;
        const message = settled.error instanceof Error ? settled.error.message : String(settled.error);
        ctx.out(`failed ${args.positionals[index] ?? ''}: ${message}`);
      }
    }
    return failed > 0 ? EXIT_FAILURE : EXIT_OK;
  } finally {
    await pool.stop();
  }
};

const watch: CommandHandler = async (args, ctx) => {
  const { createWatcher, waitForShutdown } = ctx;
  if (!createWatcher || !waitForShutdown) {
    throw new UsageError('watch is not available in this context');
  }

  const pool = ctx.store.createWorkerPool({ metrics: ctx.metrics });
  const inbox = new InboxWatcher({
    fs: ctx.fs,
    watcher: createWatcher(),
    pool,
    inboxPath: resolve(args.options['inbox'] ?? ctx.config.inboxPath),
    logger: ctx.logger,
  });

  try {
    const initial = await inbox.start();
    for (const outcome of initial) {
      if (outcome.status !== 'skipped') {
        ctx.out(`${outcome.status} ${outcome.filename}`);
      }
    }
    await waitForShutdown();
  } finally {
    await inbox.stop();
    await pool.stop();
  }
  return EXIT_OK;
};

const HANDLERS: Record<CommandName, CommandHandler> = {
  create,
  attach,
  comment,
  expire,
  sweep,
  show,
  list,
  export: exportRecord,
  apply,
  watch,
};

/**
 * Run the parsed command and return the process exit code
 */
export async function runCommand(args: CliArgs, ctx: CommandContext): Promise<number> {
  if (!args.command) {
    if (args.rawCommand) {
      ctx.out(`Unknown command: ${args.rawCommand}. Expected one of ${COMMANDS.join(', ')}`);
    }
    ctx.out(USAGE);
    return EXIT_USAGE;
  }

  try {
    return await HANDLERS[args.command](args, ctx);
  } catch (error) {
    if (error instanceof UsageError) {
      ctx.out(`${args.command}: ${error.message}`);
      ctx.out(USAGE);
      return EXIT_USAGE;
    }
    const err = error instanceof Error ? error : new Error(String(error));
    ctx.logger.error(`[CLI] ${args.command} failed`, err);
    ctx.out(isAlertStoreError(err) ? `error: ${err.kind}: ${err.message}` : `error: ${err.message}`);
    return EXIT_FAILURE;
  }
}
