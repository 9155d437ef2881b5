import { promises as fs } from 'fs';
import { join } from 'path';
import { LogLevel, resolveStoreConfig, type AlertStore } from '@geoalerts/shared';
import type { ResolvedStationConfig } from '../../config/manager';
import { NodeFileSystemAdapter } from '../../storage/node-fs-adapter';
import { parseCliArgs } from '../cli-parser';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, USAGE, runCommand, type CommandContext } from '../commands';
import {
  EXAMPLE_PATH,
  FAST_RETRY,
  FakeFileWatcher,
  MemoryLogger,
  createNodeStore,
  makeTempDir,
  removeDir,
} from '../../__tests__/test-utils';

const EXPIRED_PATH = '38.7_-9.1/expired/2025-12-14_15-32_test-alert-with-photos';

const CREATE_ARGS = [
  'create',
  '--title=Test Alert With Photos',
  '--lat=38.7223',
  '--lon=-9.1393',
  '--created=2025-12-14T15:32:07Z',
  '--body=Road blocked',
];

describe('runCommand', () => {
  let dir: string;
  let store: AlertStore;
  let lines: string[];
  let ctx: CommandContext;

  function configFor(alertsRoot: string): ResolvedStationConfig {
    return {
      alertsRoot,
      deviceId: 'X13K0G',
      logLevel: LogLevel.Info,
      inboxPath: join(dir, 'inbox'),
      store: resolveStoreConfig(FAST_RETRY),
    };
  }

  async function run(...argv: string[]): Promise<number> {
    lines.length = 0;
    return runCommand(parseCliArgs(argv), ctx);
  }

  beforeEach(async () => {
    dir = await makeTempDir('commands-test');
    store = createNodeStore(join(dir, 'alerts'));
    lines = [];
    ctx = {
      store,
      fs: new NodeFileSystemAdapter(),
      config: configFor(join(dir, 'alerts')),
      logger: new MemoryLogger(),
      out: (line) => lines.push(line),
      now: () => new Date('2025-12-20T00:00:00Z'),
    };
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should create, attach and comment', async () => {
    await fs.writeFile(join(dir, 'beach.JPG'), 'jpeg');
    await fs.writeFile(join(dir, 'selfie.png'), 'png');

    expect(await run(...CREATE_ARGS)).toBe(EXIT_OK);
    expect(lines).toEqual([EXAMPLE_PATH]);

    expect(await run('attach', EXAMPLE_PATH, join(dir, 'beach.JPG'), join(dir, 'selfie.png'))).toBe(EXIT_OK);
    expect(lines).toEqual([`${EXAMPLE_PATH}/images/photo1.jpg`, `${EXAMPLE_PATH}/images/photo2.png`]);

    expect(await run('comment', EXAMPLE_PATH, '--body=Still blocked', '--created=2025-12-14T21:15:23Z')).toBe(EXIT_OK);
    expect(lines).toEqual(['2025-12-14_21-15-23_X13K0G.txt']);
  });

  it('should show a record', async () => {
    await run(...CREATE_ARGS, '--ttl=3600');
    await run('comment', EXAMPLE_PATH, '--body=Still blocked', '--created=2025-12-14T21:15:23Z', '--author=B22');

    expect(await run('show', EXAMPLE_PATH)).toBe(EXIT_OK);
    expect(lines).toEqual([
      `path: ${EXAMPLE_PATH}`,
      'title: Test Alert With Photos',
      'created: 2025-12-14T15:32:07.000Z',
      'coordinates: 38.7223, -9.1393',
      'author: X13K0G',
      'state: active',
      'ttl: 3600',
      '',
      'Road blocked',
      '',
      'attachments: (none)',
      'comments: 1',
      '  2025-12-14T21:15:23.000Z B22: Still blocked',
    ]);
  });

  it('should list, expire and sweep', async () => {
    await run(...CREATE_ARGS);
    await run(...CREATE_ARGS.map((arg) => (arg.startsWith('--title=') ? '--title=Second' : arg)));

    expect(await run('list')).toBe(EXIT_OK);
    expect(lines).toEqual(['38.7_-9.1/active/2025-12-14_15-32_second', EXAMPLE_PATH]);

    expect(await run('expire', EXAMPLE_PATH, '--close')).toBe(EXIT_OK);
    expect(lines).toEqual([EXPIRED_PATH]);

    expect(await run('list', '--state=expired')).toBe(EXIT_OK);
    expect(lines).toEqual([EXPIRED_PATH]);

    expect(await run('sweep', '--now=2026-06-01T00:00:00Z')).toBe(EXIT_OK);
    expect(lines).toEqual(['expired 38.7_-9.1/expired/2025-12-14_15-32_second']);
  });

  it('should export payload files that another device can apply', async () => {
    await run(...CREATE_ARGS);
    await fs.writeFile(join(dir, 'beach.JPG'), 'jpeg');
    await run('attach', EXAMPLE_PATH, join(dir, 'beach.JPG'));
    const outbox = join(dir, 'outbox');

    expect(await run('export', EXAMPLE_PATH, `--out=${outbox}`)).toBe(EXIT_OK);
    const exported = [...lines];
    expect(exported).toEqual([
      '38.7_-9.1.2025-12-14_15-32_test-alert-with-photos.0001.record.payload.json',
      '38.7_-9.1.2025-12-14_15-32_test-alert-with-photos.0002.attachment.payload.json',
    ]);
    const header: unknown = JSON.parse(await fs.readFile(join(outbox, exported[0] ?? ''), 'utf-8')).header;
    expect(header).toEqual({ originDeviceId: 'X13K0G', sentAt: '2025-12-20T00:00:00.000Z' });

    const other = createNodeStore(join(dir, 'other'));
    ctx = { ...ctx, store: other, config: configFor(join(dir, 'other')) };
    expect(await run('apply', ...exported.map((name) => join(outbox, name)))).toBe(EXIT_OK);
    expect(lines).toEqual([`written ${EXAMPLE_PATH}/manifest.txt`, `written ${EXAMPLE_PATH}/images/photo1.jpg`]);
    expect(await other.records.buildTree(EXAMPLE_PATH)).toEqual(await store.records.buildTree(EXAMPLE_PATH));
  });

  it('should export same-slug records from different buckets side by side', async () => {
    const created = '--created=2025-12-14T15:32:00Z';
    expect(await run('create', '--title=Fire', '--lat=38.72', '--lon=-9.13', created)).toBe(EXIT_OK);
    expect(await run('create', '--title=Fire', '--lat=41.15', '--lon=-8.61', created)).toBe(EXIT_OK);
    const outbox = join(dir, 'outbox');

    await run('export', '38.7_-9.1/active/2025-12-14_15-32_fire', `--out=${outbox}`);
    await run('export', '41.1_-8.6/active/2025-12-14_15-32_fire', `--out=${outbox}`);

    expect((await fs.readdir(outbox)).sort()).toEqual([
      '38.7_-9.1.2025-12-14_15-32_fire.0001.record.payload.json',
      '41.1_-8.6.2025-12-14_15-32_fire.0001.record.payload.json',
    ]);
  });

  it('should report failed payloads', async () => {
    const file = join(dir, 'orphan.payload.json');
    await fs.writeFile(file, JSON.stringify({ path: EXAMPLE_PATH, kind: 'comment', filename: 'bad name.txt', bytes: '' }));

    expect(await run('apply', file)).toBe(EXIT_FAILURE);
    expect(lines).toEqual([`failed ${file}: Invalid comment name: bad name.txt`]);
  });

  it('should run the inbox watcher until shutdown', async () => {
    const watcher = new FakeFileWatcher();
    ctx = { ...ctx, createWatcher: () => watcher, waitForShutdown: () => Promise.resolve() };

    expect(await run('watch')).toBe(EXIT_OK);
    expect(lines).toEqual([]);
    expect(watcher.path).toBeNull();
    expect((await fs.stat(join(dir, 'inbox'))).isDirectory()).toBe(true);
  });

  describe('errors', () => {
    it('should print usage for a missing or unknown command', async () => {
      expect(await run()).toBe(EXIT_USAGE);
      expect(lines).toEqual([USAGE]);

      expect(await run('frobnicate')).toBe(EXIT_USAGE);
      expect(lines[0]).toBe(
        'Unknown command: frobnicate. Expected one of create, attach, comment, expire, sweep, show, list, export, apply, watch'
      );
    });

    it('should report usage errors with exit code 2', async () => {
      expect(await run('create', '--lat=1', '--lon=2')).toBe(EXIT_USAGE);
      expect(lines).toEqual(['create: --title=<value> is required', USAGE]);

      expect(await run('create', '--title=x', '--lat=north', '--lon=2')).toBe(EXIT_USAGE);
      expect(lines[0]).toBe('create: --lat must be a number, got "north"');

      expect(await run('list', '--state=archived')).toBe(EXIT_USAGE);
      expect(lines[0]).toBe('list: --state must be active or expired, got "archived"');

      expect(await run('watch')).toBe(EXIT_USAGE);
      expect(lines[0]).toBe('watch: watch is not available in this context');
    });

    it('should report store errors with their kind', async () => {
      expect(await run('create', '--title=x', '--lat=91', '--lon=0')).toBe(EXIT_FAILURE);
      expect(lines).toEqual(['error: InvalidCoordinates: Invalid coordinates: 91, 0']);

      expect(await run('show', EXAMPLE_PATH)).toBe(EXIT_FAILURE);
      expect(lines).toEqual([`error: NotFound: No record at ${EXAMPLE_PATH}`]);
    });
  });
});
