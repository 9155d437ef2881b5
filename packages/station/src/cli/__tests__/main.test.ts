import { promises as fs } from 'fs';
import { join } from 'path';
import { LogLevel } from '@geoalerts/shared';
import { getLogger } from '../../telemetry/logger';
import { main } from '../main';
import { EXAMPLE_PATH, makeTempDir, removeDir } from '../../__tests__/test-utils';

describe('main', () => {
  let dir: string;
  let configPath: string;
  let stdout: jest.SpyInstance;

  beforeEach(async () => {
    dir = await makeTempDir('main-test');
    configPath = join(dir, 'config.json');
    await fs.writeFile(
      configPath,
      JSON.stringify({ alertsRoot: join(dir, 'alerts'), deviceId: 'X13K0G', logLevel: 'error' })
    );
    stdout = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await removeDir(dir);
  });

  it('should load the config file and run the command against its alerts root', async () => {
    const code = await main([
      `--config=${configPath}`,
      'create',
      '--title=Test Alert With Photos',
      '--lat=38.7223',
      '--lon=-9.1393',
      '--created=2025-12-14T15:32:00Z',
    ]);

    expect(code).toBe(0);
    expect(stdout).toHaveBeenCalledWith(`${EXAMPLE_PATH}\n`);
    expect(getLogger().getLevel()).toBe(LogLevel.Error);
    const manifest = await fs.readFile(join(dir, 'alerts', EXAMPLE_PATH, 'manifest.txt'), 'utf-8');
    expect(manifest.split('\n').slice(0, 5)).toEqual([
      '# ALERT: Test Alert With Photos',
      '',
      'CREATED: 2025-12-14T15:32:00Z',
      'AUTHOR: X13K0G',
      'COORDINATES: 38.7223,-9.1393',
    ]);
  });

  it('should return the usage exit code without a command', async () => {
    expect(await main([`--config=${configPath}`])).toBe(2);
  });
});
