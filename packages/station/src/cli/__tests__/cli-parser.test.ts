/**
 * CLI Parser Tests
 */

import { parseCliArgs } from '../cli-parser';

describe('CLI Parser', () => {
  describe('parseCliArgs', () => {
    it('returns default values when no arguments provided', () => {
      expect(parseCliArgs([])).toEqual({
        command: null,
        rawCommand: null,
        options: {},
        positionals: [],
        configPath: null,
      });
    });

    it('parses the command, options and positionals', () => {
      const result = parseCliArgs(['attach', '38.7_-9.1/active/slug', 'beach.JPG', 'selfie.png', '--verbose']);

      expect(result).toEqual({
        command: 'attach',
        rawCommand: 'attach',
        options: { verbose: 'true' },
        positionals: ['38.7_-9.1/active/slug', 'beach.JPG', 'selfie.png'],
        configPath: null,
      });
    });

    it('parses --key=value with spaces and equals signs in the value', () => {
      const result = parseCliArgs(['create', '--title=Road closed', '--body=a=b', '--lat=-9.5']);

      expect(result.options).toEqual({ title: 'Road closed', body: 'a=b', lat: '-9.5' });
    });

    it('accepts options before the command', () => {
      const result = parseCliArgs(['--config=/tmp/c.json', 'list', '--state=expired']);

      expect(result.command).toBe('list');
      expect(result.configPath).toBe('/tmp/c.json');
      expect(result.options).toEqual({ state: 'expired' });
    });

    it('keeps an unknown command as raw only', () => {
      const result = parseCliArgs(['frobnicate']);

      expect(result.command).toBeNull();
      expect(result.rawCommand).toBe('frobnicate');
    });

    it('ignores a bare -- and an empty --config=', () => {
      const result = parseCliArgs(['--', '--config=', 'sweep']);

      expect(result.command).toBe('sweep');
      expect(result.configPath).toBeNull();
      expect(result.options).toEqual({});
    });
  });
});
