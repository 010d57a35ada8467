import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_CONFIG,
  loadConfigFile,
  parseConfigYaml,
  resolveConfig
} from '../../../src/config/HarnessConfig';

describe('HarnessConfig', () => {
  describe('parseConfigYaml', () => {
    it('should map snake_case keys onto the configuration', () => {
      const yaml = [
        'run_type: client',
        'ip: 10.0.0.5:4000',
        'duration: 30',
        'tick_rate: 128',
        'send_rate: 32',
        'log_level: debug'
      ].join('\n');

      expect(parseConfigYaml(yaml)).toEqual({
        role: 'client',
        address: '10.0.0.5:4000',
        durationSeconds: 30,
        tickRate: 128,
        sendRate: 32,
        logLevel: 'debug'
      });
    });

    it('should treat an empty document as no overrides', () => {
      expect(parseConfigYaml('')).toEqual({});
    });

    it('should reject unknown keys and bad values', () => {
      expect(() => parseConfigYaml('port: 1')).toThrow('Unknown configuration key: port');
      expect(() => parseConfigYaml('run_type: relay')).toThrow('run_type must be "server" or "client"');
      expect(() => parseConfigYaml('duration: -5')).toThrow('duration must be a positive number');
      expect(() => parseConfigYaml('tick_rate: fast')).toThrow('tick_rate must be a positive number');
      expect(() => parseConfigYaml('log_level: loud')).toThrow('log_level must be one of debug, info, warn, error');
      expect(() => parseConfigYaml('ip: 25570')).toThrow('ip must be a string');
    });

    it('should reject documents that are not mappings', () => {
      expect(() => parseConfigYaml('- server\n- client')).toThrow('Configuration must be a mapping');
    });

    it('should wrap YAML syntax errors', () => {
      expect(() => parseConfigYaml('run_type: [server')).toThrow(/^Failed to parse YAML configuration: /);
    });
  });

  describe('loadConfigFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tick-consistency-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should read a configuration file', async () => {
      const file = path.join(dir, 'harness.yaml');
      await fs.writeFile(file, 'run_type: server\nduration: 5\n', 'utf8');

      await expect(loadConfigFile(file)).resolves.toEqual({ role: 'server', durationSeconds: 5 });
    });

    it('should name the file when loading fails', async () => {
      const file = path.join(dir, 'missing.yaml');

      await expect(loadConfigFile(file)).rejects.toThrow(`Failed to load configuration from ${file}`);
    });
  });

  describe('resolveConfig', () => {
    it('should fall back to defaults', () => {
      expect(resolveConfig()).toEqual({
        role: 'server',
        address: '127.0.0.1:25570',
        durationSeconds: 10,
        tickRate: 64,
        sendRate: 64,
        logLevel: 'info'
      });
      expect(resolveConfig()).not.toBe(DEFAULT_CONFIG);
    });

    it('should let later layers win', () => {
      const config = resolveConfig(
        { role: 'client', durationSeconds: 20 },
        { durationSeconds: 3, address: 'localhost:9000' }
      );

      expect(config.role).toBe('client');
      expect(config.durationSeconds).toBe(3);
      expect(config.address).toBe('localhost:9000');
    });

    it('should skip undefined values', () => {
      expect(resolveConfig({ tickRate: 30 }, { tickRate: undefined }).tickRate).toBe(30);
    });

    it('should validate the merged result', () => {
      expect(() => resolveConfig({ address: 'localhost' })).toThrow('Address must be in host:port form');
      expect(() => resolveConfig({ sendRate: 0 })).toThrow('send rate must be a positive number');
      expect(() => resolveConfig({ durationSeconds: Number.POSITIVE_INFINITY }))
        .toThrow('duration must be a positive number');
    });
  });
});
