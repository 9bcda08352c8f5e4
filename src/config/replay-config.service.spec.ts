import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ReplayConfigService } from './replay-config.service';
import { StockLimitPolicy } from './replay-config';
import { InvalidConfigError } from '../common/errors/replay.errors';

describe('ReplayConfigService', () => {
  let dir: string;
  let missing: string;

  const writeConfig = (content: string): string => {
    const path = join(dir, 'config.json');
    writeFileSync(path, content, 'utf-8');
    return path;
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'replay-config-'));
    missing = join(dir, 'missing.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should use defaults without a config file or environment', () => {
    const config = new ReplayConfigService({ env: {}, configFile: missing }).get();

    expect(config.initialCapital).toBe(2000000);
    expect(config.maxStocks).toBe(20);
    expect(config.stockLimitPolicy).toBe(StockLimitPolicy.WARN);
    expect(config.inputDir).toBe('input');
    expect(config.outputDir).toBe('output');
    expect(config.port).toBe(3000);
  });

  it('should read and convert environment variables', () => {
    const config = new ReplayConfigService({
      env: { INITIAL_CAPITAL: '500000', MAX_STOCKS: '5', STOCK_LIMIT_POLICY: 'cap', PORT: '8080' },
      configFile: missing,
    }).get();

    expect(config.initialCapital).toBe(500000);
    expect(config.maxStocks).toBe(5);
    expect(config.stockLimitPolicy).toBe(StockLimitPolicy.CAP);
    expect(config.port).toBe(8080);
  });

  it('should layer the environment over the config file', () => {
    const configFile = writeConfig(JSON.stringify({ initialCapital: 750000, maxStocks: 10, outputDir: 'reports' }));

    const config = new ReplayConfigService({ env: { MAX_STOCKS: '15' }, configFile }).get();

    expect(config.initialCapital).toBe(750000);
    expect(config.maxStocks).toBe(15);
    expect(config.outputDir).toBe('reports');
  });

  it('should find the config file through REPLAY_CONFIG', () => {
    const configFile = writeConfig(JSON.stringify({ maxStocks: 4 }));

    expect(new ReplayConfigService({ env: { REPLAY_CONFIG: configFile } }).get().maxStocks).toBe(4);
  });

  it('should ignore unknown keys in the config file', () => {
    const configFile = writeConfig(JSON.stringify({ maxStocks: 4, theme: 'dark' }));

    expect(new ReplayConfigService({ env: {}, configFile }).get().maxStocks).toBe(4);
  });

  it('should reject a config file that is not a JSON object', () => {
    expect(() => new ReplayConfigService({ env: {}, configFile: writeConfig('{ not json') })).toThrow(InvalidConfigError);
    expect(() => new ReplayConfigService({ env: {}, configFile: writeConfig('[1, 2]') })).toThrow(
      `Config file ${join(dir, 'config.json')} must contain a JSON object`,
    );
  });

  it('should reject nested values', () => {
    const configFile = writeConfig(JSON.stringify({ maxStocks: { value: 4 } }));

    expect(() => new ReplayConfigService({ env: {}, configFile })).toThrow(
      `Config key "maxStocks" in ${configFile} must be a string or a number`,
    );
  });

  it.each<[NodeJS.ProcessEnv, RegExp]>([
    [{ MAX_STOCKS: '0' }, /maxStocks/],
    [{ MAX_STOCKS: '2.5' }, /maxStocks/],
    [{ INITIAL_CAPITAL: '-1' }, /initialCapital/],
    [{ INITIAL_CAPITAL: 'lots' }, /initialCapital/],
    [{ STOCK_LIMIT_POLICY: 'sometimes' }, /stockLimitPolicy/],
  ])('should fail fast on %j', (env, pattern) => {
    expect(() => new ReplayConfigService({ env, configFile: missing })).toThrow(pattern);
  });

  describe('applyOverrides', () => {
    it('should put explicit overrides on top and skip undefined ones', () => {
      const service = new ReplayConfigService({ env: { INITIAL_CAPITAL: '500000', MAX_STOCKS: '5' }, configFile: missing });

      const config = service.applyOverrides({ maxStocks: 3, initialCapital: undefined });

      expect(config.maxStocks).toBe(3);
      expect(config.initialCapital).toBe(500000);
      expect(service.get()).toBe(config);
    });

    it('should validate overrides', () => {
      const service = new ReplayConfigService({ env: {}, configFile: missing });

      expect(() => service.applyOverrides({ maxStocks: 0 })).toThrow(InvalidConfigError);
    });
  });
});
