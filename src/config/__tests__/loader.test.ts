import { describe, it, expect, afterEach } from 'vitest';
import { loadConfig, resolveConfigPath } from '../loader.js';
import { ConfigError } from '../../shared/errors.js';
import { writeFileSync, mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

const VALID_CONFIG = `
version: 1
token: "test-token"

gateway:
  url: "wss://gateway.example.test"
  shardCount: 2
  intents:
    - GUILDS
    - GUILD_MESSAGES

rest:
  baseUrl: "https://api.example.test/v10"
  maxRateLimitMs: 60000

settings:
  logLevel: debug
  statusPort: 3430
`;

const dirs: string[] = [];

function writeTempConfig(content: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'shardwire-test-'));
  dirs.push(dir);
  const path = join(dir, 'config.yaml');
  writeFileSync(path, content, 'utf-8');
  return path;
}

afterEach(() => {
  for (const dir of dirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

describe('loadConfig', () => {
  it('loads a valid config and fills in defaults', () => {
    const config = loadConfig(writeTempConfig(VALID_CONFIG), {});

    expect(config.token).toBe('test-token');
    expect(config.gateway).toMatchObject({
      url: 'wss://gateway.example.test',
      version: 10,
      compression: 'zlib-stream',
      intents: ['GUILDS', 'GUILD_MESSAGES'],
      largeThreshold: 250,
      shardCount: 2,
      startDelayMs: 5000,
      restartWindowMs: 30000,
      reconnectDelayMs: 5000,
      backoff: { base: 1.85, maximumMs: 600000, jitterRatio: 0.1 },
    });
    expect(config.rest).toEqual({
      baseUrl: 'https://api.example.test/v10',
      maxRateLimitMs: 60000,
      maxRetries: 5,
      requestTimeoutMs: 30000,
      gcPollMs: 20000,
      gcExpireMs: 10000,
    });
    expect(config.settings).toEqual({ logLevel: 'debug', statusPort: 3430 });
  });

  it('fills in every optional section', () => {
    const config = loadConfig(
      writeTempConfig('version: 1\ntoken: "test-token"\ngateway:\n  intents: [GUILDS]\n'),
      {},
    );

    expect(config.gateway.url).toBeUndefined();
    expect(config.rest.baseUrl).toBe('https://discord.com/api/v10');
    expect(config.settings).toEqual({ logLevel: 'info' });
  });

  it('lets SHARDWIRE_TOKEN override the token in the file', () => {
    const config = loadConfig(writeTempConfig(VALID_CONFIG), { SHARDWIRE_TOKEN: 'env-token' });

    expect(config.token).toBe('env-token');
  });

  it('accepts a file without a token when SHARDWIRE_TOKEN is set', () => {
    const path = writeTempConfig('version: 1\ngateway:\n  intents: [GUILDS]\n');

    expect(loadConfig(path, { SHARDWIRE_TOKEN: 'env-token' }).token).toBe('env-token');
    expect(() => loadConfig(path, {})).toThrow(ConfigError);
  });

  it('throws ConfigError for a missing file', () => {
    expect(() => loadConfig('/nonexistent/shardwire/config.yaml', {})).toThrow(
      'Config file not found: /nonexistent/shardwire/config.yaml',
    );
  });

  it('throws ConfigError for invalid YAML', () => {
    const path = writeTempConfig('version: 1\ngateway: [unclosed\n');

    expect(() => loadConfig(path, {})).toThrow(/Failed to parse YAML/);
  });

  it('throws ConfigError naming an unknown intent', () => {
    const path = writeTempConfig(VALID_CONFIG.replace('- GUILD_MESSAGES', '- GUILD_MESAGES'));

    expect(() => loadConfig(path, {})).toThrow(/Unknown gateway intent/);
  });

  it('rejects shard ids outside the shard count', () => {
    const path = writeTempConfig(VALID_CONFIG.replace('shardCount: 2', 'shardCount: 2\n  shardIds: [0, 2]'));

    expect(() => loadConfig(path, {})).toThrow(/gateway.shardIds must all be below gateway.shardCount/);
  });

  it('rejects an unsupported version', () => {
    const path = writeTempConfig(VALID_CONFIG.replace('version: 1', 'version: 2'));

    expect(() => loadConfig(path, {})).toThrow(ConfigError);
  });
});

describe('resolveConfigPath', () => {
  it('prefers the --config argument', () => {
    expect(resolveConfigPath(['node', 'main.js', '--config', '/etc/shardwire.yaml'], { CONFIG_PATH: '/x.yaml' })).toBe(
      '/etc/shardwire.yaml',
    );
  });

  it('falls back to CONFIG_PATH and then the default', () => {
    expect(resolveConfigPath(['node', 'main.js'], { CONFIG_PATH: '/x.yaml' })).toBe('/x.yaml');
    expect(resolveConfigPath(['node', 'main.js'], {})).toBe('./config/config.yaml');
  });
});
