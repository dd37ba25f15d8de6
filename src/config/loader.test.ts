import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigValidationError, loadConfig, substituteEnvVars } from './loader.js';
import { DEFAULT_CONFIG } from './types.js';

describe('loadConfig', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'scan-config-test-'));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    delete process.env.SCAN_TEST_RAGGED;
    await rm(testDir, { recursive: true, force: true });
  });

  async function writeConfig(content: string): Promise<string> {
    const path = join(testDir, 'config.yaml');
    await writeFile(path, content);
    return path;
  }

  it('returns defaults when the file is missing', async () => {
    const config = await loadConfig({ configPath: join(testDir, 'missing.yaml') });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('merges file values over defaults', async () => {
    const configPath = await writeConfig([
      'server:',
      '  port: 4000',
      '  cors:',
      '    origins: ["http://localhost:5173"]',
      'scans:',
      '  previewRows: 3',
      '  tempDir: /tmp/scans',
    ].join('\n'));
    const config = await loadConfig({ configPath });
    expect(config.server.port).toBe(4000);
    expect(config.server.host).toBe('0.0.0.0');
    expect(config.server.cors).toEqual({ enabled: true, origins: ['http://localhost:5173'] });
    expect(config.scans).toEqual({
      markerPolicy: 'discard',
      raggedPolicy: 'reject',
      previewRows: 3,
      maxFiles: 20,
      tempDir: '/tmp/scans',
    });
  });

  it('substitutes environment variables and defaults', async () => {
    process.env.SCAN_TEST_RAGGED = 'pad';
    const configPath = await writeConfig([
      'scans:',
      '  raggedPolicy: ${SCAN_TEST_RAGGED}',
      '  markerPolicy: ${SCAN_TEST_MARKER_UNSET:-require}',
    ].join('\n'));
    const config = await loadConfig({ configPath });
    expect(config.scans.raggedPolicy).toBe('pad');
    expect(config.scans.markerPolicy).toBe('require');
  });

  it('treats an empty file as all defaults', async () => {
    const configPath = await writeConfig('');
    expect(await loadConfig({ configPath })).toEqual(DEFAULT_CONFIG);
  });

  it('rejects an unknown ragged policy', async () => {
    const configPath = await writeConfig('scans:\n  raggedPolicy: sometimes\n');
    const error = await loadConfig({ configPath }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConfigValidationError);
    expect(error).toMatchObject({ path: 'scans.raggedPolicy', value: 'sometimes' });
  });

  it('rejects a port out of range', async () => {
    const configPath = await writeConfig('server:\n  port: 70000\n');
    await expect(loadConfig({ configPath })).rejects.toThrow(
      "Config validation error at 'server.port': port must be a number between 1 and 65535"
    );
  });
});

describe('substituteEnvVars', () => {
  it('leaves plain strings alone', () => {
    expect(substituteEnvVars('no variables here')).toBe('no variables here');
  });

  it('uses the default when the variable is unset', () => {
    expect(substituteEnvVars('${SCAN_TEST_NOT_SET:-fallback}/scans')).toBe('fallback/scans');
  });
});
