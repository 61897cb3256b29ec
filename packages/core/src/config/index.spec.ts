import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  ConfigNotFoundError,
  findConfigPath,
  loadConfigModule,
  resolveConfigPath,
} from './index.js';

describe('config-loader (core)', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), 'stackwatch-core-config-'));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('resolves the provided configuration path when present', async () => {
    const customConfigPath = path.join(workspace, 'custom.config.json');
    await writeJsonConfig(customConfigPath, {});

    const resolved = await resolveConfigPath({ cwd: workspace, configPath: 'custom.config.json' });

    expect(resolved).toBe(customConfigPath);
  });

  it('allows overriding search candidates while still honouring configPath', async () => {
    const customConfigPath = path.join(workspace, 'custom.config.json');
    await writeJsonConfig(customConfigPath, {});

    const resolved = await resolveConfigPath({
      cwd: workspace,
      configPath: 'custom.config.json',
      candidates: ['stackwatch.config.js'],
    });

    expect(resolved).toBe(customConfigPath);
  });

  it('discovers default configuration files when no override is provided', async () => {
    const defaultConfigPath = path.join(workspace, 'stackwatch.config.json');
    await writeJsonConfig(defaultConfigPath, {});

    const resolved = await resolveConfigPath({ cwd: workspace });

    expect(resolved).toBe(defaultConfigPath);
  });

  it('loads JSON configuration files', async () => {
    const configPath = path.join(workspace, 'stackwatch.config.json');
    await writeJsonConfig(configPath, { template: 'template.yaml' });

    const loaded = await loadConfigModule<{ template: string }>({ path: configPath });

    expect(loaded.path).toBe(configPath);
    expect(loaded.directory).toBe(workspace);
    expect(loaded.config.template).toBe('template.yaml');
  });

  it('reports a missing explicit configuration path', async () => {
    await expect(
      resolveConfigPath({ cwd: workspace, configPath: 'missing.config.json' }),
    ).rejects.toThrow('Configuration file not found: missing.config.json');
  });

  it('reports when no configuration can be discovered', async () => {
    await expect(resolveConfigPath({ cwd: workspace })).rejects.toThrow(
      'Unable to locate stackwatch configuration file in the current directory.',
    );
    await expect(resolveConfigPath({ cwd: workspace })).rejects.toBeInstanceOf(
      ConfigNotFoundError,
    );
  });

  it('prefers module configuration files over rc files', async () => {
    await writeFile(path.join(workspace, '.stackwatchrc.yaml'), 'template: rc.yaml\n', 'utf8');
    await writeJsonConfig(path.join(workspace, 'stackwatch.config.json'), {});

    await expect(findConfigPath({ cwd: workspace })).resolves.toBe(
      path.join(workspace, 'stackwatch.config.json'),
    );
  });

  it('loads YAML rc files', async () => {
    const configPath = path.join(workspace, '.stackwatchrc.yaml');
    await writeFile(configPath, 'template: infra/template.yaml\nignore:\n  - dist\n', 'utf8');

    await expect(findConfigPath({ cwd: workspace })).resolves.toBe(configPath);
    const loaded = await loadConfigModule({ path: configPath });
    expect(loaded.config).toEqual({ template: 'infra/template.yaml', ignore: ['dist'] });
  });

  it('reads the stackwatch key of package.json', async () => {
    const manifestPath = path.join(workspace, 'package.json');
    await writeJsonConfig(manifestPath, { name: 'app', stackwatch: { template: 'sam.yaml' } });

    await expect(findConfigPath({ cwd: workspace })).resolves.toBe(manifestPath);
    const loaded = await loadConfigModule<{ template: string }>({ path: manifestPath });
    expect(loaded.config).toEqual({ template: 'sam.yaml' });
  });

  it('skips a package.json without a stackwatch key', async () => {
    await writeJsonConfig(path.join(workspace, 'package.json'), { name: 'app' });

    await expect(findConfigPath({ cwd: workspace })).resolves.toBeUndefined();
  });

  it('reports a missing module path when loading', async () => {
    const missing = path.join(workspace, 'absent.config.json');

    await expect(loadConfigModule({ path: missing })).rejects.toThrow(
      `Configuration file not found at ${missing}`,
    );
  });

  it('returns undefined from findConfigPath when nothing is discovered', async () => {
    await expect(findConfigPath({ cwd: workspace })).resolves.toBeUndefined();
  });

  it('finds custom candidates', async () => {
    const configPath = path.join(workspace, 'watch.json');
    await writeJsonConfig(configPath, { template: 'template.yaml' });

    await expect(findConfigPath({ cwd: workspace, candidates: ['watch.json'] })).resolves.toBe(
      configPath,
    );
  });

  it('supports JavaScript modules exporting async factories', async () => {
    const configPath = path.join(workspace, 'stackwatch.config.mjs');
    await writeFile(
      configPath,
      String.raw`export const watchConfig = async () => ({
  greeting: 'hi',
});
`,
      'utf8',
    );

    const loaded = await loadConfigModule<{ greeting: string }>({ path: configPath });

    expect(loaded.path).toBe(configPath);
    expect(loaded.directory).toBe(workspace);
    expect(loaded.config.greeting).toBe('hi');
  });
});

async function writeJsonConfig(filePath: string, value: unknown): Promise<void> {
  await writeFile(filePath, JSON.stringify(value), 'utf8');
}
