import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { resolveRegistryAuth } from './registryAuth.js';

describe('resolveRegistryAuth', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'stackwright-auth-'));
    configPath = join(dir, 'config.json');
    writeFileSync(configPath, JSON.stringify({
      auths: {
        'registry.local:5000': { auth: Buffer.from('deployer:test-secret').toString('base64') },
        'https://index.docker.io/v1/': { auth: Buffer.from('hubuser:hub-secret').toString('base64') },
      },
    }));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('prefers explicit credentials', () => {
    expect(resolveRegistryAuth('registry.local:5000/shop/api:1.0', { username: 'ci', password: 'test-secret' }, configPath))
      .toEqual({ username: 'ci', password: 'test-secret', serveraddress: 'registry.local:5000' });
  });

  it('reads the matching auths entry of the docker config', () => {
    expect(resolveRegistryAuth('registry.local:5000/shop/api:1.0', null, configPath))
      .toEqual({ username: 'deployer', password: 'test-secret', serveraddress: 'registry.local:5000' });
  });

  it('uses the Docker Hub entry for unqualified images', () => {
    expect(resolveRegistryAuth('postgres:16', { username: '', password: '' }, configPath))
      .toEqual({ username: 'hubuser', password: 'hub-secret', serveraddress: 'https://index.docker.io/v1/' });
  });

  it('returns undefined when nothing matches', () => {
    expect(resolveRegistryAuth('ghcr.io/acme/app', null, configPath)).toBeUndefined();
    expect(resolveRegistryAuth('postgres', null, join(dir, 'missing.json'))).toBeUndefined();
  });
});
