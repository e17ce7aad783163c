import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import type { RegistryAuth } from '../runtime/types.js';
import { DOCKER_HUB_REGISTRY, parseImageReference } from './imageReference.js';
import { engineLogger } from '../lib/logger.js';

const DockerConfigSchema = z.object({
  auths: z.record(z.string(), z.object({ auth: z.string().optional() }).passthrough()).optional(),
});

export interface RegistryCredentials {
  username: string;
  password: string;
}

/**
 * Credentials for pulling `image`: explicit credentials first, then the
 * matching `auths` entry of a Docker client config file, otherwise none.
 */
export function resolveRegistryAuth(
  image: string,
  explicit: RegistryCredentials | null,
  dockerConfigPath: string | null
): RegistryAuth | undefined {
  const registry = parseImageReference(image).registry;
  const serveraddress = registry ?? DOCKER_HUB_REGISTRY;

  if (explicit && explicit.username && explicit.password) {
    return { username: explicit.username, password: explicit.password, serveraddress };
  }

  if (!dockerConfigPath || !existsSync(dockerConfigPath)) {
    return undefined;
  }

  let parsed: z.infer<typeof DockerConfigSchema>;
  try {
    parsed = DockerConfigSchema.parse(JSON.parse(readFileSync(dockerConfigPath, 'utf-8')));
  } catch (err) {
    engineLogger.warn({ err, dockerConfigPath }, 'Ignoring unreadable docker config');
    return undefined;
  }

  const auths = parsed.auths ?? {};
  const candidates = registry
    ? [registry, `https://${registry}`, `http://${registry}`]
    : [DOCKER_HUB_REGISTRY, 'index.docker.io', 'docker.io', 'https://index.docker.io/v1'];

  for (const key of candidates) {
    const encoded = auths[key]?.auth;
    if (!encoded) continue;
    const decoded = Buffer.from(encoded, 'base64').toString('utf-8');
    const sep = decoded.indexOf(':');
    if (sep <= 0) continue;
    return { username: decoded.slice(0, sep), password: decoded.slice(sep + 1), serveraddress };
  }

  return undefined;
}
