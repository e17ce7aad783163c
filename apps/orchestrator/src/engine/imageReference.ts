export const DOCKER_HUB_REGISTRY = 'https://index.docker.io/v1/';

export interface ImageReference {
  /** Repository including any registry host, without tag or digest */
  repository: string;
  tag: string;
  digest: string | null;
  /** Registry host, or null for Docker Hub */
  registry: string | null;
}

/**
 * Split `registry:5000/ns/app:1.2@sha256:...` into its parts. A colon only
 * introduces a tag when it appears after the last slash, so registry ports
 * are not mistaken for tags.
 */
export function parseImageReference(image: string, defaultTag = 'latest'): ImageReference {
  let rest = image.trim();
  let digest: string | null = null;

  const at = rest.indexOf('@');
  if (at !== -1) {
    digest = rest.slice(at + 1);
    rest = rest.slice(0, at);
  }

  let tag = defaultTag;
  const lastSlash = rest.lastIndexOf('/');
  const lastColon = rest.lastIndexOf(':');
  if (lastColon > lastSlash) {
    tag = rest.slice(lastColon + 1) || defaultTag;
    rest = rest.slice(0, lastColon);
  }

  const firstSlash = rest.indexOf('/');
  let registry: string | null = null;
  if (firstSlash !== -1) {
    const head = rest.slice(0, firstSlash);
    if (head.includes('.') || head.includes(':') || head === 'localhost') {
      registry = head;
    }
  }

  return { repository: rest, tag, digest, registry };
}

/**
 * Build the reference to pull. An explicit `version` overrides the tag
 * embedded in the image string.
 */
export function imageWithTag(image: string, version?: string): { image: string; tag: string; reference: string } {
  const parsed = parseImageReference(image);
  const tag = version ?? parsed.tag;
  const reference = parsed.digest && !version
    ? `${parsed.repository}@${parsed.digest}`
    : `${parsed.repository}:${tag}`;
  return { image: parsed.repository, tag, reference };
}
