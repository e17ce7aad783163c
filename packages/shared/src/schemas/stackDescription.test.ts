import { describe, it, expect } from 'vitest';
import { StackDescriptionSchema, ServiceHealthCheckSchema, formatSchemaIssues } from './stackDescription.js';
import { encodeSwapInstructions } from '../types/swap.js';

const baseStack = {
  name: 'shop',
  version: '1.0.0',
  services: [
    { name: 'db', image: 'postgres:16' },
    { name: 'api', image: 'registry.local:5000/shop/api', dependsOn: ['db'], ports: ['8080:80'] },
  ],
};

describe('StackDescriptionSchema', () => {
  it('accepts a minimal stack', () => {
    const result = StackDescriptionSchema.safeParse(baseStack);
    expect(result.success).toBe(true);
  });

  it('rejects a stack without services', () => {
    const result = StackDescriptionSchema.safeParse({ ...baseStack, services: [] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatSchemaIssues(result.error)).toEqual(['services: A stack needs at least one service']);
    }
  });

  it('accepts the port mapping forms', () => {
    const ports = ['80', '8080:80', '127.0.0.1:5432:5432', '5353:53/udp', '9000-9002:9000-9002'];
    const result = StackDescriptionSchema.safeParse({
      ...baseStack,
      services: [{ name: 'web', image: 'nginx', ports }],
    });
    expect(result.success).toBe(true);
  });

  it('rejects malformed port mappings', () => {
    const result = StackDescriptionSchema.safeParse({
      ...baseStack,
      services: [{ name: 'web', image: 'nginx', ports: ['http:80'] }],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatSchemaIssues(result.error)).toEqual(['services.0.ports.0: Invalid port mapping']);
    }
  });

  it('rejects relative volume targets', () => {
    const result = StackDescriptionSchema.safeParse({
      ...baseStack,
      services: [{ name: 'db', image: 'postgres', volumes: { pgdata: 'var/lib/postgresql' } }],
    });
    expect(result.success).toBe(false);
  });

  it('rejects invalid environment variable names', () => {
    const result = StackDescriptionSchema.safeParse({
      ...baseStack,
      services: [{ name: 'db', image: 'postgres', env: { '1BAD': 'x' } }],
    });
    expect(result.success).toBe(false);
  });
});

describe('ServiceHealthCheckSchema', () => {
  it('requires an absolute path for http checks', () => {
    expect(ServiceHealthCheckSchema.safeParse({ type: 'http', path: 'health' }).success).toBe(false);
    expect(ServiceHealthCheckSchema.safeParse({ type: 'http', path: '/health', port: 8080 }).success).toBe(true);
  });

  it('rejects unknown check types', () => {
    expect(ServiceHealthCheckSchema.safeParse({ type: 'tcp' }).success).toBe(false);
  });
});

describe('encodeSwapInstructions', () => {
  it('omits optional entries that are not set', () => {
    expect(encodeSwapInstructions({
      oldContainer: 'stackwright',
      newContainer: 'stackwright-update',
      stopTimeoutSeconds: 30,
      readinessTimeoutMs: 60000,
      readinessUrl: null,
      statusPagePort: null,
    })).toEqual([
      'OLD_CONTAINER=stackwright',
      'NEW_CONTAINER=stackwright-update',
      'STOP_TIMEOUT_SECONDS=30',
      'READINESS_TIMEOUT_MS=60000',
    ]);
  });
});
