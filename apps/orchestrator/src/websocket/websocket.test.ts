import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServer } from 'http';
import { io as connect, type Socket as ClientSocket } from 'socket.io-client';
import type { HealthSnapshot, ProgressEvent } from '@stackwright/shared';
import type { OperationStatus } from '../services/stackOperations.js';
import { broadcastHealthSnapshot, broadcastOperationEvent, createWebSocket, shutdownWebSocket } from './index.js';

const OPERATION_ID = '0b7c1a52-3f1e-4c55-9d0c-7a1f2e3d4c5b';

const runningDeploy: OperationStatus = {
  operationId: OPERATION_ID,
  kind: 'deploy',
  environmentId: 'edge-1',
  stackName: 'shop',
  state: 'running',
  startedAt: '2026-03-01T10:00:00.000Z',
  finishedAt: null,
  events: [],
  result: null,
};

function progress(environmentId: string, operationId: string): ProgressEvent {
  return {
    type: 'progress',
    operationId,
    environmentId,
    stackName: 'shop',
    step: 'api',
    phase: 'start',
    outcome: 'succeeded',
    message: 'Started shop_api',
    sequence: 3,
    timestamp: '2026-03-01T10:00:01.000Z',
  };
}

function snapshot(environmentId: string): HealthSnapshot {
  return {
    stackId: `${environmentId}/shop`,
    organizationId: null,
    environmentId,
    stackName: 'shop',
    operationMode: 'normal',
    currentVersion: '1.0.0',
    targetVersion: null,
    overallStatus: 'healthy',
    statusMessage: 'All components healthy',
    components: [],
    services: [],
    bus: null,
    infra: null,
    capturedAt: '2026-03-01T10:00:00.000Z',
  };
}

function next(client: ClientSocket, event: string): Promise<unknown> {
  return new Promise(resolve => {
    client.once(event, resolve);
  });
}

describe('dashboard websocket', () => {
  let client: ClientSocket;

  beforeEach(async () => {
    const httpServer = createServer();
    createWebSocket(httpServer, {
      hasEnvironment: id => id === 'edge-1' || id === 'edge-2',
      getOperation: id => (id === OPERATION_ID ? runningDeploy : null),
    });
    await new Promise<void>(resolve => httpServer.listen(0, '127.0.0.1', resolve));
    const address = httpServer.address();
    if (!address || typeof address === 'string') throw new Error('server is not listening on a port');

    client = connect(`http://127.0.0.1:${address.port}`, { transports: ['websocket'], forceNew: true });
    await next(client, 'connect_ack');
  });

  afterEach(async () => {
    client.disconnect();
    await shutdownWebSocket();
  });

  it('delivers progress for a subscribed environment', async () => {
    client.emit('subscribe', { environmentId: 'edge-1' });
    expect(await next(client, 'subscribed')).toEqual({ rooms: ['env:edge-1'] });

    const received = next(client, 'operation:progress');
    broadcastOperationEvent(progress('edge-1', '5d2e8f10-1111-4a22-8b33-444455556666'));

    expect(await received).toEqual(progress('edge-1', '5d2e8f10-1111-4a22-8b33-444455556666'));
  });

  it('only delivers health of subscribed environments', async () => {
    client.emit('subscribe', { environmentId: 'edge-1' });
    await next(client, 'subscribed');

    const received = next(client, 'health:snapshot');
    broadcastHealthSnapshot(snapshot('edge-2'));
    broadcastHealthSnapshot(snapshot('edge-1'));

    expect(await received).toEqual(snapshot('edge-1'));
  });

  it('sends the current status when subscribing to an operation', async () => {
    const status = next(client, 'operation:status');
    client.emit('subscribe', { operationId: OPERATION_ID });

    expect(await next(client, 'subscribed')).toEqual({ rooms: [`operation:${OPERATION_ID}`] });
    expect(await status).toEqual(runningDeploy);
  });

  it('rejects a payload without a target', async () => {
    client.emit('subscribe', {});

    expect(await next(client, 'subscription:error')).toEqual({ message: 'Invalid subscription request' });
  });

  it('rejects an unknown environment', async () => {
    client.emit('subscribe', { environmentId: 'nowhere' });

    expect(await next(client, 'subscription:error')).toEqual({ message: 'Unknown environment: nowhere' });
  });
});
