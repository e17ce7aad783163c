/**
 * Dashboard client connections. Clients join rooms per environment or per
 * operation and receive progress and health events for them.
 */

import type { Socket } from 'socket.io';
import { wsLogger } from '../lib/logger.js';
import type { OperationStatus } from '../services/stackOperations.js';
import { environmentRoom, operationRoom } from './broadcast.js';
import { SubscriptionSchema, validateClientEvent, type ValidatedSubscription } from './subscriptionValidation.js';

export interface SubscriptionLookup {
  hasEnvironment(environmentId: string): boolean;
  getOperation(operationId: string): OperationStatus | null;
}

const clients = new Set<Socket>();

export function getDashboardClientCount(): number {
  return clients.size;
}

function roomsFor(data: ValidatedSubscription): string[] {
  const rooms: string[] = [];
  if (data.environmentId) rooms.push(environmentRoom(data.environmentId));
  if (data.operationId) rooms.push(operationRoom(data.operationId));
  return rooms;
}

export function handleDashboardClient(socket: Socket, clientIp: string, lookup: SubscriptionLookup): void {
  clients.add(socket);
  wsLogger.info({ clientIp, totalClients: clients.size }, 'Dashboard client connected');
  socket.emit('connect_ack', { connected: true });

  socket.on('subscribe', async (rawData: unknown) => {
    const data = validateClientEvent(SubscriptionSchema, rawData, 'subscribe', clientIp);
    if (!data) {
      socket.emit('subscription:error', { message: 'Invalid subscription request' });
      return;
    }
    if (data.environmentId && !lookup.hasEnvironment(data.environmentId)) {
      socket.emit('subscription:error', { message: `Unknown environment: ${data.environmentId}` });
      return;
    }

    const rooms = roomsFor(data);
    await socket.join(rooms);
    socket.emit('subscribed', { rooms });

    // Late subscribers get the events they missed
    if (data.operationId) {
      const status = lookup.getOperation(data.operationId);
      if (status) {
        socket.emit('operation:status', status);
      }
    }
  });

  socket.on('unsubscribe', async (rawData: unknown) => {
    const data = validateClientEvent(SubscriptionSchema, rawData, 'unsubscribe', clientIp);
    if (!data) return;
    for (const room of roomsFor(data)) {
      await socket.leave(room);
    }
  });

  socket.on('disconnect', (reason) => {
    clients.delete(socket);
    wsLogger.debug({ clientIp, reason, totalClients: clients.size }, 'Dashboard client disconnected');
  });
}

export function cleanupDashboardClients(): void {
  clients.clear();
}
