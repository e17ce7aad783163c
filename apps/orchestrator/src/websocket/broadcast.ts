import type { Server as SocketServer } from 'socket.io';
import type { HealthSnapshot, OperationEvent } from '@stackwright/shared';

/**
 * WebSocket instance holder and broadcast utilities.
 * Kept apart from index.ts so services can broadcast without importing the server setup.
 */

let io: SocketServer | null = null;

export function environmentRoom(environmentId: string): string {
  return `env:${environmentId}`;
}

export function operationRoom(operationId: string): string {
  return `operation:${operationId}`;
}

export function setIo(server: SocketServer | null): void {
  io = server;
}

export function getIo(): SocketServer {
  if (!io) {
    throw new Error('WebSocket server not initialized');
  }
  return io;
}

/**
 * Send an operation event to clients watching its environment or the
 * operation itself. A client in both rooms receives it once.
 */
export function broadcastOperationEvent(event: OperationEvent): void {
  if (!io) return;
  const name = event.type === 'progress' ? 'operation:progress' : 'operation:completed';
  io.to([environmentRoom(event.environmentId), operationRoom(event.operationId)]).emit(name, event);
}

export function broadcastHealthSnapshot(snapshot: HealthSnapshot): void {
  if (!io) return;
  io.to(environmentRoom(snapshot.environmentId)).emit('health:snapshot', snapshot);
}
