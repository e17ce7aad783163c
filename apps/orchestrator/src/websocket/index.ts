import type { Server as HttpServer } from 'http';
import { Server as SocketServer } from 'socket.io';
import { wsLogger } from '../lib/logger.js';
import { setIo, getIo, broadcastOperationEvent, broadcastHealthSnapshot } from './broadcast.js';
import { cleanupDashboardClients, handleDashboardClient, type SubscriptionLookup } from './dashboardClient.js';

export { getIo, broadcastOperationEvent, broadcastHealthSnapshot };

export function createWebSocket(httpServer: HttpServer, lookup: SubscriptionLookup): SocketServer {
  const io = new SocketServer(httpServer, {
    cors: {
      origin: '*',
      methods: ['GET', 'POST'],
    },
  });

  io.on('connection', (socket) => {
    const forwarded = socket.handshake.headers['x-forwarded-for'];
    const clientIp = (typeof forwarded === 'string' ? forwarded.split(',')[0].trim() : '') || socket.handshake.address;
    handleDashboardClient(socket, clientIp, lookup);
  });

  setIo(io);
  wsLogger.info('WebSocket server initialized');
  return io;
}

/**
 * Disconnect every client and close the Socket.io server.
 */
export async function shutdownWebSocket(): Promise<void> {
  let io: SocketServer;
  try {
    io = getIo();
  } catch {
    // Never initialized
    return;
  }

  io.emit('server:shutdown', { timestamp: new Date().toISOString() });
  cleanupDashboardClients();

  await new Promise<void>((resolve) => {
    io.close(() => {
      resolve();
    });
  });

  setIo(null);
}
