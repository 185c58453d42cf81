import { io, type Socket } from 'socket.io-client';
import { logger } from './logger';

export type PushEventName = 'energy_update';

export interface PushChannel {
  connect(): void;
  subscribe(event: PushEventName, handler: (payload: unknown) => void): () => void;
  disconnect(): void;
}

export interface SocketPushChannelOptions {
  url?: string;
  path?: string;
}

/** Socket.IO connection shared by the whole page session. */
export const createSocketPushChannel = (opts: SocketPushChannelOptions = {}): PushChannel => {
  let socket: Socket | null = null;

  const ensureSocket = (): Socket => {
    if (socket) return socket;
    const options = { path: opts.path ?? '/socket.io', reconnection: true };
    const created = opts.url ? io(opts.url, options) : io(options);
    created.on('connect', () => logger.event('Push channel connected', created.id));
    created.on('disconnect', (reason) => logger.event('Push channel disconnected', reason));
    created.on('connect_error', (err) => logger.warn('Push channel connection error', err.message));
    socket = created;
    return created;
  };

  return {
    connect() {
      ensureSocket();
    },
    subscribe(event, handler) {
      const s = ensureSocket();
      s.on(event, handler);
      return () => {
        s.off(event, handler);
      };
    },
    disconnect() {
      socket?.disconnect();
      socket = null;
    },
  };
};
