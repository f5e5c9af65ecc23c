import type { Server } from 'node:http';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { z } from 'zod';
import { logger as rootLogger, type EventBus } from '@autopilot/shared-utils';
import type { AutomationEvent } from './types/events';

const logger = rootLogger.child('ws');

/** The part of a socket the hub needs; `ws` sockets satisfy it. */
export interface EventSocket {
  readonly readyState: number;
  send(data: string): void;
}

const OPEN = 1;

const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('subscribe'), task_id: z.string().min(1).optional() }),
  z.object({ type: z.literal('unsubscribe'), task_id: z.string().min(1).optional() }),
  z.object({ type: z.literal('ping') }),
]);

interface Subscription {
  allTasks: boolean;
  tasks: Set<string>;
}

/**
 * Fans task events out to WebSocket clients. A client receives events of the
 * tasks it subscribed to, or of every task after a subscribe without
 * `task_id`.
 */
export class TaskEventHub {
  private clients = new Map<EventSocket, Subscription>();
  private detach: () => void;

  constructor(events: EventBus<AutomationEvent>) {
    this.detach = events.subscribeAll(event => this.broadcast(event));
  }

  get clientCount(): number {
    return this.clients.size;
  }

  connect(socket: EventSocket): void {
    this.clients.set(socket, { allTasks: false, tasks: new Set() });
    this.send(socket, {
      type: 'connected',
      message: 'Connected to automation service',
      timestamp: new Date().toISOString(),
    });
    logger.info('WebSocket client connected');
  }

  disconnect(socket: EventSocket): void {
    if (this.clients.delete(socket)) {
      logger.info('WebSocket client disconnected');
    }
  }

  handleMessage(socket: EventSocket, raw: string): void {
    const subscription = this.clients.get(socket);
    if (!subscription) {
      return;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      this.send(socket, { type: 'error', message: 'Invalid message format' });
      return;
    }

    const parsed = ClientMessageSchema.safeParse(payload);
    if (!parsed.success) {
      const type = typeof payload === 'object' && payload !== null && 'type' in payload ? String(payload.type) : 'none';
      this.send(socket, { type: 'error', message: `Unknown message type: ${type}` });
      return;
    }

    const message = parsed.data;
    switch (message.type) {
      case 'subscribe':
        if (message.task_id) {
          subscription.tasks.add(message.task_id);
        } else {
          subscription.allTasks = true;
        }
        this.send(socket, { type: 'subscribed', task_id: message.task_id ?? null });
        logger.debug(`Client subscribed to ${message.task_id ?? 'all tasks'}`);
        break;
      case 'unsubscribe':
        if (message.task_id) {
          subscription.tasks.delete(message.task_id);
        } else {
          subscription.allTasks = false;
          subscription.tasks.clear();
        }
        this.send(socket, { type: 'unsubscribed', task_id: message.task_id ?? null });
        break;
      case 'ping':
        this.send(socket, { type: 'pong', timestamp: new Date().toISOString() });
        break;
    }
  }

  broadcast(event: AutomationEvent): void {
    for (const [socket, subscription] of this.clients) {
      if (subscription.allTasks || subscription.tasks.has(event.task_id)) {
        this.send(socket, { type: 'event', event });
      }
    }
  }

  close(): void {
    this.detach();
    this.clients.clear();
  }

  private send(socket: EventSocket, message: Record<string, unknown>): void {
    if (socket.readyState !== OPEN) {
      return;
    }
    try {
      socket.send(JSON.stringify(message));
    } catch (error) {
      logger.warn('Failed to send WebSocket message', error);
    }
  }
}

function decode(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

/** Serve the hub on `path` of an existing HTTP server. */
export function attachWebSocket(server: Server, hub: TaskEventHub, path = '/ws'): WebSocketServer {
  const wss = new WebSocketServer({ server, path });

  wss.on('connection', (socket: WebSocket) => {
    hub.connect(socket);
    socket.on('message', (data: RawData) => hub.handleMessage(socket, decode(data)));
    socket.on('close', () => hub.disconnect(socket));
    socket.on('error', error => {
      logger.warn('WebSocket client error', error);
      hub.disconnect(socket);
    });
  });

  return wss;
}
