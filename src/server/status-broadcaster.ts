import { EventEmitter } from 'events';
import { WebSocket } from 'ws';
import { StatusPayload } from '../interfaces/common';
import { Logger, silentLogger } from '../logging/logger';
import { errorMessage } from '../errors/agent-error';

export type EnvelopeType = 'STATUS_UPDATE' | 'ERROR';

export interface Envelope<T> {
  type: EnvelopeType;
  timestamp: string;
  payload: T;
}

export interface ErrorPayload {
  code: string;
  message: string;
  details: Record<string, unknown>;
}

/**
 * The part of a WebSocket the broadcaster relies on
 */
export interface StatusSocket {
  readonly readyState: number;
  send(data: string): void;
}

/**
 * Pushes status updates and error notices to WebSocket subscribers
 */
export class StatusBroadcaster {
  private clients: Set<StatusSocket> = new Set();

  constructor(
    private readonly statusSource: () => StatusPayload,
    private readonly logger: Logger = silentLogger,
    private readonly clock: () => number = Date.now
  ) {}

  /**
   * Broadcast on every status change of the given supervisor. Returns a detach function.
   */
  attach(supervisor: EventEmitter): () => void {
    const onStatusChanged = (): void => {
      this.broadcastStatus(this.statusSource());
    };
    supervisor.on('statusChanged', onStatusChanged);
    return () => {
      supervisor.off('statusChanged', onStatusChanged);
    };
  }

  addClient(socket: StatusSocket): void {
    this.clients.add(socket);
    this.logger.debug('WebSocket client added', { clients: this.clients.size });
    this.sendTo(socket, this.createEnvelope('STATUS_UPDATE', this.statusSource()));
  }

  removeClient(socket: StatusSocket): void {
    if (this.clients.delete(socket)) {
      this.logger.debug('WebSocket client removed', { clients: this.clients.size });
    }
  }

  broadcastStatus(status: StatusPayload): void {
    this.broadcast(this.createEnvelope('STATUS_UPDATE', status));
  }

  broadcastError(code: string, message: string, details: Record<string, unknown> = {}): void {
    const payload: ErrorPayload = { code, message, details };
    this.broadcast(this.createEnvelope('ERROR', payload));
  }

  get clientCount(): number {
    return this.clients.size;
  }

  createEnvelope<T>(type: EnvelopeType, payload: T): Envelope<T> {
    return {
      type,
      timestamp: new Date(this.clock()).toISOString(),
      payload
    };
  }

  private broadcast<T>(envelope: Envelope<T>): void {
    for (const socket of [...this.clients]) {
      this.sendTo(socket, envelope);
    }
  }

  private sendTo<T>(socket: StatusSocket, envelope: Envelope<T>): void {
    if (socket.readyState !== WebSocket.OPEN) {
      this.removeClient(socket);
      return;
    }

    try {
      socket.send(JSON.stringify(envelope));
    } catch (error) {
      this.logger.error('Error sending to WebSocket client', { error: errorMessage(error) });
      this.removeClient(socket);
    }
  }
}
