import { createServer, IncomingMessage, Server } from 'http';
import { AddressInfo } from 'net';
import { getRequestListener } from '@hono/node-server';
import { WebSocket, WebSocketServer } from 'ws';
import { Hono } from 'hono';
import { StateSupervisor } from '../interfaces/state-supervisor';
import { Logger, silentLogger } from '../logging/logger';
import { errorMessage } from '../errors/agent-error';
import { StatusBroadcaster } from './status-broadcaster';

export interface AgentServerOptions {
  host: string;
  port: number;
  app: Hono;
  supervisor: StateSupervisor;
  broadcaster: StatusBroadcaster;
  logger?: Logger;
  wsPath?: string;
}

/**
 * Binds the HTTP boundary and the WebSocket status feed to one Node server
 * and ties the supervisor's reconciliation loop to the server's lifetime.
 */
export class AgentServer {
  private server: Server | null = null;
  private wss: WebSocketServer | null = null;
  private readonly logger: Logger;
  private readonly wsPath: string;

  constructor(private readonly options: AgentServerOptions) {
    this.logger = options.logger ?? silentLogger;
    this.wsPath = options.wsPath ?? '/ws';
  }

  async start(): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('Agent server already started');
    }

    const server = createServer(getRequestListener(this.options.app.fetch));
    const wss = new WebSocketServer({ server, path: this.wsPath });
    wss.on('connection', (socket, request) => this.handleConnection(socket, request));
    wss.on('error', (error) => {
      this.logger.error('WebSocket server error', { error: errorMessage(error) });
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.server = server;
    this.wss = wss;
    this.options.supervisor.start();

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Agent server is not bound to a TCP port');
    }
    this.logger.info(`Agent listening on http://${address.address}:${address.port}`, { ws: this.wsPath });
    return address;
  }

  /**
   * Stop accepting requests, close subscribers and let in-flight reconciliation finish
   */
  async stop(): Promise<void> {
    await this.options.supervisor.stop();

    const { server, wss } = this;
    this.server = null;
    this.wss = null;

    if (wss) {
      for (const client of wss.clients) {
        client.close(1001, 'Agent shutting down');
      }
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }

    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      this.logger.info('Agent server stopped');
    }
  }

  private handleConnection(socket: WebSocket, request: IncomingMessage): void {
    const { broadcaster } = this.options;
    this.logger.debug('WebSocket connection opened', { remote: request.socket.remoteAddress });

    broadcaster.addClient(socket);

    socket.on('message', (data) => {
      this.logger.debug('WebSocket message received', { message: data.toString() });
    });
    socket.on('close', () => {
      broadcaster.removeClient(socket);
      this.logger.debug('WebSocket connection closed');
    });
    socket.on('error', (error) => {
      this.logger.error('WebSocket client error', { error: errorMessage(error) });
      broadcaster.removeClient(socket);
    });
  }
}
