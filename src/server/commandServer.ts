/**
 * Command Server - HTTP + WebSocket front for the command language
 *
 * Exposes sessions through:
 * - REST API for session management and running commands
 * - WebSocket for pushing newly drawn objects to every client of a session
 */

import express, { type Request, type Response, type NextFunction } from 'express';
import { WebSocketServer, WebSocket } from 'ws';
import { createServer } from 'http';
import type { Logger } from '../core/log';
import { silentLogger } from '../core/log';
import { CommandService } from './commandService';
import { type ClientCommand, type ServerEvent, parseClientCommand } from './protocol';

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export interface CommandServerOptions {
  port?: number;
  host?: string;
  log?: Logger;
}

export class CommandServer {
  private app: express.Application;
  private server: ReturnType<typeof createServer>;
  private wss: WebSocketServer;
  private clients = new Map<string, Set<WebSocket>>();
  private readonly port: number;
  private readonly host: string;
  private readonly log: Logger;

  constructor(readonly service: CommandService, options: CommandServerOptions = {}) {
    this.port = options.port ?? 3456;
    this.host = options.host ?? '127.0.0.1';
    this.log = options.log ?? silentLogger;

    this.app = express();
    this.app.use(express.json());
    this.app.use(this.corsMiddleware);
    this.app.use(this.requestLogger);

    this.server = createServer(this.app);
    this.wss = new WebSocketServer({ server: this.server, path: '/ws' });
    // ws re-emits the http server's errors here; unhandled they would throw.
    this.wss.on('error', (e) => this.log.error(`server error: ${errorMessage(e)}`));

    this.setupRoutes();
    this.setupWebSocket();
  }

  // ─────────────────────────────────────────────────────────────
  // MIDDLEWARE
  // ─────────────────────────────────────────────────────────────

  private corsMiddleware = (req: Request, res: Response, next: NextFunction) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type');
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
      return;
    }
    next();
  };

  private requestLogger = (req: Request, _res: Response, next: NextFunction) => {
    this.log.info(`${req.method} ${req.path}`);
    next();
  };

  // ─────────────────────────────────────────────────────────────
  // HTTP ROUTES
  // ─────────────────────────────────────────────────────────────

  private setupRoutes() {
    const app = this.app;

    app.get('/health', (_req, res) => {
      res.json({ status: 'ok', sessions: this.service.sessionCount });
    });

    app.get('/patterns', (_req, res) => {
      res.json(this.service.listPatterns());
    });

    // ─── Session Management ───
    app.post('/session', (_req, res) => {
      const id = this.service.createSession();
      res.json({ id });
    });

    app.get('/sessions', (_req, res) => {
      res.json(this.service.listSessions());
    });

    app.get('/session/:id', (req, res) => {
      try {
        res.json(this.service.getSession(req.params.id));
      } catch (e) {
        res.status(404).json({ error: errorMessage(e) });
      }
    });

    app.delete('/session/:id', (req, res) => {
      try {
        this.service.closeSession(req.params.id);
        this.dropClients(req.params.id);
        res.json({ success: true });
      } catch (e) {
        res.status(404).json({ error: errorMessage(e) });
      }
    });

    // ─── Commands ───
    app.post('/session/:id/command', (req, res) => {
      const id = req.params.id;
      if (!this.service.hasSession(id)) {
        res.status(404).json({ error: `Session not found: ${id}` });
        return;
      }
      const text: unknown = req.body?.text;
      if (typeof text !== 'string') {
        res.status(400).json({ error: 'Body must be { text: string }' });
        return;
      }
      const reply = this.service.runCommand(id, text);
      res.status(reply.ok ? 200 : 400).json(reply);
      // Errors stay with the HTTP caller.
      if (reply.ok) this.broadcast(id, { type: 'drawn', text, drawables: reply.drawables });
    });

    app.get('/session/:id/figure', (req, res) => {
      try {
        res.json(this.service.getFigure(req.params.id));
      } catch (e) {
        res.status(404).json({ error: errorMessage(e) });
      }
    });

    app.get('/session/:id/history', (req, res) => {
      try {
        res.json(this.service.getHistory(req.params.id));
      } catch (e) {
        res.status(404).json({ error: errorMessage(e) });
      }
    });
  }

  // ─────────────────────────────────────────────────────────────
  // WEBSOCKET
  // ─────────────────────────────────────────────────────────────

  private setupWebSocket() {
    this.wss.on('connection', (ws, req) => {
      // Session id comes from the query string: /ws?session=xxx
      const url = new URL(req.url ?? '', `http://${req.headers.host ?? 'localhost'}`);
      const sessionId = url.searchParams.get('session');

      if (!sessionId || !this.service.hasSession(sessionId)) {
        ws.close(4404, 'Session not found');
        return;
      }

      const set = this.clients.get(sessionId) ?? new Set<WebSocket>();
      set.add(ws);
      this.clients.set(sessionId, set);

      this.send(ws, { type: 'figure', drawables: this.service.getFigure(sessionId) });

      ws.on('message', (data) => {
        let cmd: ClientCommand;
        try {
          cmd = parseClientCommand(data.toString());
        } catch (e) {
          this.send(ws, { type: 'error', error: { message: errorMessage(e) } });
          return;
        }
        this.handleClientCommand(sessionId, cmd, ws);
      });

      ws.on('close', () => {
        set.delete(ws);
      });
    });
  }

  private handleClientCommand(sessionId: string, cmd: ClientCommand, ws: WebSocket) {
    if (!this.service.hasSession(sessionId)) {
      this.send(ws, { type: 'error', error: { message: `Session not found: ${sessionId}` } });
      return;
    }
    switch (cmd.type) {
      case 'figure':
        this.send(ws, { type: 'figure', drawables: this.service.getFigure(sessionId) });
        return;
      case 'command': {
        const reply = this.service.runCommand(sessionId, cmd.text);
        if (reply.ok) {
          this.broadcast(sessionId, { type: 'drawn', text: cmd.text, drawables: reply.drawables });
        } else {
          // Errors go back to the sender only.
          this.send(ws, { type: 'error', text: cmd.text, error: reply.error });
        }
        return;
      }
    }
  }

  private send(ws: WebSocket, event: ServerEvent) {
    if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify(event));
  }

  private broadcast(sessionId: string, event: ServerEvent) {
    for (const ws of this.clients.get(sessionId) ?? []) this.send(ws, event);
  }

  private dropClients(sessionId: string) {
    for (const ws of this.clients.get(sessionId) ?? []) ws.close(4410, 'Session closed');
    this.clients.delete(sessionId);
  }

  // ─────────────────────────────────────────────────────────────
  // SERVER LIFECYCLE
  // ─────────────────────────────────────────────────────────────

  /**
   * Resolves with the bound port (useful when constructed with port 0).
   * Rejects when the port cannot be bound.
   */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const onError = (e: Error) => reject(e);
      this.server.once('error', onError);
      this.server.listen(this.port, this.host, () => {
        this.server.off('error', onError);
        const addr = this.server.address();
        const port = typeof addr === 'object' && addr !== null ? addr.port : this.port;
        this.log.info(`command server running at http://${this.host}:${port}`);
        this.log.info(`WebSocket: ws://${this.host}:${port}/ws?session=<id>`);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    if (!this.server.listening) {
      this.wss.close();
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      for (const ws of this.wss.clients) ws.terminate();
      this.wss.close();
      this.server.close((e) => (e ? reject(e) : resolve()));
      this.server.closeAllConnections();
    });
  }
}
