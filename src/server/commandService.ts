/**
 * Command Service - session registry behind the HTTP/WebSocket server
 */

import { randomUUID } from 'crypto';
import type { PatternRegistries, PatternInfo } from '../core/patterns/registry';
import type { Logger } from '../core/log';
import { silentLogger } from '../core/log';
import { CommandSession } from './commandSession';
import type {
  ICommandService,
  CommandReply,
  CommandRecord,
  SessionInfo,
  SerializedDrawable,
} from './protocol';

export interface CommandServiceOptions {
  dedupe?: boolean;
  log?: Logger;
  /** Session id generator; defaults to random UUIDs */
  newId?: () => string;
}

export class CommandService implements ICommandService {
  private readonly sessions = new Map<string, CommandSession>();
  private readonly dedupe: boolean;
  private readonly log: Logger;
  private readonly newId: () => string;

  constructor(private readonly registries: PatternRegistries, options: CommandServiceOptions = {}) {
    this.dedupe = options.dedupe ?? true;
    this.log = options.log ?? silentLogger;
    this.newId = options.newId ?? randomUUID;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  createSession(): string {
    const id = this.newId();
    if (this.sessions.has(id)) throw new Error(`Session already exists: ${id}`);
    this.sessions.set(id, new CommandSession(id, this.registries, { dedupe: this.dedupe, log: this.log }));
    this.log.info(`session ${id} created`);
    return id;
  }

  listSessions(): SessionInfo[] {
    return Array.from(this.sessions.values(), s => s.info());
  }

  getSession(sessionId: string): SessionInfo {
    return this.session(sessionId).info();
  }

  closeSession(sessionId: string): void {
    if (!this.sessions.delete(sessionId)) throw new Error(`Session not found: ${sessionId}`);
    this.log.info(`session ${sessionId} closed`);
  }

  runCommand(sessionId: string, text: string): CommandReply {
    return this.session(sessionId).run(text);
  }

  getFigure(sessionId: string): SerializedDrawable[] {
    return this.session(sessionId).getFigure();
  }

  getHistory(sessionId: string): CommandRecord[] {
    return this.session(sessionId).getHistory();
  }

  listPatterns(): PatternInfo[] {
    return [...this.registries.pure.describe(), ...this.registries.drawing.describe()];
  }

  private session(sessionId: string): CommandSession {
    const s = this.sessions.get(sessionId);
    if (!s) throw new Error(`Session not found: ${sessionId}`);
    return s;
  }
}
