/**
 * Command Protocol - JSON shapes exchanged with terminal/canvas clients
 *
 * Everything here is plain data so it can go over HTTP and WebSocket as-is.
 */

import type { Shape } from '../core/figures/shapes';
import type { Drawable } from '../core/figures/drawable';
import type { SketchError, SketchErrorKind } from '../core/errors';
import { errorPosition, formatError } from '../core/errors';
import type { PatternInfo } from '../core/patterns/registry';

// ============================================================
// SERIALIZED VALUES
// ============================================================

export interface SerializedDrawable {
  repr: string;
  shapes: Shape[];
}

export interface SerializedError {
  kind: SketchErrorKind;
  message: string;
  /** Offset into the command text, for parse errors */
  position?: number;
}

export type CommandReply =
  | { ok: true; drawables: SerializedDrawable[]; skipped: number }
  | { ok: false; error: SerializedError };

export interface CommandRecord {
  /** Position in the session log (0-based) */
  index: number;
  text: string;
  ok: boolean;
}

export interface SessionInfo {
  id: string;
  createdAt: string;
  commands: number;
  drawables: number;
}

// ============================================================
// SERVICE CONTRACT
// ============================================================

export interface ICommandService {
  createSession(): string;
  listSessions(): SessionInfo[];
  getSession(sessionId: string): SessionInfo;
  closeSession(sessionId: string): void;
  runCommand(sessionId: string, text: string): CommandReply;
  getFigure(sessionId: string): SerializedDrawable[];
  getHistory(sessionId: string): CommandRecord[];
  listPatterns(): PatternInfo[];
}

// ============================================================
// WEBSOCKET PROTOCOL
// ============================================================

/** Server -> client */
export type ServerEvent =
  | { type: 'figure'; drawables: SerializedDrawable[] }
  | { type: 'drawn'; text: string; drawables: SerializedDrawable[] }
  | { type: 'error'; text?: string; error: SerializedError | { message: string } };

/** Client -> server */
export type ClientCommand =
  | { type: 'command'; text: string }
  | { type: 'figure' };

export function serializeDrawable(d: Drawable): SerializedDrawable {
  return { repr: d.repr(), shapes: d.draw() };
}

export function serializeError(e: SketchError): SerializedError {
  const position = errorPosition(e);
  return position === undefined
    ? { kind: e.kind, message: formatError(e) }
    : { kind: e.kind, message: formatError(e), position };
}

export function parseClientCommand(raw: string): ClientCommand {
  const data: unknown = JSON.parse(raw);
  if (typeof data !== 'object' || data === null || !('type' in data)) {
    throw new Error('Malformed client command');
  }
  if (data.type === 'figure') return { type: 'figure' };
  if (data.type === 'command' && 'text' in data && typeof data.text === 'string') {
    return { type: 'command', text: data.text };
  }
  throw new Error(`Unknown client command: ${String(data.type)}`);
}
