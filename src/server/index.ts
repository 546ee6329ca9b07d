/**
 * Command server public API
 *
 * TYPES:
 *   - ICommandService, CommandReply, CommandRecord, SessionInfo
 *   - SerializedDrawable, SerializedError
 *   - ServerEvent (server -> client), ClientCommand (client -> server)
 *
 * IMPLEMENTATION:
 *   - CommandService        - Session registry
 *   - CommandServer         - The HTTP/WebSocket server
 *   - startCommandServer()  - Quick start function
 */

export type {
  ICommandService,
  CommandReply,
  CommandRecord,
  SessionInfo,
  SerializedDrawable,
  SerializedError,
  ServerEvent,
  ClientCommand,
} from './protocol';

export { CommandService, type CommandServiceOptions } from './commandService';
export { CommandServer, type CommandServerOptions } from './commandServer';

import type { PatternRegistries } from '../core/patterns/registry';
import type { SketchConfig } from '../core/config/config';
import { createLogger } from '../core/log';
import { CommandService } from './commandService';
import { CommandServer } from './commandServer';

/**
 * Start a command server for the given pattern tables.
 *
 * ## REST Endpoints
 * - GET    /health                - Liveness and session count
 * - GET    /patterns              - Registered templates
 * - POST   /session               - Create session -> { id }
 * - GET    /sessions              - List sessions
 * - GET    /session/:id           - Session info
 * - DELETE /session/:id           - Close session
 * - POST   /session/:id/command   - Run command (body: { text }) -> CommandReply
 * - GET    /session/:id/figure    - Drawables on the session's figure
 * - GET    /session/:id/history   - Command log
 *
 * ## WebSocket
 * Connect to ws://HOST:PORT/ws?session=SESSION_ID
 * - server: { type: 'figure' | 'drawn' | 'error', ... }
 * - client: { type: 'command', text } | { type: 'figure' }
 */
export async function startCommandServer(
  registries: PatternRegistries,
  config: SketchConfig
): Promise<{ server: CommandServer; port: number }> {
  const log = createLogger('server', config.log.level);
  const service = new CommandService(registries, { dedupe: config.repl.dedupe, log });
  const server = new CommandServer(service, { port: config.server.port, host: config.server.host, log });
  const port = await server.start();
  return { server, port };
}
