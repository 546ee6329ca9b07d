/**
 * Command Session - one terminal's command log and figure
 *
 * A session is owned by the service and addressed by its id; only the
 * service mutates it.
 */

import { type Drawable, dedupeDrawables } from '../core/figures/drawable';
import type { PatternRegistries } from '../core/patterns/registry';
import { evaluateCommand } from '../core/pipeline/runCommand';
import type { Logger } from '../core/log';
import { formatError } from '../core/errors';
import { makeDiagnostic } from '../outcome/codes';
import {
  type CommandReply,
  type CommandRecord,
  type SessionInfo,
  type SerializedDrawable,
  serializeDrawable,
  serializeError,
} from './protocol';

export interface SessionOptions {
  dedupe: boolean;
  log: Logger;
}

export class CommandSession {
  private readonly figure: Drawable[] = [];
  private readonly history: CommandRecord[] = [];
  private readonly createdAt = new Date();

  constructor(
    readonly id: string,
    private readonly registries: PatternRegistries,
    private readonly options: SessionOptions
  ) {}

  run(text: string): CommandReply {
    const r = evaluateCommand(text, this.registries, this.options.log);
    this.history.push({ index: this.history.length, text, ok: r.ok });

    if (!r.ok) {
      this.options.log.info(`session ${this.id}: ${formatError(r.error)}`);
      return { ok: false, error: serializeError(r.error) };
    }

    const added = this.options.dedupe
      ? dedupeDrawables([...this.figure, ...r.drawables]).slice(this.figure.length)
      : r.drawables;
    const kept = new Set(added);
    for (const d of r.drawables) {
      if (!kept.has(d)) {
        this.options.log.debug(`session ${this.id}: ${makeDiagnostic('W0001', { repr: d.repr() }).message}`);
      }
    }
    this.figure.push(...added);

    return { ok: true, drawables: added.map(serializeDrawable), skipped: r.drawables.length - added.length };
  }

  /** Empties the figure; the command log is kept. */
  clear(): void {
    this.figure.length = 0;
  }

  getFigure(): SerializedDrawable[] {
    return this.figure.map(serializeDrawable);
  }

  getHistory(): CommandRecord[] {
    return this.history.map(h => ({ ...h }));
  }

  info(): SessionInfo {
    return {
      id: this.id,
      createdAt: this.createdAt.toISOString(),
      commands: this.history.length,
      drawables: this.figure.length,
    };
  }
}
