import type { Logger } from 'pino';
import { ErrorCode } from '../codes.js';
import { AccessControlError } from '../errors.js';
import type { AuditConfig, AuditEntry, AuditEvent, AuditQuery } from './audit-types.js';
import { AuditLog } from './audit-log.js';
import { AuditDispatcher } from './audit-dispatcher.js';

export interface AuditLoggerOptions extends AuditConfig {
  readonly now?: () => number;
  readonly logger?: Logger;
}

// ── AuditLogger ──────────────────────────────────────────────────

export class AuditLogger {
  readonly #log: AuditLog;
  readonly #dispatcher: AuditDispatcher | null;
  readonly #options: AuditLoggerOptions;
  readonly #now: () => number;
  #sequence = 0;

  private constructor(log: AuditLog, dispatcher: AuditDispatcher | null, options: AuditLoggerOptions) {
    this.#log = log;
    this.#dispatcher = dispatcher;
    this.#options = options;
    this.#now = options.now ?? Date.now;
  }

  static async start(options?: AuditLoggerOptions): Promise<AuditLogger> {
    const dispatcher =
      options?.sink !== undefined
        ? await AuditDispatcher.start({
            sink: options.sink,
            ...(options.sinkTimeoutMs !== undefined ? { sinkTimeoutMs: options.sinkTimeoutMs } : {}),
            ...(options.retryDelayMs !== undefined ? { retryDelayMs: options.retryDelayMs } : {}),
            ...(options.onSinkError !== undefined ? { onSinkError: options.onSinkError } : {}),
            ...(options.logger !== undefined ? { logger: options.logger } : {}),
          })
        : null;

    return new AuditLogger(new AuditLog(options?.maxEntries), dispatcher, options ?? {});
  }

  /**
   * Appends the event to the in-memory log and queues it for the sink.
   * Returns immediately; sink trouble goes to the operational error channel.
   *
   * Without a sink the in-memory log is the only copy, so an entry pushed
   * out of a full log is reported as AUDIT_SINK_UNAVAILABLE.
   */
  record(event: AuditEvent): AuditEntry {
    const entry: AuditEntry = Object.freeze({
      id: ++this.#sequence,
      timestamp: this.#now(),
      username: event.username,
      role: event.role ?? null,
      action: event.action,
      category: event.category ?? null,
      detail: event.detail ?? '',
    });

    const displaced = this.#log.append(entry);
    if (this.#dispatcher !== null) {
      this.#dispatcher.deliver(entry);
    } else if (displaced !== undefined) {
      this.#reportLost(displaced);
    }
    return entry;
  }

  /** Newest first. */
  query(filter?: AuditQuery): AuditEntry[] {
    return this.#log.query(filter);
  }

  get size(): number {
    return this.#log.size;
  }

  /** Pushes queued entries to the sink. Resolves to the number still undelivered. */
  async flush(): Promise<number> {
    return this.#dispatcher?.flush() ?? 0;
  }

  async pending(): Promise<number> {
    return this.#dispatcher?.pending() ?? 0;
  }

  async stop(): Promise<void> {
    await this.#dispatcher?.stop();
  }

  #reportLost(entry: AuditEntry): void {
    const { logger, onSinkError } = this.#options;
    const evicted = this.#log.evicted;
    const error = new AccessControlError(
      ErrorCode.AUDIT_SINK_UNAVAILABLE,
      `Audit entry ${entry.id} evicted from the in-memory log with no sink configured`,
      { entryId: entry.id, evicted },
    );

    logger?.error({ entryId: entry.id, action: entry.action, evicted }, 'audit entry lost');

    if (onSinkError === undefined) return;
    try {
      onSinkError(error);
    } catch (handlerError) {
      logger?.error({ err: handlerError }, 'audit sink error handler threw');
    }
  }
}
