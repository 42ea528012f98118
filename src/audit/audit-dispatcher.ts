import type { GenServerBehavior, GenServerRef } from '@hamicek/noex';
import { GenServer } from '@hamicek/noex';
import type { Logger } from 'pino';
import { ErrorCode } from '../codes.js';
import { AccessControlError } from '../errors.js';
import type { AuditEntry, AuditSink } from './audit-types.js';

const DEFAULT_SINK_TIMEOUT_MS = 2_000;
const DEFAULT_RETRY_DELAY_MS = 1_000;

// ── State ─────────────────────────────────────────────────────────

export interface DispatcherState {
  /** Entries not yet acknowledged by the sink, oldest first. */
  readonly pending: AuditEntry[];
  /** Set after a failed write; new entries queue up until the retry fires. */
  backingOff: boolean;
}

// ── Messages ──────────────────────────────────────────────────────

export type DispatcherCast =
  | { readonly type: 'deliver'; readonly entry: AuditEntry }
  | { readonly type: 'retry' };

export type DispatcherCall =
  | { readonly type: 'flush' }
  | { readonly type: 'pending' };

export type DispatcherRef = GenServerRef<DispatcherState, DispatcherCall, DispatcherCast, number>;

export interface DispatcherOptions {
  readonly sink: AuditSink;
  readonly sinkTimeoutMs?: number;
  readonly retryDelayMs?: number;
  readonly onSinkError?: (error: AccessControlError) => void;
  readonly logger?: Logger;
}

// ── Behavior Factory ──────────────────────────────────────────────

export function createDispatcherBehavior(
  options: DispatcherOptions,
  scheduleRetry: () => void,
): GenServerBehavior<DispatcherState, DispatcherCall, DispatcherCast, number> {
  const timeoutMs = options.sinkTimeoutMs ?? DEFAULT_SINK_TIMEOUT_MS;

  async function drain(state: DispatcherState): Promise<DispatcherState> {
    while (state.pending.length > 0) {
      const entry = state.pending[0];
      if (entry === undefined) break;

      try {
        await writeWithTimeout(options.sink, entry, timeoutMs);
      } catch (error) {
        escalate(options, error, entry, state.pending.length);
        state.backingOff = true;
        scheduleRetry();
        return state;
      }

      state.pending.shift();
    }

    state.backingOff = false;
    return state;
  }

  return {
    init(): DispatcherState {
      return { pending: [], backingOff: false };
    },

    async handleCall(
      msg: DispatcherCall,
      state: DispatcherState,
    ): Promise<[number, DispatcherState]> {
      switch (msg.type) {
        case 'flush': {
          const next = await drain(state);
          return [next.pending.length, next];
        }
        case 'pending':
          return [state.pending.length, state];
      }
    },

    handleCast(
      msg: DispatcherCast,
      state: DispatcherState,
    ): DispatcherState | Promise<DispatcherState> {
      switch (msg.type) {
        case 'deliver':
          state.pending.push(msg.entry);
          return state.backingOff ? state : drain(state);
        case 'retry':
          return drain(state);
      }
    },

    terminate(_reason, state): void {
      if (state.pending.length > 0) {
        options.logger?.error(
          { pending: state.pending.length },
          'audit dispatcher stopped with undelivered entries',
        );
      }
    },
  };
}

// ── AuditDispatcher ───────────────────────────────────────────────
//
// Owns the GenServer that hands entries to the sink one at a time, in
// order. Callers only ever cast, so a slow sink never holds them up.

export class AuditDispatcher {
  readonly #options: DispatcherOptions;
  #ref: DispatcherRef | null = null;
  #retryTimer: ReturnType<typeof setTimeout> | null = null;

  private constructor(options: DispatcherOptions) {
    this.#options = options;
  }

  static async start(options: DispatcherOptions): Promise<AuditDispatcher> {
    const dispatcher = new AuditDispatcher(options);
    const behavior = createDispatcherBehavior(options, () => dispatcher.#scheduleRetry());
    dispatcher.#ref = await GenServer.start(behavior);
    return dispatcher;
  }

  /** Queue an entry for delivery. Never throws, never waits on the sink. */
  deliver(entry: AuditEntry): void {
    if (this.#ref === null) {
      escalate(this.#options, new Error('Audit dispatcher is not running'), entry, 1);
      return;
    }

    try {
      GenServer.cast(this.#ref, { type: 'deliver', entry });
    } catch (error) {
      escalate(this.#options, error, entry, 1);
    }
  }

  /** Attempts delivery of everything queued. Resolves to the number still pending. */
  async flush(): Promise<number> {
    if (this.#ref === null) return 0;
    return GenServer.call(this.#ref, { type: 'flush' });
  }

  async pending(): Promise<number> {
    if (this.#ref === null) return 0;
    return GenServer.call(this.#ref, { type: 'pending' });
  }

  async stop(): Promise<void> {
    if (this.#ref !== null) {
      const ref = this.#ref;
      await GenServer.call(ref, { type: 'flush' });
      this.#ref = null;
      await GenServer.stop(ref, 'normal');
    }

    // The final flush may have scheduled another retry.
    if (this.#retryTimer !== null) {
      clearTimeout(this.#retryTimer);
      this.#retryTimer = null;
    }
  }

  #scheduleRetry(): void {
    if (this.#retryTimer !== null) return;

    const timer = setTimeout(() => {
      this.#retryTimer = null;
      if (this.#ref === null) return;
      try {
        GenServer.cast(this.#ref, { type: 'retry' });
      } catch (error) {
        this.#options.logger?.error({ err: error }, 'audit redelivery could not be scheduled');
      }
    }, this.#options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
    timer.unref();
    this.#retryTimer = timer;
  }
}

// ── Helpers ───────────────────────────────────────────────────────

async function writeWithTimeout(
  sink: AuditSink,
  entry: AuditEntry,
  timeoutMs: number,
): Promise<void> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new Error(`Audit sink did not respond within ${timeoutMs} ms`));
    }, timeoutMs);
  });

  try {
    await Promise.race([sink.write(entry, controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function escalate(
  options: DispatcherOptions,
  cause: unknown,
  entry: AuditEntry,
  pending: number,
): void {
  const reason = cause instanceof Error ? cause.message : String(cause);
  const error = new AccessControlError(
    ErrorCode.AUDIT_SINK_UNAVAILABLE,
    `Audit sink unavailable: ${reason}`,
    { entryId: entry.id, pending },
  );

  options.logger?.error({ err: cause, entryId: entry.id, pending }, 'audit sink unavailable');

  if (options.onSinkError === undefined) return;
  try {
    options.onSinkError(error);
  } catch (handlerError) {
    options.logger?.error({ err: handlerError }, 'audit sink error handler threw');
  }
}
