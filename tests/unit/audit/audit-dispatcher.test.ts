import { describe, it, expect, vi, afterEach } from 'vitest';
import pino from 'pino';
import { AuditDispatcher, type DispatcherOptions } from '../../../src/audit/audit-dispatcher.js';
import type { AuditEntry, AuditSink } from '../../../src/audit/audit-types.js';
import type { AccessControlError } from '../../../src/errors.js';
import { ErrorCode } from '../../../src/codes.js';

// ── Helpers ──────────────────────────────────────────────────────

let sequence = 0;

function entry(action: AuditEntry['action'] = 'logout'): AuditEntry {
  return {
    id: ++sequence,
    timestamp: 1_000,
    username: 'alice',
    role: 'viewer',
    action,
    category: null,
    detail: '',
  };
}

/** Fails the first `failures` writes, then records every entry. */
class FlakySink implements AuditSink {
  readonly delivered: AuditEntry[] = [];
  attempts = 0;
  #failures: number;

  constructor(failures: number) {
    this.#failures = failures;
  }

  async write(entry: AuditEntry): Promise<void> {
    this.attempts++;
    if (this.#failures > 0) {
      this.#failures--;
      throw new Error('sink down');
    }
    this.delivered.push(entry);
  }
}

// ── Tests ────────────────────────────────────────────────────────

describe('AuditDispatcher', () => {
  let dispatcher: AuditDispatcher | null = null;

  async function start(options: DispatcherOptions): Promise<AuditDispatcher> {
    dispatcher = await AuditDispatcher.start({ logger: pino({ level: 'silent' }), ...options });
    return dispatcher;
  }

  afterEach(async () => {
    await dispatcher?.stop();
    dispatcher = null;
  });

  it('delivers entries in order', async () => {
    const sink = new FlakySink(0);
    const d = await start({ sink });

    const entries = [entry('login_success'), entry('data_access'), entry('logout')];
    for (const e of entries) d.deliver(e);

    expect(await d.flush()).toBe(0);
    expect(sink.delivered).toEqual(entries);
  });

  it('reports a failing sink on the error channel', async () => {
    const errors: AccessControlError[] = [];
    const sink = new FlakySink(1);
    const d = await start({ sink, retryDelayMs: 10, onSinkError: (e) => errors.push(e) });

    const e = entry();
    d.deliver(e);
    await vi.waitFor(() => expect(errors).toHaveLength(1));

    expect(errors[0]?.code).toBe(ErrorCode.AUDIT_SINK_UNAVAILABLE);
    expect(errors[0]?.message).toBe('Audit sink unavailable: sink down');
    expect(errors[0]?.details).toEqual({ entryId: e.id, pending: 1 });
  });

  it('redelivers after a failure without dropping entries', async () => {
    const errors: AccessControlError[] = [];
    const sink = new FlakySink(2);
    const d = await start({ sink, retryDelayMs: 10, onSinkError: (e) => errors.push(e) });

    const first = entry('login_success');
    const second = entry('logout');
    d.deliver(first);
    d.deliver(second);

    await vi.waitFor(() => expect(sink.delivered).toHaveLength(2));
    expect(sink.delivered).toEqual([first, second]);
    expect(errors).toHaveLength(2);
    expect(await d.pending()).toBe(0);
  });

  it('reports the number still pending when flushing against a dead sink', async () => {
    const sink = new FlakySink(Number.POSITIVE_INFINITY);
    const d = await start({ sink, retryDelayMs: 60_000 });

    d.deliver(entry());
    d.deliver(entry());

    expect(await d.flush()).toBe(2);
    expect(sink.delivered).toHaveLength(0);
  });

  it('times out a hanging sink and aborts its signal', async () => {
    const errors: AccessControlError[] = [];
    const seen: { signal?: AbortSignal } = {};
    const sink: AuditSink = {
      write: (_entry, signal) => {
        seen.signal = signal;
        return new Promise<void>(() => {});
      },
    };
    const d = await start({
      sink,
      sinkTimeoutMs: 20,
      retryDelayMs: 60_000,
      onSinkError: (e) => errors.push(e),
    });

    d.deliver(entry());
    await vi.waitFor(() => expect(errors).toHaveLength(1));

    expect(errors[0]?.message).toBe('Audit sink unavailable: Audit sink did not respond within 20 ms');
    expect(seen.signal?.aborted).toBe(true);
  });

  it('keeps going when the error handler throws', async () => {
    const sink = new FlakySink(1);
    const d = await start({
      sink,
      retryDelayMs: 10,
      onSinkError: () => {
        throw new Error('handler failed');
      },
    });

    d.deliver(entry());
    await vi.waitFor(() => expect(sink.delivered).toHaveLength(1));
  });

  it('returns from deliver before the sink finishes', async () => {
    const writes: (() => void)[] = [];
    const sink: AuditSink = {
      write: () =>
        new Promise<void>((resolve) => {
          writes.push(resolve);
        }),
    };
    const d = await start({ sink });

    const before = Date.now();
    d.deliver(entry());
    expect(Date.now() - before).toBeLessThan(50);

    await vi.waitFor(() => expect(writes).toHaveLength(1));
    writes[0]?.();
    expect(await d.flush()).toBe(0);
  });
});
