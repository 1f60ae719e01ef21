import fs from 'node:fs';
import path from 'node:path';
import { createClient } from '@supabase/supabase-js';
import type { ExtractionContext, ItemExtractor } from '../src/ai/itemExtractor';
import type { CatalogGateway, QueryOptions } from '../src/catalog/catalogGateway';
import { offersFromSeed } from '../src/catalog/inMemoryCatalog';
import type { CatalogOffer, ItemRequest } from '../src/types';
import type { CancelTimer, Clock, Scheduler } from '../src/util/clock';
import type { MessageTransport } from '../src/whatsapp/evolution';

export const TZ = 'America/Sao_Paulo';

// ── simulated time ─────────────────────────────────────────

type ManualTimer = { at: number; every: number | null; fn: () => void };

/** Clock + scheduler whose time only moves through `advance`. */
export class ManualScheduler implements Clock, Scheduler {
  private current: number;
  private nextId = 1;
  private readonly timers = new Map<number, ManualTimer>();

  constructor(start: Date = new Date('2026-03-10T15:00:00.000Z')) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  setTimer(delayMs: number, fn: () => void): CancelTimer {
    return this.add({ at: this.current + delayMs, every: null, fn });
  }

  setRepeating(intervalMs: number, fn: () => void): CancelTimer {
    return this.add({ at: this.current + intervalMs, every: intervalMs, fn });
  }

  /** Moves time forward, firing due timers in deadline order. */
  advance(ms: number): void {
    const target = this.current + ms;
    for (;;) {
      const due = this.nextDue(target);
      if (!due) break;
      const [id, timer] = due;
      this.current = timer.at;
      if (timer.every === null) this.timers.delete(id);
      else timer.at += timer.every;
      timer.fn();
    }
    this.current = target;
  }

  pendingTimers(): number {
    return this.timers.size;
  }

  private add(timer: ManualTimer): CancelTimer {
    const id = this.nextId++;
    this.timers.set(id, timer);
    return () => {
      this.timers.delete(id);
    };
  }

  private nextDue(target: number): [number, ManualTimer] | null {
    let best: [number, ManualTimer] | null = null;
    for (const entry of this.timers) {
      if (entry[1].at > target) continue;
      if (!best || entry[1].at < best[1].at) best = entry;
    }
    return best;
  }
}

/** Lets pending promise callbacks run. */
export function flushAsync(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

// ── catalog ────────────────────────────────────────────────

export function fixtureOffers(): CatalogOffer[] {
  const raw: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, 'fixtures', 'catalog.json'), 'utf8'));
  return offersFromSeed(raw);
}

/** Wraps a gateway; every call fails while `failures` is above zero. */
export class FlakyCatalog implements CatalogGateway {
  calls = 0;

  constructor(
    private readonly inner: CatalogGateway,
    public failures: number,
  ) {}

  query(categoryHint: string, specification?: string | null, opts?: QueryOptions): Promise<CatalogOffer[]> {
    return this.attempt(() => this.inner.query(categoryHint, specification, opts));
  }

  listCategories(opts?: QueryOptions): Promise<string[]> {
    return this.attempt(() => this.inner.listCategories(opts));
  }

  getVendorPhone(vendorId: string, opts?: QueryOptions): Promise<string | null> {
    return this.attempt(() => this.inner.getVendorPhone(vendorId, opts));
  }

  private async attempt<T>(run: () => Promise<T>): Promise<T> {
    this.calls++;
    if (this.failures > 0) {
      this.failures--;
      throw new Error('connection reset');
    }
    return run();
  }
}

// ── extraction / transport stand-ins ───────────────────────

export class StubExtractor implements ItemExtractor {
  readonly seen: Array<{ text: string; ctx: ExtractionContext }> = [];

  constructor(private readonly answer: (text: string) => ItemRequest[]) {}

  async extract(text: string, ctx: ExtractionContext): Promise<ItemRequest[]> {
    this.seen.push({ text, ctx });
    return this.answer(text);
  }
}

export class RecordingTransport implements MessageTransport {
  readonly sent: Array<{ to: string; text: string }> = [];
  failNext = 0;

  async sendText(userId: string, text: string): Promise<void> {
    if (this.failNext > 0) {
      this.failNext--;
      throw new Error('gateway down');
    }
    this.sent.push({ to: userId, text });
  }
}

// ── supabase over a local fetch ────────────────────────────

export type FakeReply = { status: number; body?: unknown; headers?: Record<string, string> };

/** Supabase client whose HTTP calls are answered in process. */
export function supabaseWith(reply: (url: string) => FakeReply) {
  const urls: string[] = [];
  const fakeFetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = input instanceof Request ? input.url : String(input);
    urls.push(url);
    init?.signal?.throwIfAborted();
    const r = reply(url);
    return new Response(r.body === undefined ? null : JSON.stringify(r.body), {
      status: r.status,
      headers: { 'content-type': 'application/json', ...(r.headers ?? {}) },
    });
  };
  const supa = createClient('http://localhost:54321', 'test-secret', {
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch: fakeFetch },
  });
  return { supa, urls };
}
