import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { RuleItemExtractor } from '../src/ai/itemExtractor';
import { BudgetStateMachine } from '../src/budget/budgetStateMachine';
import { DisambiguationEngine } from '../src/budget/disambiguationEngine';
import { KeyedStore } from '../src/budget/keyedStore';
import { PurchaseFinalizer } from '../src/budget/purchaseFinalizer';
import { InMemoryCatalogGateway } from '../src/catalog/inMemoryCatalog';
import { SessionStoreUnavailableError } from '../src/errors';
import { UserLanes } from '../src/ingest/userLanes';
import { InMemoryTurnStore } from '../src/session/inMemoryTurnStore';
import { Sweeper } from '../src/session/sweeper';
import type { Basket, QuoteSession } from '../src/types';
import { ManualScheduler, TZ, fixtureOffers, flushAsync } from './helpers';

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;

class BrokenSweepStore extends InMemoryTurnStore {
  async sweep(): Promise<number> {
    throw new SessionStoreUnavailableError('sweep');
  }
}

function setup(turns?: InMemoryTurnStore) {
  const time = new ManualScheduler();
  const catalog = new InMemoryCatalogGateway(fixtureOffers());
  const sessions = new KeyedStore<QuoteSession>();
  const machine = new BudgetStateMachine({
    engine: new DisambiguationEngine(catalog, new KeyedStore<Basket>(), time),
    extractor: new RuleItemExtractor(),
    catalog,
    finalizer: new PurchaseFinalizer(catalog, TZ),
    sessions,
    quoteTtlMs: 30 * MINUTE,
  });
  const store = turns ?? new InMemoryTurnStore(time, 24 * HOUR);
  const lanes = new UserLanes();
  const sweeper = new Sweeper({ turns: store, machine, lanes, clock: time, scheduler: time, intervalMs: HOUR });
  const quote = (userId: string, text = 'cimento CP-II\nareia') =>
    machine.handleTurn(userId, text, { now: time.now(), recent: [] });
  return { time, sessions, machine, store, lanes, sweeper, quote };
}

describe('Sweeper.runOnce', () => {
  it('removes turns past retention and sessions past their TTL', async () => {
    const { time, store, sweeper, machine, quote } = setup();
    await store.append('u1', 'user', 'ontem', new Date(time.now().getTime() - 25 * HOUR));
    await store.append('u1', 'user', 'cimento CP-II');
    await quote('u1');

    time.advance(31 * MINUTE);
    await quote('u2');

    assert.deepEqual(await sweeper.runOnce(), { turns_removed: 1, sessions_expired: 1 });
    assert.equal(machine.phaseOf('u1'), 'collecting');
    assert.equal(machine.phaseOf('u2'), 'quote_shown');
    assert.deepEqual((await store.recent('u1')).map((t) => t.content), ['cimento CP-II']);
  });

  it('reports nothing when there is nothing to clean', async () => {
    const { sweeper } = setup();
    assert.deepEqual(await sweeper.runOnce(), { turns_removed: 0, sessions_expired: 0 });
  });

  it('a failing turn store still lets sessions expire', async () => {
    const { sweeper, quote, time } = setup(new BrokenSweepStore(new ManualScheduler(), 24 * HOUR));
    await quote('u1');

    time.advance(31 * MINUTE);
    assert.deepEqual(await sweeper.runOnce(), { turns_removed: 0, sessions_expired: 1 });
  });

  it('a turn already queued on the user lane wins over the sweep', async () => {
    const { time, lanes, sweeper, machine, quote } = setup();
    await quote('u1');
    time.advance(31 * MINUTE);

    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const inFlight = lanes.run('u1', async () => {
      await gate;
      return quote('u1', 'areia');
    });

    const report = sweeper.runOnce();
    await flushAsync();
    release();

    assert.equal((await inFlight).phase, 'quote_shown');
    assert.deepEqual(await report, { turns_removed: 0, sessions_expired: 0 });
    assert.equal(machine.phaseOf('u1'), 'quote_shown');
  });
});

describe('Sweeper.start', () => {
  it('sweeps on every interval until stopped', async () => {
    const { time, sweeper, sessions, quote } = setup();
    await quote('u1');

    sweeper.start();
    sweeper.start();
    assert.equal(time.pendingTimers(), 1);

    time.advance(HOUR);
    await flushAsync();
    assert.equal(sessions.size, 0);

    await sweeper.stop();
    assert.equal(time.pendingTimers(), 0);
  });
});
