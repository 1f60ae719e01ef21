import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { RuleItemExtractor } from '../src/ai/itemExtractor';
import {
  DisambiguationEngine,
  compareOffers,
  groupBySpecification,
  pickCandidateIndex,
} from '../src/budget/disambiguationEngine';
import { KeyedStore } from '../src/budget/keyedStore';
import type { CatalogGateway } from '../src/catalog/catalogGateway';
import { InMemoryCatalogGateway } from '../src/catalog/inMemoryCatalog';
import type { Basket, CatalogOffer } from '../src/types';
import { FlakyCatalog, ManualScheduler, fixtureOffers } from './helpers';

const offers = fixtureOffers();

function setup(catalog: CatalogGateway = new InMemoryCatalogGateway(offers)) {
  const time = new ManualScheduler();
  const baskets = new KeyedStore<Basket>();
  const engine = new DisambiguationEngine(catalog, baskets, time);
  return { time, baskets, engine };
}

const cimento = (specification: string | null = null) => ({
  raw_mention: specification ? `cimento ${specification}` : 'cimento',
  category_hint: 'cimento',
  specification,
});

// ── pure helpers ───────────────────────────────────────────

describe('compareOffers', () => {
  const base: CatalogOffer = {
    vendor_id: 'b',
    vendor_name: 'Beta',
    item_name: 'Areia',
    category: 'areia',
    specification_tags: [],
    unit_price: 10,
    currency: 'BRL',
  };

  it('orders by price, then vendor_name, then vendor_id', () => {
    const cheaper = { ...base, unit_price: 9.99 };
    const alpha = { ...base, vendor_name: 'Alpha' };
    const sameNameLowerId = { ...base, vendor_id: 'a' };

    assert.ok(compareOffers(cheaper, base) < 0);
    assert.ok(compareOffers(alpha, base) < 0);
    assert.ok(compareOffers(sameNameLowerId, base) < 0);
    assert.equal(compareOffers(base, { ...base }), 0);
  });
});

describe('groupBySpecification', () => {
  it('one group per tag signature, each represented by its cheapest offer', () => {
    const groups = groupBySpecification(offers.filter((o) => o.category === 'cimento'));

    assert.deepEqual(
      groups.map((g) => [g.signature, g.representative.vendor_id, g.representative.unit_price, g.offers.length]),
      [
        ['50kg|cp-ii', 'v1', 32, 3],
        ['50kg|cp-iii', 'v2', 35, 2],
        ['40kg|cp-v', 'v3', 41, 1],
      ],
    );
  });
});

// ── resolve ────────────────────────────────────────────────

describe('DisambiguationEngine.resolve', () => {
  it('a specification matching one group resolves to the cheapest offer', async () => {
    const { engine } = setup();

    const out = await engine.resolve('u1', [cimento('CP-II')]);
    const line = out.basket.lines.get('cimento');

    assert.equal(line?.status, 'resolved');
    assert.equal(line?.chosen_offer?.vendor_id, 'v1');
    assert.equal(line?.chosen_offer?.unit_price, 32);
    assert.equal(line?.matched_offers.length, 3);
    assert.equal(out.complete, true);
    assert.equal(out.open_line, null);
  });

  it('no specification and several groups asks with one candidate per group', async () => {
    const { engine } = setup();

    const out = await engine.resolve('u1', [cimento()]);

    assert.equal(out.complete, false);
    assert.equal(out.open_line?.status, 'needs_clarification');
    assert.deepEqual(
      out.open_line?.candidate_offers.map((o) => o.item_name),
      ['Cimento CP-II 50kg', 'Cimento CP-III 50kg', 'Cimento CP-V 40kg'],
    );
    assert.equal(out.open_line?.unmatched_specification, null);
  });

  it('a category with a single variation never asks', async () => {
    const { engine } = setup();

    const out = await engine.resolve('u1', [{ raw_mention: 'areia', category_hint: 'areia' }]);

    assert.equal(out.complete, true);
    assert.equal(out.basket.lines.get('areia')?.chosen_offer?.unit_price, 57.8);
  });

  it('a category with no offers stays in the basket as an open line without candidates', async () => {
    const { engine } = setup();

    const out = await engine.resolve('u1', [{ raw_mention: 'argamassa AC-III', category_hint: 'argamassa' }]);

    assert.equal(out.basket.lines.size, 1);
    assert.equal(out.open_line?.category, 'argamassa');
    assert.deepEqual(out.open_line?.candidate_offers, []);
  });

  it('an unmatched specification re-asks and remembers what was asked for', async () => {
    const { engine } = setup();

    const out = await engine.resolve('u1', [cimento('CP-IV')]);

    assert.equal(out.open_line?.unmatched_specification, 'CP-IV');
    assert.equal(out.open_line?.candidate_offers.length, 3);
  });

  it('re-resolving an already resolved line leaves its chosen offer untouched', async () => {
    const { engine } = setup();

    const first = await engine.resolve('u1', [cimento('CP-II')]);
    const again = await engine.resolve('u1', [cimento('CP-II')]);

    assert.deepEqual(again.basket.lines.get('cimento')?.chosen_offer, first.basket.lines.get('cimento')?.chosen_offer);
    assert.deepEqual(again.newly_resolved, []);
  });

  it('surfaces only the first open line in first-requested order', async () => {
    const { engine } = setup();

    const out = await engine.resolve('u1', [
      cimento(),
      { raw_mention: 'argamassa', category_hint: 'argamassa' },
      { raw_mention: 'areia', category_hint: 'areia' },
    ]);

    assert.equal(out.open_line?.category, 'cimento');
    assert.deepEqual(out.newly_resolved.map((l) => l.category), ['areia']);
  });

  it('a catalog failure leaves the stored basket as it was', async () => {
    const flaky = new FlakyCatalog(new InMemoryCatalogGateway(offers), 0);
    const { engine } = setup(flaky);

    await engine.resolve('u1', [{ raw_mention: 'areia', category_hint: 'areia' }]);
    flaky.failures = 1;

    await assert.rejects(engine.resolve('u1', [cimento('CP-II')]), /connection reset/);
    assert.deepEqual(Array.from(engine.current('u1')?.lines.keys() ?? []), ['areia']);
  });

  it('quantities default to 1 and are floored', async () => {
    const { engine } = setup();

    const out = await engine.resolve('u1', [
      { raw_mention: '3 areia', category_hint: 'areia', quantity: 3.7 },
      { ...cimento('CP-II') },
    ]);

    assert.equal(out.basket.lines.get('areia')?.quantity, 3);
    assert.equal(out.basket.lines.get('cimento')?.quantity, 1);
  });

  it('"cimento" then "CP-II" in one merged turn is a request, resolved directly', async () => {
    const { engine } = setup();
    const extractor = new RuleItemExtractor();

    const requests = await extractor.extract('cimento\nCP-II', {
      recent: [],
      categories: ['areia', "caixa d'água", 'cimento', 'telha'],
    });
    const out = await engine.resolve('u1', requests);

    assert.equal(out.complete, true);
    assert.equal(out.basket.lines.get('cimento')?.chosen_offer?.item_name, 'Cimento CP-II 50kg');
  });
});

// ── clarification answers ──────────────────────────────────

describe('DisambiguationEngine.answerClarification', () => {
  it('a candidate number picks that whole specification group', async () => {
    const { engine } = setup();
    await engine.resolve('u1', [cimento()]);

    const out = await engine.answerClarification('u1', { text: '2', requests: [] });
    const line = out.basket.lines.get('cimento');

    assert.equal(line?.status, 'resolved');
    assert.equal(line?.chosen_offer?.vendor_id, 'v2');
    assert.deepEqual(line?.matched_offers.map((o) => o.vendor_id), ['v1', 'v2']);
    assert.equal(line?.requested_specification, 'CP-III 50kg');
  });

  it('free text is taken as the missing specification', async () => {
    const { engine } = setup();
    await engine.resolve('u1', [cimento()]);

    const out = await engine.answerClarification('u1', { text: 'cp-v', requests: [] });

    assert.equal(out.basket.lines.get('cimento')?.chosen_offer?.item_name, 'Cimento CP-V 40kg');
    assert.equal(out.complete, true);
  });

  it('other categories in the same answer are merged as new requests', async () => {
    const { engine } = setup();
    await engine.resolve('u1', [cimento()]);

    const out = await engine.answerClarification('u1', {
      text: 'CP-II e areia',
      requests: [cimento('CP-II'), { raw_mention: 'areia', category_hint: 'areia' }],
    });

    assert.equal(out.complete, true);
    assert.deepEqual(out.newly_resolved.map((l) => l.category), ['cimento', 'areia']);
    assert.deepEqual(Array.from(out.basket.lines.keys()), ['cimento', 'areia']);
  });

  it('only the open line changes; resolved lines stay as they were', async () => {
    const { engine } = setup();
    await engine.resolve('u1', [{ raw_mention: 'areia', category_hint: 'areia' }, cimento()]);
    const areiaBefore = engine.current('u1')?.lines.get('areia');

    await engine.answerClarification('u1', { text: '1', requests: [] });

    assert.equal(engine.current('u1')?.lines.get('areia'), areiaBefore);
  });

  it('an answer naming only other categories adds them and keeps the question open', async () => {
    const { engine } = setup();
    await engine.resolve('u1', [cimento()]);

    const out = await engine.answerClarification('u1', { text: 'areia', requests: [{ raw_mention: 'areia', category_hint: 'areia' }] });

    assert.deepEqual(Array.from(out.basket.lines.keys()), ['cimento', 'areia']);
    assert.deepEqual(out.newly_resolved.map((l) => l.category), ['areia']);
    assert.equal(out.complete, false);
    assert.equal(out.open_line?.category, 'cimento');
    assert.equal(out.open_line?.unmatched_specification, null);
    assert.equal(out.open_line?.candidate_offers.length, 3);
  });

  it('a line with no offers does not swallow the next item', async () => {
    const { engine } = setup();
    await engine.resolve('u1', [{ raw_mention: 'argamassa', category_hint: 'argamassa' }]);

    const out = await engine.answerClarification('u1', { text: 'telha', requests: [{ raw_mention: 'telha', category_hint: 'telha' }] });

    assert.equal(out.basket.lines.get('telha')?.status, 'resolved');
    assert.equal(out.open_line?.category, 'argamassa');
    assert.equal(out.open_line?.unmatched_specification, null);
  });

  it('without an open question the answer is an ordinary request', async () => {
    const { engine } = setup();

    const out = await engine.answerClarification('u1', { text: 'areia', requests: [{ raw_mention: 'areia', category_hint: 'areia' }] });

    assert.equal(out.complete, true);
  });
});

// ── dropOpenLine / pickCandidateIndex ──────────────────────

describe('DisambiguationEngine.dropOpenLine', () => {
  it('removes the open line and reports the rest of the basket', async () => {
    const { engine } = setup();
    await engine.resolve('u1', [{ raw_mention: 'areia', category_hint: 'areia' }, { raw_mention: 'argamassa', category_hint: 'argamassa' }]);

    const { removed, outcome } = engine.dropOpenLine('u1');

    assert.equal(removed?.category, 'argamassa');
    assert.equal(outcome?.complete, true);
  });

  it('dropping the only line discards the basket', async () => {
    const { engine } = setup();
    await engine.resolve('u1', [{ raw_mention: 'argamassa', category_hint: 'argamassa' }]);

    const { removed, outcome } = engine.dropOpenLine('u1');

    assert.equal(removed?.category, 'argamassa');
    assert.equal(outcome, null);
    assert.equal(engine.current('u1'), null);
  });
});

describe('pickCandidateIndex', () => {
  it('reads digits, keycaps and exact item names', async () => {
    const { engine } = setup();
    const out = await engine.resolve('u1', [cimento()]);
    const open = out.open_line;
    assert.ok(open);

    assert.equal(pickCandidateIndex('2', open), 1);
    assert.equal(pickCandidateIndex('3️⃣', open), 2);
    assert.equal(pickCandidateIndex('cimento cp-v 40kg', open), 2);
    assert.equal(pickCandidateIndex('4', open), null);
    assert.equal(pickCandidateIndex('cp-ii', open), null);
  });
});
