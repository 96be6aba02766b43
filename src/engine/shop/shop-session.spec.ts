import { InsufficientFundsError } from '../../common/errors/game-errors.js';
import { createEngine, petContent } from '../testing/engine.fixture.js';
import type { Engine } from '../testing/engine.fixture.js';

describe('ShopSession', () => {
  let engine: Engine;

  beforeEach(async () => {
    engine = await createEngine({ loadContent: false });
    engine.content.register([petContent('Ant', 2, 1)]);
  });

  it('연산을 이어서 호출', () => {
    const roster = engine.rosters.create([], { name: 'A', seed: 'test-seed' });
    engine.shops.attach(roster);
    const session = engine.shops.session(roster);

    session.open().buy(0, 0).buy(0, 1).move(1, 3).sell(0).close();

    expect(session.shop?.state).toBe('CLOSED');
    expect(session.shop?.turn).toBe(2);
    expect(roster.at(0)).toBeNull();
    expect(roster.at(3)?.name).toBe('Ant');
    expect(roster.sold).toHaveLength(1);
  });

  it('실패한 연산은 그 자리에서 던진다', () => {
    const roster = engine.rosters.create([], { name: 'A', seed: 'test-seed' });
    engine.shops.attach(roster);
    const session = engine.shops.session(roster).open().freeze(0).unfreeze(0);
    const shop = session.shop;
    if (!shop) throw new Error('no shop');
    shop.gold = 0;
    expect(() => session.roll()).toThrow(InsufficientFundsError);
  });
});
