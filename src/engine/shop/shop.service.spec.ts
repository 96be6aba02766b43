import {
  EmptySlotError,
  InsufficientFundsError,
  InvalidPositionError,
  InvalidShopStateError,
  InvalidTierError,
} from '../../common/errors/game-errors.js';
import type { Pet, ShopItem } from '../../types/index.js';
import type { Roster } from '../roster/roster.js';
import { createEngine, foodContent, petContent } from '../testing/engine.fixture.js';
import type { Engine } from '../testing/engine.fixture.js';
import type { Shop } from './shop.js';

function requireShop(roster: Roster): Shop {
  if (!roster.shop) throw new Error('no shop');
  return roster.shop;
}

function requirePet(roster: Roster, position: number): Pet {
  const pet = roster.at(position);
  if (!pet) throw new Error(`no pet at ${position}`);
  return pet;
}

describe('ShopService', () => {
  describe('단일 풀', () => {
    let engine: Engine;
    let roster: Roster;
    let shop: Shop;

    beforeEach(async () => {
      engine = await createEngine({ loadContent: false });
      engine.content.register(
        [petContent('Ant', 2, 1), petContent('Fish', 2, 2, [], 2)],
        [
          foodContent('Apple', {
            holdable: false,
            singleUse: true,
            effect: {
              trigger: { kind: 'FOOD_EATEN', scope: 'SELF' },
              target: { kind: 'SELF' },
              action: { kind: 'ADD_STATS', stats: { attack: 1, health: 1 } },
              uses: 1,
            },
          }),
        ],
      );
      roster = engine.rosters.create([], { name: 'A', seed: 'test-seed' });
      shop = engine.shops.attach(roster);
    });

    it('열기 전에는 거래 불가', () => {
      expect(shop.state).toBe('CLOSED');
      expect(() => engine.shops.buy(roster, 0, 0)).toThrow(InvalidShopStateError);
      expect(() => engine.shops.roll(roster)).toThrow(InvalidShopStateError);
      expect(() => engine.shops.sell(roster, 0)).toThrow(InvalidShopStateError);
      expect(() => engine.shops.freeze(roster, 0)).toThrow(InvalidShopStateError);
      expect(() => engine.shops.close(roster)).toThrow(InvalidShopStateError);
    });

    it('상점 없는 로스터', () => {
      const bare = engine.rosters.create([], { name: 'B' });
      expect(() => engine.shops.open(bare)).toThrow(InvalidShopStateError);
    });

    it('open: 골드 지급, 티어별 슬롯 채움', () => {
      engine.shops.open(roster);
      expect(shop.state).toBe('OPEN');
      expect(shop.gold).toBe(10);
      expect(shop.items.map((i) => i.name)).toEqual(['Ant', 'Ant', 'Ant', 'Apple']);
      expect(shop.petItems().map((i) => i.pet.id)).toEqual(['shop-1', 'shop-2', 'shop-3']);
      expect(shop.log.events().map((e) => e.kind)).toEqual(['SHOP_START']);
      expect(() => engine.shops.open(roster)).toThrow(InvalidShopStateError);
    });

    it('open: 지난 턴 임시 스탯을 걷어낸다', () => {
      const ant = roster.place(0, engine.pets.createPet('Ant'));
      ant.stats = { attack: 5, health: 4 };
      ant.temporaryStats = { attack: 3, health: 3 };
      engine.shops.open(roster);
      expect(ant.stats).toEqual({ attack: 2, health: 1 });
      expect(ant.temporaryStats).toEqual({ attack: 0, health: 0 });
    });

    it('buy: 빈 자리에 놓고 골드 차감', () => {
      engine.shops.open(roster);
      const result = engine.shops.buy(roster, 0, 0);
      expect(result).toMatchObject({ kind: 'PET', name: 'Ant', goldSpent: 3, merged: false });
      expect(shop.gold).toBe(7);
      expect(shop.items).toHaveLength(3);
      expect(requirePet(roster, 0).id).toBe('A-1');
      expect(shop.log.events().map((e) => e.kind)).toEqual(['SHOP_START', 'BUY']);
    });

    it('buy: 같은 펫 위로 합치면 경험치, 레벨업 시 다음 티어 펫 추가', () => {
      engine.shops.open(roster);
      engine.shops.buy(roster, 0, 0);

      const merged = engine.shops.buy(roster, 0, 0);
      expect(merged).toMatchObject({ merged: true, levelsGained: 0 });
      expect(requirePet(roster, 0).stats).toEqual({ attack: 3, health: 2 });
      expect(shop.items.map((i) => i.name)).toEqual(['Ant', 'Apple']);

      const levelled = engine.shops.buy(roster, 0, 0);
      expect(levelled.levelsGained).toBe(1);
      const ant = requirePet(roster, 0);
      expect(ant.level).toBe(2);
      expect(ant.experience).toBe(2);
      expect(ant.stats).toEqual({ attack: 4, health: 3 });
      expect(shop.items.map((i) => i.name)).toEqual(['Fish', 'Apple']);
      expect(shop.gold).toBe(1);
      expect(roster.occupied()).toHaveLength(1);
    });

    it('buy: 다른 펫이 있는 자리는 InvalidPositionError, 상태 그대로', () => {
      roster.place(1, engine.pets.createPet('Fish'));
      engine.shops.open(roster);
      expect(() => engine.shops.buy(roster, 0, 1)).toThrow(InvalidPositionError);
      expect(() => engine.shops.buy(roster, 0, 5)).toThrow(InvalidPositionError);
      expect(() => engine.shops.buy(roster, 9, 0)).toThrow(InvalidPositionError);
      expect(shop.gold).toBe(10);
      expect(shop.items).toHaveLength(4);
      expect(requirePet(roster, 1).name).toBe('Fish');
    });

    it('buy: 최대 레벨 펫에는 합칠 수 없다', () => {
      roster.place(0, engine.pets.createPet('Ant', 3));
      engine.shops.open(roster);
      expect(() => engine.shops.buy(roster, 0, 0)).toThrow(InvalidPositionError);
    });

    it('buy: 골드 부족이면 InsufficientFundsError, 상태 그대로', () => {
      engine.shops.open(roster);
      shop.gold = 2;
      expect(() => engine.shops.buy(roster, 0, 0)).toThrow(InsufficientFundsError);
      expect(shop.gold).toBe(2);
      expect(shop.items).toHaveLength(4);
      expect(roster.occupied()).toEqual([]);
    });

    it('음식: 먹은 펫에 효과, 빈 자리면 EmptySlotError', () => {
      engine.shops.open(roster);
      engine.shops.buy(roster, 0, 0);
      expect(() => engine.shops.buy(roster, 2, 1)).toThrow(EmptySlotError);
      expect(shop.gold).toBe(7);

      const result = engine.shops.buy(roster, 2, 0);
      expect(result).toMatchObject({ kind: 'FOOD', name: 'Apple', merged: false });
      expect(requirePet(roster, 0).stats).toEqual({ attack: 3, health: 2 });
      expect(requirePet(roster, 0).item).toBeNull();
      expect(shop.log.events().map((e) => e.kind)).toContain('FOOD_EATEN');
      expect(shop.gold).toBe(4);
    });

    it('sell: 환불 후 자리를 비운다', () => {
      engine.shops.open(roster);
      engine.shops.buy(roster, 0, 0);
      const result = engine.shops.sell(roster, 0);
      expect(result).toEqual({ name: 'Ant', goldGained: 1 });
      expect(shop.gold).toBe(8);
      expect(roster.at(0)).toBeNull();
      expect(roster.sold.map((p) => p.name)).toEqual(['Ant']);
    });

    it('sell: 빈 자리/범위 밖', () => {
      engine.shops.open(roster);
      expect(() => engine.shops.sell(roster, 3)).toThrow(EmptySlotError);
      expect(() => engine.shops.sell(roster, 7)).toThrow(InvalidPositionError);
    });

    it('refundFor: 레벨 배수', () => {
      expect(engine.shops.refundFor(engine.pets.createPet('Ant'))).toBe(1);
      expect(engine.shops.refundFor(engine.pets.createPet('Ant', 2))).toBe(2);
      expect(engine.shops.refundFor(engine.pets.createPet('Ant', 3))).toBe(3);
    });

    it('roll: 골드 1, 얼린 슬롯은 유지', () => {
      engine.shops.open(roster);
      const frozen = shop.items[0];
      const other = shop.items[1];
      engine.shops.freeze(roster, 0);
      engine.shops.roll(roster);

      expect(shop.gold).toBe(9);
      expect(shop.rollCount).toBe(1);
      expect(shop.items).toHaveLength(4);
      expect(shop.items[0]).toBe(frozen);
      expect(shop.items[0].frozen).toBe(true);
      expect(shop.items[1]).not.toBe(other);

      engine.shops.unfreeze(roster, 0);
      engine.shops.roll(roster);
      expect(shop.items[0]).not.toBe(frozen);
    });

    it('roll: 골드 부족', () => {
      engine.shops.open(roster);
      shop.gold = 0;
      expect(() => engine.shops.roll(roster)).toThrow(InsufficientFundsError);
      expect(shop.rollCount).toBe(0);
    });

    it('freeze: 범위 밖 슬롯', () => {
      engine.shops.open(roster);
      expect(() => engine.shops.freeze(roster, 4)).toThrow(InvalidPositionError);
    });

    it('상점 RNG는 로스터 RNG를 건드리지 않는다', () => {
      const cursor = roster.rng.cursor;
      engine.shops.open(roster);
      engine.shops.roll(roster);
      expect(roster.rng.cursor).toBe(cursor);
    });

    it('close: 턴이 넘어가고 티어가 오른다', () => {
      engine.shops.open(roster);
      engine.shops.close(roster);
      expect(shop.state).toBe('CLOSED');
      expect(shop.turn).toBe(2);
      expect(shop.tier).toBe(1);

      engine.shops.open(roster);
      engine.shops.close(roster);
      expect(shop.turn).toBe(3);
      expect(shop.tier).toBe(2);
    });

    it('move: 상점이 열려 있을 때만', () => {
      roster.place(0, engine.pets.createPet('Ant'));
      expect(() => engine.shops.move(roster, 0, 2)).toThrow(InvalidShopStateError);
      engine.shops.open(roster);
      expect(() => engine.shops.move(roster, 1, 2)).toThrow(EmptySlotError);
      engine.shops.move(roster, 0, 2);
      expect(requirePet(roster, 2).name).toBe('Ant');
    });

    it('createShop: 티어 범위', () => {
      expect(() => engine.shops.createShop(0)).toThrow(InvalidTierError);
      expect(() => engine.shops.createShop(7)).toThrow(InvalidTierError);
      expect(() => engine.shops.createShop(1.5)).toThrow(InvalidTierError);
      const tier3 = engine.shops.createShop(3, 'test-seed');
      expect(tier3.tier).toBe(3);
      expect(tier3.turn).toBe(5);
    });

    it('slotCounts', () => {
      expect([1, 2, 3, 4, 5, 6].map((t) => engine.shops.slotCounts(t))).toEqual([
        { pets: 3, foods: 1 },
        { pets: 3, foods: 2 },
        { pets: 4, foods: 2 },
        { pets: 4, foods: 2 },
        { pets: 5, foods: 2 },
        { pets: 5, foods: 2 },
      ]);
    });
  });

  describe('기본 콘텐츠 효과', () => {
    let engine: Engine;

    beforeEach(async () => {
      engine = await createEngine();
    });

    const openWith = (pets: Pet[]) => {
      const roster = engine.rosters.create(pets, { name: 'A', seed: 'test-seed' });
      engine.shops.attach(roster);
      engine.shops.open(roster);
      return { roster, shop: requireShop(roster) };
    };

    const petItem = (name: string): ShopItem => ({
      kind: 'PET',
      name,
      cost: 3,
      frozen: false,
      pet: engine.pets.createPet(name),
    });

    const foodItem = (name: string): ShopItem => ({
      kind: 'FOOD',
      name,
      cost: engine.content.getFood(name).cost,
      frozen: false,
      food: engine.pets.createItem(name),
    });

    it('Pig: 팔면 골드 추가', () => {
      const { roster, shop } = openWith([engine.pets.createPet('Pig')]);
      engine.shops.sell(roster, 0);
      expect(shop.gold).toBe(12);
    });

    it('Duck: 팔면 상점 펫 체력 +1', () => {
      const { roster, shop } = openWith([engine.pets.createPet('Duck')]);
      const before = shop.petItems().map((i) => i.pet.stats.health);
      engine.shops.sell(roster, 0);
      expect(shop.petItems().map((i) => i.pet.stats.health)).toEqual(before.map((h) => h + 1));
    });

    it('Otter: 사면 다른 펫 +1/+1', () => {
      const { roster, shop } = openWith([engine.pets.createPet('Ant')]);
      shop.items.unshift(petItem('Otter'));
      engine.shops.buy(roster, 0, 1);
      expect(requirePet(roster, 0).stats).toEqual({ attack: 3, health: 2 });
      expect(requirePet(roster, 1).stats).toEqual({ attack: 1, health: 3 });
    });

    it('Sleeping Pill: 먹은 Cricket이 쓰러지고 그 자리에 소환', () => {
      const { roster, shop } = openWith([engine.pets.createPet('Cricket')]);
      shop.items.unshift(foodItem('Sleeping Pill'));
      engine.shops.buy(roster, 0, 0);
      expect(requirePet(roster, 0).name).toBe('Zombie Cricket');
      expect(roster.fainted.map((p) => p.name)).toEqual(['Cricket']);
      expect(shop.gold).toBe(9);
      expect(shop.log.events().map((e) => e.kind)).toEqual([
        'SHOP_START',
        'FAINT',
        'FOOD_EATEN',
        'SUMMONED',
      ]);
    });

    it('Sleeping Pill: 가득 찬 로스터에서 소환해도 슬롯은 capacity 그대로', () => {
      const { roster, shop } = openWith(
        ['Ant', 'Fish', 'Sheep', 'Duck', 'Pig'].map((name) => engine.pets.createPet(name)),
      );
      shop.items.unshift(foodItem('Sleeping Pill'));
      engine.shops.buy(roster, 0, 2);

      expect(roster.slotCount).toBe(roster.capacity);
      expect(roster.living().map((p) => `${p.name}@${p.position}`)).toEqual([
        'Ant@0',
        'Fish@1',
        'Ram@2',
        'Duck@3',
        'Pig@4',
      ]);
      expect(roster.fainted.map((p) => p.name)).toEqual(['Sheep']);
      engine.shops.sell(roster, 4);
      expect(roster.living()).toHaveLength(4);
    });

    it('Honey: 장착만 하고 효과는 기절 때', () => {
      const { roster, shop } = openWith([engine.pets.createPet('Ant')]);
      shop.items.unshift(foodItem('Honey'));
      engine.shops.buy(roster, 0, 0);
      expect(requirePet(roster, 0).item?.name).toBe('Honey');
      expect(requirePet(roster, 0).stats).toEqual({ attack: 2, health: 1 });
    });

    it('Canned Food: 상점 펫과 앞으로 나올 펫 강화', () => {
      const { roster, shop } = openWith([engine.pets.createPet('Ant')]);
      const before = shop.petItems().map((i) => ({ ...i.pet.stats }));
      shop.items.push(foodItem('Canned Food'));
      engine.shops.buy(roster, shop.items.length - 1, 0);

      expect(shop.perk).toEqual({ attack: 2, health: 1 });
      expect(shop.petItems().map((i) => i.pet.stats)).toEqual(
        before.map((s) => ({ attack: s.attack + 2, health: s.health + 1 })),
      );

      engine.shops.roll(roster);
      for (const item of shop.petItems()) {
        const base = engine.content.getPet(item.name).baseStats;
        expect(item.pet.stats).toEqual({ attack: base.attack + 2, health: base.health + 1 });
      }
    });

    it('Fish: 레벨업하면 다른 펫 강화, 다음 티어 펫 추가', () => {
      const fish = engine.pets.createPet('Fish', 1, { experience: 1 });
      const { roster, shop } = openWith([fish, engine.pets.createPet('Ant')]);
      shop.items.unshift(petItem('Fish'));
      const petsBefore = shop.petItems().length;

      const result = engine.shops.buy(roster, 0, 0);
      expect(result.levelsGained).toBe(1);
      expect(fish.level).toBe(2);
      expect(fish.stats).toEqual({ attack: 4, health: 4 });
      expect(requirePet(roster, 1).stats).toEqual({ attack: 3, health: 2 });

      const pets = shop.petItems();
      expect(pets).toHaveLength(petsBefore);
      expect(pets[pets.length - 1].pet.tier).toBe(2);
    });
  });
});
