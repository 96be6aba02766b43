// 상점 경제: open/close, roll, freeze, buy(merge), sell, move
//
// 모든 연산은 검증을 끝낸 뒤에만 상태를 바꾼다. 실패한 호출은 상점/로스터를 그대로 둔다.

import { Injectable, Logger } from '@nestjs/common';
import {
  EmptySlotError,
  InsufficientFundsError,
  InvalidPositionError,
  InvalidShopStateError,
  InvalidTierError,
} from '../../common/errors/game-errors.js';
import { EngineConfigService } from '../../config/engine-config.service.js';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import type { EventDraft, Pet, ShopItem, ShopPhase } from '../../types/index.js';
import { createContext, entityRef } from '../effects/engine-context.js';
import type { EngineContext } from '../effects/engine-context.js';
import { TriggerQueueService } from '../effects/trigger-queue.service.js';
import { EventLog } from '../log/event-log.js';
import { RngService } from '../rng/rng.service.js';
import type { Seed } from '../rng/rng.service.js';
import { PetFactoryService } from '../roster/pet-factory.service.js';
import type { Roster } from '../roster/roster.js';
import { StatsService } from '../stats/stats.service.js';
import { Shop } from './shop.js';
import { ShopSession } from './shop-session.js';

type PetItem = Extract<ShopItem, { kind: 'PET' }>;
type FoodItem = Extract<ShopItem, { kind: 'FOOD' }>;

export interface BuyResult {
  kind: ShopItem['kind'];
  name: string;
  goldSpent: number;
  /** 구매한 펫이 놓인 자리 또는 음식을 먹은 펫 */
  target: Pet;
  merged: boolean;
  levelsGained: number;
}

export interface SellResult {
  name: string;
  goldGained: number;
}

@Injectable()
export class ShopService {
  private readonly logger = new Logger(ShopService.name);

  constructor(
    private readonly config: EngineConfigService,
    private readonly content: ContentLoaderService,
    private readonly pets: PetFactoryService,
    private readonly stats: StatsService,
    private readonly queue: TriggerQueueService,
    private readonly rng: RngService,
  ) {}

  /** 티어 1..maxTier. 상점은 닫힌 채로 만들어지고 open 때 재고가 채워진다 */
  createShop(tier = 1, seed?: Seed): Shop {
    const maxTier = this.config.get().maxTier;
    if (!Number.isInteger(tier) || tier < 1 || tier > maxTier) {
      throw new InvalidTierError(tier, maxTier);
    }
    return new Shop(tier, this.rng.create(seed), tier * 2 - 1);
  }

  /** 로스터에 상점을 붙인다. 로스터 스트림과 독립된 seed 를 쓴다 */
  attach(roster: Roster, shop: Shop = this.createShop(1, `${roster.rng.seed}:shop`)): Shop {
    roster.shop = shop;
    return shop;
  }

  session(roster: Roster): ShopSession {
    return new ShopSession(this, roster);
  }

  /** 티어별 슬롯 수 */
  slotCounts(tier: number): { pets: number; foods: number } {
    return {
      pets: tier < 3 ? 3 : tier < 5 ? 4 : 5,
      foods: tier < 2 ? 1 : 2,
    };
  }

  open(roster: Roster): void {
    const shop = this.requireShop(roster);
    if (shop.isOpen()) throw new InvalidShopStateError('Shop is already open');

    // 지난 턴 임시 스탯 제거
    for (const pet of roster.occupied()) {
      this.stats.set(pet.stats, {
        attack: pet.stats.attack - pet.temporaryStats.attack,
        health: Math.max(1, pet.stats.health - pet.temporaryStats.health),
      });
      pet.temporaryStats = { attack: 0, health: 0 };
    }

    shop.state = 'OPEN';
    shop.gold = this.config.get().startingGold;
    shop.log = new EventLog();
    shop.phaseCounter = 0;
    this.restock(shop);
    this.dispatch(roster, shop, 'SHOP_OPEN', [{ kind: 'SHOP_START', side: 'A' }]);
    this.logger.debug(`${roster.name}: shop open (turn ${shop.turn}, tier ${shop.tier})`);
  }

  close(roster: Roster): void {
    const shop = this.requireOpen(roster);
    this.dispatch(roster, shop, 'SHOP_CLOSE', [{ kind: 'SHOP_END', side: 'A' }]);
    shop.state = 'CLOSED';
    shop.turn += 1;
    const maxTier = this.config.get().maxTier;
    shop.tier = Math.max(shop.tier, Math.min(maxTier, Math.ceil(shop.turn / 2)));
    this.logger.debug(`${roster.name}: shop closed, next turn ${shop.turn}`);
  }

  roll(roster: Roster): void {
    const shop = this.requireOpen(roster);
    const cost = this.config.get().rollCost;
    if (shop.gold < cost) throw new InsufficientFundsError(cost, shop.gold);

    shop.gold -= cost;
    this.restock(shop);
    shop.rollCount += 1;
    this.dispatch(roster, shop, 'SHOP_ACTION', [{ kind: 'ROLL', side: 'A' }]);
  }

  freeze(roster: Roster, slot: number): void {
    this.itemAt(this.requireOpen(roster), slot).frozen = true;
  }

  unfreeze(roster: Roster, slot: number): void {
    this.itemAt(this.requireOpen(roster), slot).frozen = false;
  }

  buy(roster: Roster, slot: number, destination: number): BuyResult {
    const shop = this.requireOpen(roster);
    const item = this.itemAt(shop, slot);
    if (item.cost > shop.gold) throw new InsufficientFundsError(item.cost, shop.gold);
    this.checkPosition(roster, destination);

    const result =
      item.kind === 'PET'
        ? this.buyPet(roster, shop, slot, item, destination)
        : this.buyFood(roster, shop, slot, item, destination);
    this.logger.debug(
      `${roster.name}: bought ${item.name} for ${item.cost} (gold left ${shop.gold})`,
    );
    return result;
  }

  sell(roster: Roster, slot: number): SellResult {
    const shop = this.requireOpen(roster);
    this.checkPosition(roster, slot);
    const pet = roster.at(slot);
    if (!pet) throw new EmptySlotError(slot);

    const refund = this.refundFor(pet);
    shop.gold += refund;
    // SELL 효과는 펫이 아직 제자리에 있을 때 처리
    this.dispatch(roster, shop, 'SHOP_ACTION', [
      { kind: 'SELL', side: 'A', subject: entityRef('A', pet), payload: { gold: refund } },
    ]);
    if (roster.removeById(pet.id)) roster.sold.push(pet);
    this.logger.debug(`${roster.name}: sold ${pet.name} for ${refund}`);
    return { name: pet.name, goldGained: refund };
  }

  move(roster: Roster, from: number, to: number): void {
    this.requireOpen(roster);
    this.checkPosition(roster, from);
    this.checkPosition(roster, to);
    if (!roster.at(from)) throw new EmptySlotError(from);
    roster.move(from, to);
  }

  /** 판매 환불: max(1, round(비용 × 비율)) × 레벨 */
  refundFor(pet: Pet): number {
    return Math.max(1, Math.round(pet.cost * this.config.get().sellRefundRate)) * pet.level;
  }

  private buyPet(
    roster: Roster,
    shop: Shop,
    slot: number,
    item: PetItem,
    destination: number,
  ): BuyResult {
    const occupant = roster.at(destination);
    if (occupant && (occupant.name !== item.name || !this.pets.canLevel(occupant))) {
      throw new InvalidPositionError(`Slot ${destination} holds ${occupant.name}`, {
        destination,
        occupant: occupant.name,
      });
    }

    shop.gold -= item.cost;
    shop.items.splice(slot, 1);

    let target: Pet;
    let levelsGained = 0;
    if (occupant) {
      // merge: 스탯별 최대값 + 경험치
      target = occupant;
      this.stats.set(target.stats, this.stats.max(occupant.stats, item.pet.stats));
      levelsGained = this.pets.addExperience(target, 1 + item.pet.experience);
    } else {
      target = roster.place(destination, item.pet);
    }

    const subject = entityRef('A', target);
    const drafts: EventDraft[] = [{ kind: 'BUY', side: 'A', subject, payload: { gold: item.cost } }];
    if (levelsGained > 0) {
      drafts.push({ kind: 'LEVEL_UP', side: 'A', subject, payload: { level: target.level } });
    }
    this.dispatch(roster, shop, 'SHOP_ACTION', drafts);

    return {
      kind: 'PET',
      name: item.name,
      goldSpent: item.cost,
      target,
      merged: occupant !== null,
      levelsGained,
    };
  }

  private buyFood(
    roster: Roster,
    shop: Shop,
    slot: number,
    item: FoodItem,
    destination: number,
  ): BuyResult {
    const pet = roster.at(destination);
    if (!pet) throw new EmptySlotError(destination);

    shop.gold -= item.cost;
    shop.items.splice(slot, 1);

    const food = item.food;
    const level = pet.level;
    const eaten: EventDraft = {
      kind: 'FOOD_EATEN',
      side: 'A',
      subject: entityRef('A', pet),
      payload: { item: food.name },
    };
    if (food.holdable) {
      pet.item = food;
      this.dispatch(roster, shop, 'SHOP_ACTION', [eaten]);
    } else {
      this.dispatch(roster, shop, 'SHOP_ACTION', [eaten], (ctx) => {
        if (food.effect) this.queue.applyNow(ctx, { side: 'A', pet }, food.effect, null);
      });
    }

    return {
      kind: 'FOOD',
      name: item.name,
      goldSpent: item.cost,
      target: pet,
      merged: false,
      levelsGained: pet.level - level,
    };
  }

  /** 상점 문맥으로 이벤트를 넣고 큐를 비운다 */
  private dispatch(
    roster: Roster,
    shop: Shop,
    phase: ShopPhase,
    drafts: EventDraft[],
    before?: (ctx: EngineContext) => void,
  ): void {
    const ctx = createContext('SHOP', roster, null, shop.log, {
      phase,
      phaseIndex: shop.phaseCounter,
      turn: shop.turn,
    });
    this.queue.beginPhase(ctx, phase);
    before?.(ctx);
    for (const draft of drafts) this.queue.enqueue(ctx, draft);
    this.queue.drain(ctx);
    shop.phaseCounter = ctx.phaseIndex;
    // 상점에서는 빈칸을 당기지 않는다
    roster.removeFainted();

    // 레벨업마다 한 단계 위 티어 펫 하나
    const levelUps = shop.log
      .events()
      .filter((e) => e.phaseIndex === ctx.phaseIndex && e.kind === 'LEVEL_UP').length;
    for (let i = 0; i < levelUps; i++) this.addLevelUpPet(shop);
  }

  /** 얼린 슬롯은 그대로, 나머지는 새로 뽑고 빈 슬롯을 채운다 */
  private restock(shop: Shop): void {
    const counts = this.slotCounts(shop.tier);
    const pets = this.refill(shop.petItems(), counts.pets, () => this.drawPet(shop, shop.tier));
    const foods = this.refill(shop.foodItems(), counts.foods, () => this.drawFood(shop));
    shop.items = [...pets, ...foods];
  }

  private refill<T extends ShopItem>(current: T[], slots: number, draw: () => T | null): T[] {
    const out: T[] = [];
    for (const item of current) {
      const next = item.frozen ? item : draw();
      if (next) out.push(next);
    }
    while (out.length < slots) {
      const next = draw();
      if (!next) break;
      out.push(next);
    }
    return out;
  }

  private drawPet(shop: Shop, tier: number, exactTier = false): PetItem | null {
    const { pack } = this.config.get();
    const pool = this.content
      .listPets(tier, pack)
      .filter((def) => !exactTier || def.tier === tier);
    const def = shop.rng.pick(pool);
    if (!def) return null;
    const pet = this.pets.createPet(def.name, 1);
    pet.id = shop.nextId();
    this.stats.add(pet.stats, shop.perk);
    return { kind: 'PET', name: def.name, cost: def.cost, frozen: false, pet };
  }

  private drawFood(shop: Shop): FoodItem | null {
    const def = shop.rng.pick(this.content.listFoods(shop.tier, this.config.get().pack));
    if (!def) return null;
    return {
      kind: 'FOOD',
      name: def.name,
      cost: def.cost,
      frozen: false,
      food: this.pets.createItem(def.name),
    };
  }

  /** 레벨업 보너스: 다음 티어 펫을 펫 슬롯 끝에 추가 */
  private addLevelUpPet(shop: Shop): void {
    const { maxShopPets, maxTier } = this.config.get();
    const pets = shop.petItems();
    if (pets.length >= maxShopPets) return;
    const tier = Math.min(shop.tier + 1, maxTier);
    const bonus = this.drawPet(shop, tier, true) ?? this.drawPet(shop, tier);
    if (!bonus) return;
    shop.items = [...pets, bonus, ...shop.foodItems()];
  }

  private requireShop(roster: Roster): Shop {
    if (!roster.shop) throw new InvalidShopStateError(`Roster ${roster.name} has no shop`);
    return roster.shop;
  }

  private requireOpen(roster: Roster): Shop {
    const shop = this.requireShop(roster);
    if (!shop.isOpen()) throw new InvalidShopStateError('Shop is closed');
    return shop;
  }

  private itemAt(shop: Shop, slot: number): ShopItem {
    const item = shop.items[slot];
    if (!Number.isInteger(slot) || !item) {
      throw new InvalidPositionError(`Shop slot ${slot} outside 0..${shop.items.length - 1}`, {
        slot,
      });
    }
    return item;
  }

  private checkPosition(roster: Roster, position: number): void {
    if (!Number.isInteger(position) || position < 0 || position >= roster.capacity) {
      throw new InvalidPositionError(`Position ${position} outside 0..${roster.capacity - 1}`, {
        position,
      });
    }
  }
}
