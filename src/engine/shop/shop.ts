// 상점 상태: 티어, 슬롯, 골드, 전용 RNG 스트림

import type { Effect, ShopItem, ShopState, Stats } from '../../types/index.js';
import { EventLog } from '../log/event-log.js';
import type { Rng } from '../rng/rng.service.js';

export class Shop {
  state: ShopState = 'CLOSED';
  gold = 0;
  items: ShopItem[] = [];
  rollCount = 0;
  /** 앞으로 나올 상점 펫에 더해지는 스탯 (Canned Food) */
  perk: Stats = { attack: 0, health: 0 };
  /** 상점 단위 효과 */
  effects: Effect[] = [];
  /** 현재 open~close 세션 로그 */
  log = new EventLog();
  phaseCounter = 0;
  private nextItemId = 1;

  constructor(
    public tier: number,
    readonly rng: Rng,
    public turn = 1,
  ) {}

  isOpen(): boolean {
    return this.state === 'OPEN';
  }

  petItems(): Extract<ShopItem, { kind: 'PET' }>[] {
    return this.items.filter((i): i is Extract<ShopItem, { kind: 'PET' }> => i.kind === 'PET');
  }

  foodItems(): Extract<ShopItem, { kind: 'FOOD' }>[] {
    return this.items.filter((i): i is Extract<ShopItem, { kind: 'FOOD' }> => i.kind === 'FOOD');
  }

  nextId(): string {
    const id = `shop-${this.nextItemId}`;
    this.nextItemId += 1;
    return id;
  }
}
