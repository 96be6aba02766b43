// 체이닝 sugar: 각 호출은 ShopService 연산 하나이고, 실패하면 그 자리에서 던진다

import type { Roster } from '../roster/roster.js';
import type { Shop } from './shop.js';
import type { ShopService } from './shop.service.js';

export class ShopSession {
  constructor(
    private readonly shops: ShopService,
    readonly roster: Roster,
  ) {}

  get shop(): Shop | null {
    return this.roster.shop;
  }

  open(): this {
    this.shops.open(this.roster);
    return this;
  }

  close(): this {
    this.shops.close(this.roster);
    return this;
  }

  roll(): this {
    this.shops.roll(this.roster);
    return this;
  }

  freeze(slot: number): this {
    this.shops.freeze(this.roster, slot);
    return this;
  }

  unfreeze(slot: number): this {
    this.shops.unfreeze(this.roster, slot);
    return this;
  }

  buy(slot: number, destination: number): this {
    this.shops.buy(this.roster, slot, destination);
    return this;
  }

  sell(slot: number): this {
    this.shops.sell(this.roster, slot);
    return this;
  }

  move(from: number, to: number): this {
    this.shops.move(this.roster, from, to);
    return this;
  }
}
