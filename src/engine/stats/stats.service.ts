// 스탯 산술: 모든 연산은 [0, statCeiling] 으로 포화한다

import { Injectable } from '@nestjs/common';
import { EngineConfigService } from '../../config/engine-config.service.js';
import type { Stats } from '../../types/index.js';

@Injectable()
export class StatsService {
  constructor(private readonly config: EngineConfigService) {}

  /** 정수화 + 범위 고정. 입력은 건드리지 않는다 */
  clamp(stats: Stats): Stats {
    return { attack: this.clampValue(stats.attack), health: this.clampValue(stats.health) };
  }

  clampValue(value: number): number {
    if (!Number.isFinite(value)) return value > 0 ? this.config.get().statCeiling : 0;
    return Math.max(0, Math.min(this.config.get().statCeiling, Math.round(value)));
  }

  // 아래 연산은 target을 제자리에서 바꾸고 그대로 반환

  add(target: Stats, delta: Stats): Stats {
    target.attack = this.clampValue(target.attack + delta.attack);
    target.health = this.clampValue(target.health + delta.health);
    return target;
  }

  subtract(target: Stats, delta: Stats): Stats {
    target.attack = this.clampValue(target.attack - delta.attack);
    target.health = this.clampValue(target.health - delta.health);
    return target;
  }

  set(target: Stats, value: Stats): Stats {
    target.attack = this.clampValue(value.attack);
    target.health = this.clampValue(value.health);
    return target;
  }

  swap(a: Stats, b: Stats): void {
    const copy = { ...a };
    this.set(a, b);
    this.set(b, copy);
  }

  /** 각 스탯의 큰 값 (merge 규칙) */
  max(a: Stats, b: Stats): Stats {
    return this.clamp({
      attack: Math.max(a.attack, b.attack),
      health: Math.max(a.health, b.health),
    });
  }
}
