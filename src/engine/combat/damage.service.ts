// 피해 계산: 공격 보너스/피해 감소/무적/즉사 아이템 반영

import { Injectable } from '@nestjs/common';
import { EngineConfigService } from '../../config/engine-config.service.js';
import type { ItemModifier, Pet } from '../../types/index.js';
import { StatsService } from '../stats/stats.service.js';

export interface HitResult {
  damage: number;
  lethal: boolean;
  /** 공격자 아이템(공격 보너스/즉사)이 쓰였는지 */
  attackerItemUsed: boolean;
  /** 방어자 아이템(감소/무적)이 쓰였는지 */
  defenderItemUsed: boolean;
}

@Injectable()
export class DamageService {
  constructor(
    private readonly config: EngineConfigService,
    private readonly stats: StatsService,
  ) {}

  /** 공격 1회 계산. 상태는 바꾸지 않는다 (동시 공격 스냅샷용) */
  resolveAttack(attacker: Pet, defender: Pet): HitResult {
    const mod = this.activeModifier(attacker);
    const bonus = mod?.kind === 'ATTACK_BONUS' ? mod.amount : 0;
    const reduced = this.reduce(defender, attacker.stats.attack + bonus);
    const lethal = mod?.kind === 'DEATHTOUCH' && reduced.damage > 0;

    return {
      damage: lethal ? defender.stats.health : reduced.damage,
      lethal,
      attackerItemUsed: bonus > 0 || lethal,
      defenderItemUsed: reduced.used,
    };
  }

  /** 효과 피해: 방어자 아이템만 반영해서 바로 적용. 계산된 피해량 반환 */
  applyIndirect(defender: Pet, amount: number): number {
    const { damage, used } = this.reduce(defender, amount);
    if (used) this.consumeItem(defender);
    this.stats.subtract(defender.stats, { attack: 0, health: damage });
    return damage;
  }

  applyHit(attacker: Pet, defender: Pet, hit: HitResult): number {
    if (hit.attackerItemUsed) this.consumeItem(attacker);
    if (hit.defenderItemUsed) this.consumeItem(defender);
    this.stats.subtract(defender.stats, { attack: 0, health: hit.damage });
    return hit.damage;
  }

  /** 사용 횟수 차감. 일회용이 바닥나면 아이템 제거 */
  consumeItem(pet: Pet): void {
    const item = pet.item;
    if (!item || item.usesRemaining === null) return;
    item.usesRemaining = Math.max(0, item.usesRemaining - 1);
    if (item.usesRemaining === 0 && item.singleUse) pet.item = null;
  }

  activeModifier(pet: Pet): ItemModifier | null {
    const item = pet.item;
    if (!item?.modifier || item.usesRemaining === 0) return null;
    return item.modifier;
  }

  private reduce(defender: Pet, raw: number): { damage: number; used: boolean } {
    // 공격력이 있으면 최소 1
    const floor = raw > 0 ? 1 : 0;
    const mod = this.activeModifier(defender);
    if (mod?.kind === 'INVINCIBLE') return { damage: 0, used: true };
    if (mod?.kind === 'DAMAGE_REDUCTION') {
      const min = mod.negateFully ? 0 : floor;
      return { damage: this.cap(raw - mod.amount, min), used: true };
    }
    return { damage: this.cap(raw, floor), used: false };
  }

  private cap(value: number, min: number): number {
    return Math.max(min, Math.min(this.config.get().maxDamage, value));
  }
}
