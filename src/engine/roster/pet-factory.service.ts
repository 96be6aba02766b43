// 정의 → 살아있는 펫/아이템 인스턴스, 경험치/레벨업

import { Injectable } from '@nestjs/common';
import { EngineConfigService } from '../../config/engine-config.service.js';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import type { Effect, EffectOwnerKind, EffectSpec, Item, Pet, Stats } from '../../types/index.js';
import { StatsService } from '../stats/stats.service.js';

export interface PetOverrides {
  stats?: Partial<Stats>;
  experience?: number;
}

@Injectable()
export class PetFactoryService {
  constructor(
    private readonly content: ContentLoaderService,
    private readonly stats: StatsService,
    private readonly config: EngineConfigService,
  ) {}

  /** 로스터에 놓이기 전까지 id 는 비어있다 */
  createPet(name: string, level = 1, overrides: PetOverrides = {}): Pet {
    const maxLevel = this.config.get().maxPetLevel;
    const clampedLevel = Math.max(1, Math.min(level, maxLevel));
    const experience = overrides.experience ?? this.experienceFor(clampedLevel);
    const def = this.content.getPet(name, this.levelFor(experience));
    const bonus = experience * this.config.get().mergeStatBonus;

    return {
      id: '',
      name: def.name,
      tier: def.tier,
      level: def.level,
      experience,
      stats: this.stats.clamp({
        attack: overrides.stats?.attack ?? def.baseStats.attack + bonus,
        health: overrides.stats?.health ?? def.baseStats.health + bonus,
      }),
      temporaryStats: { attack: 0, health: 0 },
      item: null,
      effects: this.instantiateAll(def.effects, 'PET', `${def.name}#L${def.level}`),
      cost: def.cost,
      position: null,
      fainted: false,
    };
  }

  createItem(foodName: string): Item {
    const def = this.content.getFood(foodName);
    return {
      name: def.name,
      tier: def.tier,
      effect: def.effect ? this.instantiate(def.effect, 'ITEM', `${def.name}#0`) : null,
      modifier: def.modifier,
      holdable: def.holdable,
      singleUse: def.singleUse,
      usesRemaining: def.uses,
    };
  }

  instantiate(spec: EffectSpec, ownerKind: EffectOwnerKind, id: string): Effect {
    return {
      id,
      ownerKind,
      trigger: { ...spec.trigger },
      target: structuredClone(spec.target),
      action: structuredClone(spec.action),
      usesRemaining: spec.uses,
      temporary: spec.temporary ?? false,
    };
  }

  /** 레벨 L 도달에 필요한 누적 경험치: 1→0, 2→2, 3→5 */
  experienceFor(level: number): number {
    return ((level - 1) * (level + 2)) / 2;
  }

  levelFor(experience: number): number {
    const maxLevel = this.config.get().maxPetLevel;
    let level = 1;
    while (level < maxLevel && experience >= this.experienceFor(level + 1)) level += 1;
    return level;
  }

  canLevel(pet: Pet): boolean {
    return pet.level < this.config.get().maxPetLevel;
  }

  /**
   * 경험치 1당 +bonus/+bonus. 최대 레벨 경험치에서 멈춘다.
   * 올라간 레벨 수를 반환하고, 레벨이 바뀌면 효과를 새 레벨 것으로 교체한다.
   */
  addExperience(pet: Pet, amount: number): number {
    const cap = this.experienceFor(this.config.get().maxPetLevel);
    const gained = Math.max(0, Math.min(amount, cap - pet.experience));
    if (gained === 0) return 0;

    pet.experience += gained;
    const bonus = gained * this.config.get().mergeStatBonus;
    this.stats.add(pet.stats, { attack: bonus, health: bonus });

    const level = this.levelFor(pet.experience);
    const levelsGained = level - pet.level;
    if (levelsGained > 0) {
      pet.level = level;
      const def = this.content.getPet(pet.name, level);
      pet.effects = this.instantiateAll(def.effects, 'PET', `${def.name}#L${level}`);
    }
    return levelsGained;
  }

  private instantiateAll(specs: readonly EffectSpec[], ownerKind: EffectOwnerKind, prefix: string) {
    return specs.map((spec, i) => this.instantiate(spec, ownerKind, `${prefix}.${i}`));
  }
}
