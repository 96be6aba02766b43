// pets_v1 콘텐츠 타입

import type { EffectSpec, ItemModifier, Stats } from '../types/index.js';

/** pets.json 한 줄: 레벨별 효과 목록 포함 */
export interface PetContent {
  name: string;
  tier: number;
  cost: number;
  attack: number;
  health: number;
  packs: string[];
  token?: boolean;
  levels: Record<string, EffectSpec[]>;
}

export interface FoodContent {
  name: string;
  tier: number;
  cost: number;
  packs: string[];
  holdable: boolean;
  singleUse: boolean;
  uses: number | null;
  effect?: EffectSpec;
  modifier?: ItemModifier;
  token?: boolean;
}

/** 레벨이 확정된 불변 펫 정의 */
export interface PetDefinition {
  readonly name: string;
  readonly tier: number;
  readonly level: number;
  readonly baseStats: Readonly<Stats>;
  readonly packs: readonly string[];
  readonly effects: readonly EffectSpec[];
  readonly cost: number;
  readonly token: boolean;
}

export interface FoodDefinition {
  readonly name: string;
  readonly tier: number;
  readonly packs: readonly string[];
  readonly cost: number;
  readonly holdable: boolean;
  readonly singleUse: boolean;
  readonly uses: number | null;
  readonly effect: EffectSpec | null;
  readonly modifier: ItemModifier | null;
  readonly token: boolean;
}

/** 엔티티 정의 공급자: 없는 이름은 UnknownEntityError */
export interface EntityProvider {
  getPet(name: string, level?: number): PetDefinition;
  getFood(name: string): FoodDefinition;
  listPets(maxTier: number, pack: string): PetDefinition[];
  listFoods(maxTier: number, pack: string): FoodDefinition[];
}
