import type { Effect } from './effect.js';
import type { Stats } from './stats.js';

export type ItemModifier =
  | { kind: 'ATTACK_BONUS'; amount: number }
  | { kind: 'DAMAGE_REDUCTION'; amount: number; negateFully?: boolean }
  | { kind: 'INVINCIBLE' }
  | { kind: 'DEATHTOUCH' };

export interface Item {
  name: string;
  tier: number;
  effect: Effect | null;
  modifier: ItemModifier | null;
  holdable: boolean;
  singleUse: boolean;
  /** 수식어 사용 가능 횟수. null = 무제한 */
  usesRemaining: number | null;
}

export interface Pet {
  id: string;
  name: string;
  tier: number;
  level: number;
  experience: number;
  stats: Stats;
  /** 상점 턴 동안만 유지되는 스탯 (다음 open 때 제거) */
  temporaryStats: Stats;
  item: Item | null;
  effects: Effect[];
  cost: number;
  /** 슬롯 인덱스. 로스터 밖이면 null */
  position: number | null;
  fainted: boolean;
}
