// Effect / Action / TargetSelector: 닫힌 태그 유니온

import type {
  EffectOwnerKind,
  StatKey,
  TeamTarget,
  TriggerKind,
  TriggerScope,
} from './enums.js';
import type { Stats } from './stats.js';

export interface EffectTrigger {
  kind: TriggerKind;
  scope: TriggerScope;
}

export type TargetSelector =
  | { kind: 'SELF' }
  | { kind: 'NONE' }
  | { kind: 'AHEAD'; count: number }
  | { kind: 'BEHIND'; count: number }
  | { kind: 'ADJACENT' }
  | { kind: 'ALL'; team: TeamTarget; excludeSelf?: boolean }
  | { kind: 'RANDOM'; team: TeamTarget; count: number; excludeSelf?: boolean }
  | { kind: 'POSITION'; team: TeamTarget; index: number }
  | { kind: 'LOWEST'; team: TeamTarget; stat: StatKey; count?: number; excludeSelf?: boolean }
  | { kind: 'HIGHEST'; team: TeamTarget; stat: StatKey; count?: number; excludeSelf?: boolean }
  | { kind: 'TRIGGER_SUBJECT' }
  | { kind: 'TRIGGER_SOURCE' }
  | { kind: 'SHOP_PETS' };

export type Action =
  | { kind: 'DAMAGE'; amount: number }
  | { kind: 'ADD_STATS'; stats: Stats; temporary?: boolean }
  | { kind: 'REMOVE_STATS'; stats: Stats }
  | { kind: 'SET_STATS'; stats: Stats }
  | { kind: 'GIVE_ATTACK_PERCENT'; percent: number }
  | { kind: 'SWAP_STATS' }
  | { kind: 'SUMMON'; pet: string; level?: number; stats?: Stats }
  | { kind: 'GRANT_ITEM'; food: string }
  | { kind: 'GAIN_EXPERIENCE'; amount: number }
  | { kind: 'KILL' }
  | { kind: 'GAIN_GOLD'; amount: number }
  | { kind: 'ADD_SHOP_PERK'; stats: Stats }
  | { kind: 'GRANT_EFFECT'; effect: EffectSpec }
  | { kind: 'MULTIPLE'; actions: Action[] };

export type ActionKind = Action['kind'];

/** 콘텐츠에 기록되는 효과 템플릿 */
export interface EffectSpec {
  trigger: EffectTrigger;
  target: TargetSelector;
  action: Action;
  /** null = 무제한 */
  uses: number | null;
  temporary?: boolean;
}

/** 펫/아이템/상점에 붙은 살아있는 효과 */
export interface Effect {
  id: string;
  ownerKind: EffectOwnerKind;
  trigger: EffectTrigger;
  target: TargetSelector;
  action: Action;
  usesRemaining: number | null;
  /** 만들어진 drain 이 끝나면 제거 */
  temporary: boolean;
}
