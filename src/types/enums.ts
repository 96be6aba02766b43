// 엔진 공통 열거형

export const SIDE = ['A', 'B'] as const;
export type Side = (typeof SIDE)[number];

export const TRIGGER_KIND = [
  // 전투
  'START_OF_BATTLE',
  'TURN_START',
  'BEFORE_ATTACK',
  'ATTACK',
  'DAMAGE',
  'HURT',
  'FAINT',
  'KNOCK_OUT',
  'SUMMONED',
  'AFTER_ATTACK',
  'END_OF_TURN',
  'END_OF_BATTLE',
  // 상점
  'SHOP_START',
  'SHOP_END',
  'BUY',
  'SELL',
  'ROLL',
  'FOOD_EATEN',
  'LEVEL_UP',
  'ITEM_GAINED',
] as const;
export type TriggerKind = (typeof TRIGGER_KIND)[number];

export const TRIGGER_SCOPE = [
  'SELF',
  'FRIEND',
  'FRIEND_AHEAD',
  'ENEMY',
  'ANY',
  'GLOBAL',
] as const;
export type TriggerScope = (typeof TRIGGER_SCOPE)[number];

export const BATTLE_PHASE = [
  'START_OF_BATTLE',
  'TURN_START',
  'BEFORE_ATTACK',
  'ATTACK',
  'FAINT_CLEANUP',
  'AFTER_ATTACK',
  'END_OF_TURN',
  'TERMINAL',
] as const;
export type BattlePhase = (typeof BATTLE_PHASE)[number];

export const SHOP_PHASE = ['SHOP_OPEN', 'SHOP_ACTION', 'SHOP_CLOSE'] as const;
export type ShopPhase = (typeof SHOP_PHASE)[number];

export type EnginePhase = BattlePhase | ShopPhase;

export const BATTLE_OUTCOME = ['SIDE_A_WIN', 'SIDE_B_WIN', 'DRAW'] as const;
export type BattleOutcome = (typeof BATTLE_OUTCOME)[number];

export const SHOP_STATE = ['OPEN', 'CLOSED'] as const;
export type ShopState = (typeof SHOP_STATE)[number];

export const TEAM_TARGET = ['FRIEND', 'ENEMY', 'BOTH'] as const;
export type TeamTarget = (typeof TEAM_TARGET)[number];

export const STAT_KEY = ['attack', 'health'] as const;
export type StatKey = (typeof STAT_KEY)[number];

export const EFFECT_OWNER_KIND = ['PET', 'ITEM', 'SHOP'] as const;
export type EffectOwnerKind = (typeof EFFECT_OWNER_KIND)[number];
