// 콘텐츠 JSON 검증 스키마 (zod)

import { z } from 'zod';
import {
  STAT_KEY,
  TEAM_TARGET,
  TRIGGER_KIND,
  TRIGGER_SCOPE,
} from '../types/index.js';
import type { Action, EffectSpec, ItemModifier, Stats, TargetSelector } from '../types/index.js';
import type { FoodContent, PetContent } from './content.types.js';

const count = z.number().int().positive();

export const StatsSchema: z.ZodType<Stats> = z.object({
  attack: z.number().int(),
  health: z.number().int(),
});

export const TargetSelectorSchema: z.ZodType<TargetSelector> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('SELF') }),
  z.object({ kind: z.literal('NONE') }),
  z.object({ kind: z.literal('AHEAD'), count }),
  z.object({ kind: z.literal('BEHIND'), count }),
  z.object({ kind: z.literal('ADJACENT') }),
  z.object({
    kind: z.literal('ALL'),
    team: z.enum(TEAM_TARGET),
    excludeSelf: z.boolean().optional(),
  }),
  z.object({
    kind: z.literal('RANDOM'),
    team: z.enum(TEAM_TARGET),
    count,
    excludeSelf: z.boolean().optional(),
  }),
  z.object({ kind: z.literal('POSITION'), team: z.enum(TEAM_TARGET), index: z.number().int() }),
  z.object({
    kind: z.literal('LOWEST'),
    team: z.enum(TEAM_TARGET),
    stat: z.enum(STAT_KEY),
    count: count.optional(),
    excludeSelf: z.boolean().optional(),
  }),
  z.object({
    kind: z.literal('HIGHEST'),
    team: z.enum(TEAM_TARGET),
    stat: z.enum(STAT_KEY),
    count: count.optional(),
    excludeSelf: z.boolean().optional(),
  }),
  z.object({ kind: z.literal('TRIGGER_SUBJECT') }),
  z.object({ kind: z.literal('TRIGGER_SOURCE') }),
  z.object({ kind: z.literal('SHOP_PETS') }),
]);

// MULTIPLE / GRANT_EFFECT 가 재귀하므로 lazy
export const ActionSchema: z.ZodType<Action> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('DAMAGE'), amount: z.number().int().nonnegative() }),
    z.object({
      kind: z.literal('ADD_STATS'),
      stats: StatsSchema,
      temporary: z.boolean().optional(),
    }),
    z.object({ kind: z.literal('REMOVE_STATS'), stats: StatsSchema }),
    z.object({ kind: z.literal('SET_STATS'), stats: StatsSchema }),
    z.object({ kind: z.literal('GIVE_ATTACK_PERCENT'), percent: z.number().positive() }),
    z.object({ kind: z.literal('SWAP_STATS') }),
    z.object({
      kind: z.literal('SUMMON'),
      pet: z.string().min(1),
      level: z.number().int().positive().optional(),
      stats: StatsSchema.optional(),
    }),
    z.object({ kind: z.literal('GRANT_ITEM'), food: z.string().min(1) }),
    z.object({ kind: z.literal('GAIN_EXPERIENCE'), amount: count }),
    z.object({ kind: z.literal('KILL') }),
    z.object({ kind: z.literal('GAIN_GOLD'), amount: count }),
    z.object({ kind: z.literal('ADD_SHOP_PERK'), stats: StatsSchema }),
    z.object({ kind: z.literal('GRANT_EFFECT'), effect: EffectSpecSchema }),
    z.object({ kind: z.literal('MULTIPLE'), actions: z.array(ActionSchema).min(1) }),
  ]),
);

export const EffectSpecSchema: z.ZodType<EffectSpec> = z.lazy(() =>
  z.object({
    trigger: z.object({
      kind: z.enum(TRIGGER_KIND),
      scope: z.enum(TRIGGER_SCOPE),
    }),
    target: TargetSelectorSchema,
    action: ActionSchema,
    uses: count.nullable(),
    temporary: z.boolean().optional(),
  }),
);

export const ItemModifierSchema: z.ZodType<ItemModifier> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('ATTACK_BONUS'), amount: count }),
  z.object({
    kind: z.literal('DAMAGE_REDUCTION'),
    amount: count,
    negateFully: z.boolean().optional(),
  }),
  z.object({ kind: z.literal('INVINCIBLE') }),
  z.object({ kind: z.literal('DEATHTOUCH') }),
]);

const tier = z.number().int().min(1).max(6);

export const PetContentSchema: z.ZodType<PetContent> = z.object({
  name: z.string().min(1),
  tier,
  cost: z.number().int().nonnegative(),
  attack: z.number().int().nonnegative(),
  health: z.number().int().positive(),
  packs: z.array(z.string().min(1)),
  token: z.boolean().optional(),
  levels: z.record(z.string().regex(/^[1-9]$/), z.array(EffectSpecSchema)),
});

export const FoodContentSchema: z.ZodType<FoodContent> = z.object({
  name: z.string().min(1),
  tier,
  cost: z.number().int().nonnegative(),
  packs: z.array(z.string().min(1)),
  holdable: z.boolean(),
  singleUse: z.boolean(),
  uses: count.nullable(),
  effect: EffectSpecSchema.optional(),
  modifier: ItemModifierSchema.optional(),
  token: z.boolean().optional(),
});

export const PetContentListSchema = z.array(PetContentSchema);
export const FoodContentListSchema = z.array(FoodContentSchema);
