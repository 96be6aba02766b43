// 엔진 설정 서비스: .env 기본값 + 런타임 변경 지원

import { Injectable, Logger } from '@nestjs/common';
import { join } from 'path';
import { z } from 'zod';
import { InvalidInputError } from '../common/errors/game-errors.js';

const int = (fallback: number) => z.coerce.number().int().positive().catch(fallback);

const EnvSchema = z.object({
  STAT_CEILING: int(50),
  MAX_DAMAGE: int(150),
  MAX_TURNS: int(100),
  CASCADE_LIMIT: int(1000),
  ROSTER_CAPACITY: int(5),
  MAX_PET_LEVEL: int(3),
  MAX_TIER: int(6),
  MAX_SHOP_PETS: int(6),
  STARTING_GOLD: int(10),
  ROLL_COST: int(1),
  SELL_REFUND_RATE: z.coerce.number().positive().catch(1 / 3),
  MERGE_STAT_BONUS: z.coerce.number().int().nonnegative().catch(1),
  SHOP_PACK: z.string().min(1).catch('TURTLE'),
  CONTENT_DIR: z.string().min(1).optional(),
});

export interface EngineConfig {
  statCeiling: number;
  maxDamage: number;
  maxTurns: number;
  cascadeLimit: number;
  rosterCapacity: number;
  maxPetLevel: number;
  maxTier: number;
  maxShopPets: number;
  startingGold: number;
  rollCost: number;
  sellRefundRate: number;
  mergeStatBonus: number;
  pack: string;
  contentDir: string;
}

export type EngineConfigPatch = Partial<EngineConfig>;

const PatchSchema = z
  .object({
    statCeiling: z.number().int().positive(),
    maxDamage: z.number().int().positive(),
    maxTurns: z.number().int().positive(),
    cascadeLimit: z.number().int().positive(),
    rosterCapacity: z.number().int().positive(),
    maxPetLevel: z.number().int().positive(),
    maxTier: z.number().int().positive(),
    maxShopPets: z.number().int().positive(),
    startingGold: z.number().int().nonnegative(),
    rollCost: z.number().int().nonnegative(),
    sellRefundRate: z.number().positive(),
    mergeStatBonus: z.number().int().nonnegative(),
    pack: z.string().min(1),
    contentDir: z.string().min(1),
  })
  .partial()
  .strict();

@Injectable()
export class EngineConfigService {
  private readonly logger = new Logger(EngineConfigService.name);
  private config: EngineConfig;

  constructor() {
    const env = EnvSchema.parse(process.env);
    this.config = {
      statCeiling: env.STAT_CEILING,
      maxDamage: env.MAX_DAMAGE,
      maxTurns: env.MAX_TURNS,
      cascadeLimit: env.CASCADE_LIMIT,
      rosterCapacity: env.ROSTER_CAPACITY,
      maxPetLevel: env.MAX_PET_LEVEL,
      maxTier: env.MAX_TIER,
      maxShopPets: env.MAX_SHOP_PETS,
      startingGold: env.STARTING_GOLD,
      rollCost: env.ROLL_COST,
      sellRefundRate: env.SELL_REFUND_RATE,
      mergeStatBonus: env.MERGE_STAT_BONUS,
      pack: env.SHOP_PACK,
      contentDir: env.CONTENT_DIR ?? join(process.cwd(), 'content', 'pets_v1'),
    };
  }

  get(): EngineConfig {
    return this.config;
  }

  /** 런타임 설정 변경: 다음 전투/상점 연산부터 반영 */
  update(patch: EngineConfigPatch): EngineConfig {
    const result = PatchSchema.safeParse(patch);
    if (!result.success) {
      throw new InvalidInputError('Invalid engine config', {
        issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }
    this.config = { ...this.config, ...result.data };
    this.logger.log(`Engine config updated: ${JSON.stringify(result.data)}`);
    return this.config;
  }
}
