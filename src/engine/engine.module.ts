import { Module } from '@nestjs/common';
import { RngService } from './rng/rng.service.js';
import { StatsService } from './stats/stats.service.js';
import { PetFactoryService } from './roster/pet-factory.service.js';
import { RosterService } from './roster/roster.service.js';
import { DamageService } from './combat/damage.service.js';
import { TargetingService } from './effects/targeting.service.js';
import { ActionService } from './effects/action.service.js';
import { TriggerQueueService } from './effects/trigger-queue.service.js';
import { BattleService } from './combat/battle.service.js';
import { ShopService } from './shop/shop.service.js';

const providers = [
  // Layer 1: 난수/스탯
  RngService,
  StatsService,
  // Layer 2: 엔티티
  PetFactoryService,
  RosterService,
  // Layer 3: 효과 엔진
  DamageService,
  TargetingService,
  ActionService,
  TriggerQueueService,
  // Layer 4: 오케스트레이션
  BattleService,
  ShopService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
