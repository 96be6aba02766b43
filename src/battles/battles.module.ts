import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { BattleRunnerService } from './battle-runner.service.js';

@Module({
  imports: [EngineModule],
  providers: [BattleRunnerService],
  exports: [BattleRunnerService],
})
export class BattlesModule {}
