import { Module } from '@nestjs/common';
import { BattlesModule } from './battles/battles.module.js';
import { ConfigModule } from './config/config.module.js';
import { ContentModule } from './content/content.module.js';
import { EngineModule } from './engine/engine.module.js';

@Module({
  imports: [ConfigModule, ContentModule, EngineModule, BattlesModule],
})
export class AppModule {}
