// pets_v1 JSON 로드 + 메모리 캐시

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import type { ZodSchema } from 'zod';
import { InvalidInputError, UnknownEntityError } from '../common/errors/game-errors.js';
import { EngineConfigService } from '../config/engine-config.service.js';
import { FoodContentListSchema, PetContentListSchema } from './content.schema.js';
import type {
  EntityProvider,
  FoodContent,
  FoodDefinition,
  PetContent,
  PetDefinition,
} from './content.types.js';

@Injectable()
export class ContentLoaderService implements EntityProvider, OnModuleInit {
  private readonly logger = new Logger(ContentLoaderService.name);
  private pets = new Map<string, PetContent>();
  private foods = new Map<string, FoodContent>();

  constructor(private readonly config: EngineConfigService) {}

  async onModuleInit() {
    await this.load();
  }

  async load(dir: string = this.config.get().contentDir): Promise<void> {
    const [petsRaw, foodsRaw] = await Promise.all([
      readFile(join(dir, 'pets.json'), 'utf-8'),
      readFile(join(dir, 'foods.json'), 'utf-8'),
    ]);
    const pets = this.validate(PetContentListSchema, JSON.parse(petsRaw), 'pets.json');
    const foods = this.validate(FoodContentListSchema, JSON.parse(foodsRaw), 'foods.json');
    this.register(pets, foods);
    this.logger.log(`Loaded ${pets.length} pets, ${foods.length} foods from ${dir}`);
  }

  /** 정의 등록: 같은 이름은 덮어쓴다 */
  register(pets: PetContent[], foods: FoodContent[] = []): this {
    for (const p of pets) this.pets.set(p.name, p);
    for (const f of foods) this.foods.set(f.name, f);
    return this;
  }

  hasPet(name: string): boolean {
    return this.pets.has(name);
  }

  getPet(name: string, level = 1): PetDefinition {
    const content = this.pets.get(name);
    if (!content) throw new UnknownEntityError('PET', name, level);
    return this.toPetDefinition(content, level);
  }

  getFood(name: string): FoodDefinition {
    const content = this.foods.get(name);
    if (!content) throw new UnknownEntityError('FOOD', name);
    return this.toFoodDefinition(content);
  }

  /** 상점 풀: 토큰 제외, 등록 순서 유지 */
  listPets(maxTier: number, pack: string): PetDefinition[] {
    return [...this.pets.values()]
      .filter((p) => !p.token && p.tier <= maxTier && p.packs.includes(pack))
      .map((p) => this.toPetDefinition(p, 1));
  }

  listFoods(maxTier: number, pack: string): FoodDefinition[] {
    return [...this.foods.values()]
      .filter((f) => !f.token && f.tier <= maxTier && f.packs.includes(pack))
      .map((f) => this.toFoodDefinition(f));
  }

  private toPetDefinition(content: PetContent, level: number): PetDefinition {
    return {
      name: content.name,
      tier: content.tier,
      level,
      baseStats: { attack: content.attack, health: content.health },
      packs: content.packs,
      // 정의되지 않은 레벨은 효과 없음
      effects: content.levels[String(level)] ?? [],
      cost: content.cost,
      token: content.token ?? false,
    };
  }

  private toFoodDefinition(content: FoodContent): FoodDefinition {
    return {
      name: content.name,
      tier: content.tier,
      packs: content.packs,
      cost: content.cost,
      holdable: content.holdable,
      singleUse: content.singleUse,
      uses: content.uses,
      effect: content.effect ?? null,
      modifier: content.modifier ?? null,
      token: content.token ?? false,
    };
  }

  private validate<T>(schema: ZodSchema<T>, value: unknown, file: string): T {
    const result = schema.safeParse(value);
    if (!result.success) {
      const formatted = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new InvalidInputError(`Invalid content in ${file}`, { issues: formatted });
    }
    return result.data;
  }
}
