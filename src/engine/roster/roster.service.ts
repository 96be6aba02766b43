// 로스터 생성: 리터럴 펫 목록(null = 빈 슬롯) + 용량

import { Injectable } from '@nestjs/common';
import { RosterTooLargeError } from '../../common/errors/game-errors.js';
import { EngineConfigService } from '../../config/engine-config.service.js';
import type { Pet } from '../../types/index.js';
import { RngService } from '../rng/rng.service.js';
import type { Seed } from '../rng/rng.service.js';
import { PetFactoryService } from './pet-factory.service.js';
import { Roster } from './roster.js';

export interface PetSpec {
  name: string;
  level?: number;
  attack?: number;
  health?: number;
  item?: string;
}

export interface RosterOptions {
  name?: string;
  capacity?: number;
  /** 생략하면 비결정적 */
  seed?: Seed;
}

@Injectable()
export class RosterService {
  constructor(
    private readonly config: EngineConfigService,
    private readonly rng: RngService,
    private readonly pets: PetFactoryService,
  ) {}

  create(pets: (Pet | null)[], options: RosterOptions = {}): Roster {
    const capacity = this.checkSize(pets.length, options.capacity);
    return new Roster(options.name ?? 'team', capacity, this.rng.create(options.seed), pets);
  }

  /** 이름/레벨/스탯/아이템 명세로 펫을 만들어 로스터 생성 */
  build(specs: (PetSpec | null)[], options: RosterOptions = {}): Roster {
    this.checkSize(specs.length, options.capacity);
    const pets = specs.map((spec) => {
      if (!spec) return null;
      const pet = this.pets.createPet(spec.name, spec.level ?? 1, {
        stats: { attack: spec.attack, health: spec.health },
      });
      if (spec.item) pet.item = this.pets.createItem(spec.item);
      return pet;
    });
    return this.create(pets, options);
  }

  private checkSize(size: number, requested?: number): number {
    const max = this.config.get().rosterCapacity;
    const capacity = requested ?? max;
    if (capacity < 1 || capacity > max) throw new RosterTooLargeError(capacity, max);
    if (size > capacity) throw new RosterTooLargeError(size, capacity);
    return capacity;
  }
}
