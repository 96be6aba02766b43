// 요청 JSON → 로스터 두 개 → 전투 결과 요약

import { Injectable } from '@nestjs/common';
import { InvalidInputError } from '../common/errors/game-errors.js';
import { BattleService } from '../engine/combat/battle.service.js';
import { RosterService } from '../engine/roster/roster.service.js';
import type { BattleOutcome, EventLogEntry, Pet } from '../types/index.js';
import { BattleRequestSchema } from './dto/battle-request.dto.js';

export interface PetSummary {
  id: string;
  name: string;
  level: number;
  attack: number;
  health: number;
  item: string | null;
}

export interface BattleReport {
  outcome: BattleOutcome;
  turns: number;
  survivors: { A: PetSummary[]; B: PetSummary[] };
  log: EventLogEntry[];
}

@Injectable()
export class BattleRunnerService {
  constructor(
    private readonly rosters: RosterService,
    private readonly battles: BattleService,
  ) {}

  run(input: unknown): BattleReport {
    const parsed = BattleRequestSchema.safeParse(input);
    if (!parsed.success) {
      const formatted = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new InvalidInputError('Validation failed', { issues: formatted });
    }
    const { seed, maxTurns, teamA, teamB } = parsed.data;

    // 양쪽 스트림이 겹치지 않게 seed 를 나눈다
    const seedFor = (side: string) => (seed === undefined ? undefined : `${seed}:${side}`);
    const a = this.rosters.build(teamA, { name: 'A', seed: seedFor('A') });
    const b = this.rosters.build(teamB, { name: 'B', seed: seedFor('B') });

    const result = this.battles.fight(a, b, { maxTurns });
    return {
      outcome: result.outcome,
      turns: result.turns,
      survivors: {
        A: result.rosters.A.living().map(summarize),
        B: result.rosters.B.living().map(summarize),
      },
      log: result.log.toJSON(),
    };
  }
}

function summarize(pet: Pet): PetSummary {
  return {
    id: pet.id,
    name: pet.name,
    level: pet.level,
    attack: pet.stats.attack,
    health: pet.stats.health,
    item: pet.item?.name ?? null,
  };
}
