// 트리거 큐가 한 번의 전투/상점 연산 동안 들고 다니는 상태

import type { EnginePhase, EntityRef, GameEvent, Pet, Side } from '../../types/index.js';
import type { EventLog } from '../log/event-log.js';
import type { Roster } from '../roster/roster.js';

export type EngineMode = 'BATTLE' | 'SHOP';

export interface EngineContext {
  readonly mode: EngineMode;
  readonly rosters: Readonly<Record<Side, Roster | null>>;
  readonly queue: GameEvent[];
  readonly log: EventLog;
  phase: EnginePhase;
  phaseIndex: number;
  turn: number;
  /** 현재 phase 에서 처리한 이벤트 수 (cascade 상한 검사용) */
  processed: number;
}

/** 효과 소유자. 상점 효과면 pet = null */
export interface EffectOwner {
  side: Side;
  pet: Pet | null;
}

export type TargetRef =
  | { kind: 'PET'; side: Side; id: string }
  | { kind: 'SHOP'; side: Side; index: number };

export function createContext(
  mode: EngineMode,
  a: Roster,
  b: Roster | null,
  log: EventLog,
  init: { phase: EnginePhase; phaseIndex?: number; turn?: number },
): EngineContext {
  return {
    mode,
    rosters: { A: a, B: b },
    queue: [],
    log,
    phase: init.phase,
    phaseIndex: init.phaseIndex ?? 0,
    turn: init.turn ?? 0,
    processed: 0,
  };
}

export function opposite(side: Side): Side {
  return side === 'A' ? 'B' : 'A';
}

export function entityRef(side: Side, pet: Pet): EntityRef {
  return { side, id: pet.id, name: pet.name, position: pet.position };
}

export function findPet(ctx: EngineContext, side: Side, id: string): Pet | undefined {
  return ctx.rosters[side]?.find(id);
}
