// 전투 오케스트레이터: phase 상태 머신
//
// (첫 턴만 START_OF_BATTLE) → TURN_START → BEFORE_ATTACK → ATTACK → FAINT_CLEANUP
//   → AFTER_ATTACK → END_OF_TURN → 다음 턴 | TERMINAL

import { Injectable, Logger } from '@nestjs/common';
import { InvalidShopStateError } from '../../common/errors/game-errors.js';
import { EngineConfigService } from '../../config/engine-config.service.js';
import { SIDE } from '../../types/index.js';
import type { BattleOutcome, BattlePhase, EventDraft, Pet, Side, TriggerKind } from '../../types/index.js';
import { createContext, entityRef } from '../effects/engine-context.js';
import type { EngineContext } from '../effects/engine-context.js';
import { TriggerQueueService } from '../effects/trigger-queue.service.js';
import { EventLog } from '../log/event-log.js';
import { isAlive } from '../roster/roster.js';
import type { Roster } from '../roster/roster.js';
import { DamageService } from './damage.service.js';

export interface BattleOptions {
  /** 설정값 대신 쓸 턴 상한 */
  maxTurns?: number;
}

export interface BattleSession {
  readonly ctx: EngineContext;
  readonly maxTurns: number;
  readonly rosters: Readonly<Record<Side, Roster>>;
  turns: number;
  outcome: BattleOutcome | null;
}

export interface BattleResult {
  outcome: BattleOutcome;
  turns: number;
  log: EventLog;
  /** 전투 후 상태 (입력 로스터의 복제본) */
  rosters: Readonly<Record<Side, Roster>>;
}

interface Combatant {
  side: Side;
  pet: Pet;
}

@Injectable()
export class BattleService {
  private readonly logger = new Logger(BattleService.name);

  constructor(
    private readonly config: EngineConfigService,
    private readonly queue: TriggerQueueService,
    private readonly damage: DamageService,
  ) {}

  /** 끝날 때까지 진행. 입력 로스터는 바뀌지 않는다 */
  fight(a: Roster, b: Roster, options: BattleOptions = {}): BattleResult {
    const session = this.start(a, b, options);
    let outcome = this.runTurn(session);
    while (!outcome) outcome = this.runTurn(session);
    return { outcome, turns: session.turns, log: session.ctx.log, rosters: session.rosters };
  }

  /** 턴 단위로 진행하고 싶을 때. 호출자는 runTurn 사이에서만 멈출 수 있다 */
  start(a: Roster, b: Roster, options: BattleOptions = {}): BattleSession {
    if (a.shop?.isOpen() || b.shop?.isOpen()) {
      throw new InvalidShopStateError('Cannot battle while a shop is open', {
        rosters: [a.name, b.name],
      });
    }
    const sideA = a.clone();
    const sideB = b.clone();
    sideA.compact();
    sideB.compact();
    const ctx = createContext('BATTLE', sideA, sideB, new EventLog(), { phase: 'START_OF_BATTLE' });
    return {
      ctx,
      maxTurns: options.maxTurns ?? this.config.get().maxTurns,
      rosters: { A: sideA, B: sideB },
      turns: 0,
      outcome: null,
    };
  }

  /** 한 턴 진행. 끝났으면 결과, 아니면 null */
  runTurn(session: BattleSession): BattleOutcome | null {
    if (session.outcome) return session.outcome;
    const { ctx } = session;
    const turn = session.turns + 1;
    ctx.turn = turn;

    if (turn === 1) this.step(ctx, 'START_OF_BATTLE', [this.globalEvent('START_OF_BATTLE')]);
    this.step(ctx, 'TURN_START', [this.globalEvent('TURN_START')]);
    this.step(ctx, 'BEFORE_ATTACK', this.frontEvents(ctx, 'BEFORE_ATTACK'));

    this.queue.beginPhase(ctx, 'ATTACK');
    const combatants = this.attack(ctx);
    this.queue.drain(ctx);

    this.queue.beginPhase(ctx, 'FAINT_CLEANUP');
    this.cleanup(ctx);

    const survivors = combatants.filter(
      (c) => isAlive(c.pet) && ctx.rosters[c.side]?.find(c.pet.id) === c.pet,
    );
    this.step(
      ctx,
      'AFTER_ATTACK',
      survivors.map((c): EventDraft => ({
        kind: 'AFTER_ATTACK',
        side: c.side,
        subject: entityRef(c.side, c.pet),
      })),
    );
    this.step(ctx, 'END_OF_TURN', [this.globalEvent('END_OF_TURN')]);

    session.turns = turn;
    let outcome = this.classify(session);
    if (!outcome && turn >= session.maxTurns) outcome = 'DRAW';
    if (outcome) this.finish(session, outcome);
    return outcome;
  }

  private step(ctx: EngineContext, phase: BattlePhase, drafts: EventDraft[]): void {
    this.queue.beginPhase(ctx, phase);
    for (const draft of drafts) this.queue.enqueue(ctx, draft);
    this.queue.drain(ctx);
    this.cleanup(ctx);
  }

  /** 앞 펫끼리 동시 공격. 두 피해 모두 스냅샷에서 계산한 뒤 적용 */
  private attack(ctx: EngineContext): Combatant[] {
    const a = ctx.rosters.A?.front();
    const b = ctx.rosters.B?.front();
    if (!a || !b) return [];

    const refA = entityRef('A', a);
    const refB = entityRef('B', b);
    const hitOnB = this.damage.resolveAttack(a, b);
    const hitOnA = this.damage.resolveAttack(b, a);
    const dealtToB = this.damage.applyHit(a, b, hitOnB);
    const dealtToA = this.damage.applyHit(b, a, hitOnA);

    const events: EventDraft[] = [
      { kind: 'ATTACK', side: 'A', subject: refA, source: refB, payload: { amount: hitOnB.damage } },
      { kind: 'ATTACK', side: 'B', subject: refB, source: refA, payload: { amount: hitOnA.damage } },
      { kind: 'DAMAGE', side: 'B', subject: refB, source: refA, payload: { amount: dealtToB } },
      { kind: 'DAMAGE', side: 'A', subject: refA, source: refB, payload: { amount: dealtToA } },
    ];
    if (dealtToB > 0 && isAlive(b)) {
      events.push({ kind: 'HURT', side: 'B', subject: refB, source: refA, payload: { amount: dealtToB } });
    }
    if (dealtToA > 0 && isAlive(a)) {
      events.push({ kind: 'HURT', side: 'A', subject: refA, source: refB, payload: { amount: dealtToA } });
    }
    if (!isAlive(b) && isAlive(a)) events.push({ kind: 'KNOCK_OUT', side: 'A', subject: refA, source: refB });
    if (!isAlive(a) && isAlive(b)) events.push({ kind: 'KNOCK_OUT', side: 'B', subject: refB, source: refA });

    for (const draft of events) this.queue.enqueue(ctx, draft);
    this.queue.collectFaints(ctx);
    return [
      { side: 'A', pet: a },
      { side: 'B', pet: b },
    ];
  }

  /** 기절한 펫을 기록으로 옮기고 앞으로 당긴다 */
  private cleanup(ctx: EngineContext): void {
    for (const side of SIDE) {
      const roster = ctx.rosters[side];
      if (!roster) continue;
      roster.removeFainted();
      roster.compact();
    }
  }

  private classify(session: BattleSession): BattleOutcome | null {
    const aAlive = session.rosters.A.living().length > 0;
    const bAlive = session.rosters.B.living().length > 0;
    if (aAlive && bAlive) return null;
    if (aAlive) return 'SIDE_A_WIN';
    if (bAlive) return 'SIDE_B_WIN';
    return 'DRAW';
  }

  private finish(session: BattleSession, outcome: BattleOutcome): void {
    const { ctx } = session;
    this.queue.beginPhase(ctx, 'TERMINAL');
    this.queue.enqueue(ctx, { kind: 'END_OF_BATTLE', side: 'A', payload: { outcome } });
    this.queue.drain(ctx);
    session.outcome = outcome;
    this.logger.debug(
      `${session.rosters.A.name} vs ${session.rosters.B.name}: ${outcome} after ${session.turns} turns`,
    );
  }

  private globalEvent(kind: TriggerKind): EventDraft {
    return { kind, side: 'A' };
  }

  private frontEvents(ctx: EngineContext, kind: TriggerKind): EventDraft[] {
    const drafts: EventDraft[] = [];
    for (const side of SIDE) {
      const front = ctx.rosters[side]?.front();
      if (front) drafts.push({ kind, side, subject: entityRef(side, front) });
    }
    return drafts;
  }
}
