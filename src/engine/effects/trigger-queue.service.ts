// 트리거 큐: 이벤트 FIFO 를 비울 때까지 처리 (너비 우선 cascade)
//
// 정렬: 이벤트 측(주체의 편) 먼저, 그 다음 반대편. 같은 편 안에서는 앞 슬롯부터,
// 펫 자신의 효과 → 든 아이템 효과 → (상점 문맥) 상점 효과.

import { Injectable, Logger } from '@nestjs/common';
import { CascadeLimitExceededError } from '../../common/errors/game-errors.js';
import { EngineConfigService } from '../../config/engine-config.service.js';
import { SIDE } from '../../types/index.js';
import type { Effect, EnginePhase, EventDraft, GameEvent, Pet, Side } from '../../types/index.js';
import { isAlive } from '../roster/roster.js';
import type { Roster } from '../roster/roster.js';
import { ActionService } from './action.service.js';
import { entityRef, opposite } from './engine-context.js';
import type { EffectOwner, EngineContext } from './engine-context.js';
import { TargetingService } from './targeting.service.js';

interface Match {
  owner: EffectOwner;
  effect: Effect;
}

@Injectable()
export class TriggerQueueService {
  private readonly logger = new Logger(TriggerQueueService.name);

  constructor(
    private readonly config: EngineConfigService,
    private readonly targeting: TargetingService,
    private readonly actions: ActionService,
  ) {}

  /** 새 phase 시작: cascade 카운터 초기화 */
  beginPhase(ctx: EngineContext, phase: EnginePhase): void {
    ctx.phase = phase;
    ctx.phaseIndex += 1;
    ctx.processed = 0;
  }

  enqueue(ctx: EngineContext, draft: EventDraft): GameEvent {
    const event: GameEvent = {
      id: ctx.log.nextEventId(),
      kind: draft.kind,
      phase: ctx.phase,
      phaseIndex: ctx.phaseIndex,
      turn: ctx.turn,
      side: draft.side,
      subject: draft.subject ?? null,
      source: draft.source ?? null,
      payload: draft.payload ?? {},
    };
    ctx.queue.push(event);
    return event;
  }

  /** 큐가 빌 때까지 처리하고, 다 쓴 효과를 정리한다 */
  drain(ctx: EngineContext): void {
    const limit = this.config.get().cascadeLimit;
    for (let event = ctx.queue.shift(); event; event = ctx.queue.shift()) {
      ctx.processed += 1;
      if (ctx.processed > limit) {
        ctx.queue.length = 0;
        this.logger.warn(`Cascade limit ${limit} exceeded in ${ctx.phase} (turn ${ctx.turn})`);
        throw new CascadeLimitExceededError(limit, ctx.log.toJSON());
      }
      ctx.log.recordEvent(event);

      for (const match of this.collect(ctx, event)) {
        if (!this.isActive(ctx, match, event)) continue;
        this.fire(ctx, match.owner, match.effect, event);
      }
    }
    this.prune(ctx);
  }

  /** 트리거 매칭 없이 효과를 즉시 실행 (음식 섭취) */
  applyNow(ctx: EngineContext, owner: EffectOwner, effect: Effect, cause: GameEvent | null): void {
    this.fire(ctx, owner, effect, cause);
  }

  /** 체력 0 이하인데 아직 기절 처리 안 된 펫마다 FAINT 를 한 번만 넣는다 */
  collectFaints(ctx: EngineContext): void {
    for (const side of SIDE) {
      for (const pet of ctx.rosters[side]?.occupied() ?? []) {
        if (pet.fainted || pet.stats.health > 0) continue;
        pet.fainted = true;
        this.enqueue(ctx, { kind: 'FAINT', side, subject: entityRef(side, pet) });
      }
    }
  }

  private fire(ctx: EngineContext, owner: EffectOwner, effect: Effect, cause: GameEvent | null) {
    const targets = this.targeting.resolve(ctx, owner, effect.target, cause);
    const produced = this.actions.execute(ctx, owner, effect, targets, cause);
    if (effect.usesRemaining !== null) {
      effect.usesRemaining = Math.max(0, effect.usesRemaining - 1);
    }
    for (const draft of produced) this.enqueue(ctx, draft);
    this.collectFaints(ctx);
  }

  private collect(ctx: EngineContext, event: GameEvent): Match[] {
    const matches: Match[] = [];
    for (const side of [event.side, opposite(event.side)]) {
      const roster = ctx.rosters[side];
      if (!roster) continue;

      for (const pet of roster.occupied()) {
        if (!this.canReact(side, pet, event)) continue;
        const owner = { side, pet };
        for (const effect of pet.effects) {
          if (this.matches(roster, side, pet, effect, event)) matches.push({ owner, effect });
        }
        const itemEffect = pet.item?.effect;
        if (itemEffect && this.matches(roster, side, pet, itemEffect, event)) {
          matches.push({ owner, effect: itemEffect });
        }
      }

      if (ctx.mode === 'SHOP' && roster.shop) {
        for (const effect of roster.shop.effects) {
          if (this.matches(roster, side, null, effect, event)) {
            matches.push({ owner: { side, pet: null }, effect });
          }
        }
      }
    }
    return matches;
  }

  /** 죽은 펫은 자기 FAINT 에만 반응한다 */
  private canReact(side: Side, pet: Pet, event: GameEvent): boolean {
    return isAlive(pet) || (event.kind === 'FAINT' && this.isSubject(side, pet, event));
  }

  private isSubject(side: Side, pet: Pet, event: GameEvent): boolean {
    return event.subject?.side === side && event.subject.id === pet.id;
  }

  private matches(
    roster: Roster,
    side: Side,
    pet: Pet | null,
    effect: Effect,
    event: GameEvent,
  ): boolean {
    if (effect.usesRemaining === 0 || effect.trigger.kind !== event.kind) return false;
    const subject = event.subject;
    switch (effect.trigger.scope) {
      case 'ANY':
        return true;
      case 'GLOBAL':
        return subject === null;
      case 'SELF':
        return pet !== null && this.isSubject(side, pet, event);
      case 'FRIEND':
        return subject !== null && subject.side === side && subject.id !== pet?.id;
      case 'FRIEND_AHEAD':
        return (
          pet !== null &&
          subject !== null &&
          subject.side === side &&
          roster.occupiedAhead(pet)?.id === subject.id
        );
      case 'ENEMY':
        return subject !== null && subject.side !== side;
    }
  }

  /** 앞선 효과 실행으로 소유자가 사라졌거나 아이템이 바뀌었으면 건너뛴다 */
  private isActive(ctx: EngineContext, match: Match, event: GameEvent): boolean {
    const { owner, effect } = match;
    if (effect.usesRemaining === 0) return false;
    if (!owner.pet) return true;
    const pet = owner.pet;
    if (ctx.rosters[owner.side]?.find(pet.id) !== pet) return false;
    if (!this.canReact(owner.side, pet, event)) return false;
    return effect.ownerKind !== 'ITEM' || pet.item?.effect === effect;
  }

  private prune(ctx: EngineContext): void {
    const keep = (e: Effect) => e.usesRemaining !== 0 && !e.temporary;
    for (const side of SIDE) {
      const roster = ctx.rosters[side];
      if (!roster) continue;
      for (const pet of roster.occupied()) {
        pet.effects = pet.effects.filter(keep);
        const item = pet.item;
        if (item?.effect && !keep(item.effect)) item.effect = null;
        // 효과도 살아있는 수식어도 없는 아이템은 버린다
        if (item && !item.effect && (!item.modifier || item.usesRemaining === 0)) pet.item = null;
      }
      if (roster.shop) roster.shop.effects = roster.shop.effects.filter(keep);
    }
  }
}
