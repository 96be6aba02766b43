// 액션 실행: 태그 유니온을 kind 로 분기. 2차 이벤트 초안을 반환한다

import { Injectable, Logger } from '@nestjs/common';
import { CascadeLimitExceededError, GameError } from '../../common/errors/game-errors.js';
import type { Action, Effect, EventDraft, GameEvent, Pet, Stats } from '../../types/index.js';
import { DamageService } from '../combat/damage.service.js';
import { PetFactoryService } from '../roster/pet-factory.service.js';
import { isAlive } from '../roster/roster.js';
import { StatsService } from '../stats/stats.service.js';
import { entityRef, findPet } from './engine-context.js';
import type { EffectOwner, EngineContext, TargetRef } from './engine-context.js';

/** 대상 없이 한 번만 실행되는 액션 */
type UntargetedAction = Extract<Action, { kind: 'MULTIPLE' | 'SUMMON' | 'GAIN_GOLD' | 'ADD_SHOP_PERK' }>;
type TargetedAction = Exclude<Action, UntargetedAction>;

@Injectable()
export class ActionService {
  private readonly logger = new Logger(ActionService.name);

  constructor(
    private readonly stats: StatsService,
    private readonly damage: DamageService,
    private readonly pets: PetFactoryService,
  ) {}

  execute(
    ctx: EngineContext,
    owner: EffectOwner,
    effect: Effect,
    targets: TargetRef[],
    cause: GameEvent | null,
  ): EventDraft[] {
    const out: EventDraft[] = [];
    this.run(ctx, owner, effect, effect.action, targets, cause, out);
    return out;
  }

  private run(
    ctx: EngineContext,
    owner: EffectOwner,
    effect: Effect,
    action: Action,
    targets: TargetRef[],
    cause: GameEvent | null,
    out: EventDraft[],
  ): void {
    switch (action.kind) {
      case 'MULTIPLE':
        for (const sub of action.actions) this.run(ctx, owner, effect, sub, targets, cause, out);
        return;
      case 'SUMMON': {
        const summon = action;
        this.guard(ctx, owner, effect, action, cause, () =>
          this.summon(ctx, owner, effect, summon, cause, out),
        );
        return;
      }
      case 'GAIN_GOLD': {
        const shop = ctx.mode === 'SHOP' ? ctx.rosters[owner.side]?.shop : null;
        if (shop) shop.gold += action.amount;
        this.record(ctx, owner, effect, action, cause, null, null, null, shop ? undefined : 'NO_SHOP');
        return;
      }
      case 'ADD_SHOP_PERK': {
        const shop = ctx.rosters[owner.side]?.shop;
        if (!shop) return;
        this.stats.add(shop.perk, action.stats);
        for (const item of shop.petItems()) this.stats.add(item.pet.stats, action.stats);
        this.record(ctx, owner, effect, action, cause, null, null, null);
        return;
      }
      default: {
        const targeted = action;
        for (const target of targets) {
          this.guard(ctx, owner, effect, action, cause, () =>
            this.applyTo(ctx, owner, effect, targeted, target, cause, out),
          );
        }
      }
    }
  }

  /** 연쇄 중 대상 하나의 실패는 그 대상만 건너뛰고 기록한다 */
  private guard(
    ctx: EngineContext,
    owner: EffectOwner,
    effect: Effect,
    action: Action,
    cause: GameEvent | null,
    run: () => void,
  ): void {
    try {
      run();
    } catch (error) {
      if (!(error instanceof GameError) || error instanceof CascadeLimitExceededError) throw error;
      this.logger.warn(`${effect.id}: ${action.kind} skipped (${error.code}: ${error.message})`);
      this.record(ctx, owner, effect, action, cause, null, null, null, error.code);
    }
  }

  private applyTo(
    ctx: EngineContext,
    owner: EffectOwner,
    effect: Effect,
    action: TargetedAction,
    target: TargetRef,
    cause: GameEvent | null,
    out: EventDraft[],
  ): void {
    if (target.kind === 'SHOP') {
      this.applyToShopPet(ctx, owner, effect, action, target, cause);
      return;
    }
    const pet = findPet(ctx, target.side, target.id);
    // 사라졌거나 죽은 대상은 건너뛴다
    if (!pet || !isAlive(pet)) return;

    const before = { ...pet.stats };
    const subject = entityRef(target.side, pet);
    const source = owner.pet ? entityRef(owner.side, owner.pet) : null;
    let note: string | undefined;

    switch (action.kind) {
      case 'DAMAGE': {
        const dealt = this.damage.applyIndirect(pet, action.amount);
        out.push({ kind: 'DAMAGE', side: target.side, subject, source, payload: { amount: dealt } });
        if (dealt > 0 && isAlive(pet)) {
          out.push({ kind: 'HURT', side: target.side, subject, source, payload: { amount: dealt } });
        }
        break;
      }
      case 'ADD_STATS':
        this.stats.add(pet.stats, action.stats);
        if (action.temporary) this.addTemporary(pet, action.stats);
        break;
      case 'REMOVE_STATS':
        this.stats.subtract(pet.stats, action.stats);
        break;
      case 'SET_STATS':
        this.stats.set(pet.stats, action.stats);
        break;
      case 'GIVE_ATTACK_PERCENT': {
        const attack = owner.pet?.stats.attack ?? 0;
        this.stats.add(pet.stats, {
          attack: Math.floor((attack * action.percent) / 100),
          health: 0,
        });
        break;
      }
      case 'SWAP_STATS':
        if (!owner.pet || owner.pet.id === pet.id) {
          note = 'NO_PARTNER';
          break;
        }
        this.stats.swap(owner.pet.stats, pet.stats);
        break;
      case 'GRANT_ITEM':
        pet.item = this.pets.createItem(action.food);
        out.push({ kind: 'ITEM_GAINED', side: target.side, subject, source, payload: { item: action.food } });
        break;
      case 'GAIN_EXPERIENCE': {
        const levels = this.pets.addExperience(pet, action.amount);
        if (levels > 0) {
          out.push({ kind: 'LEVEL_UP', side: target.side, subject, source, payload: { level: pet.level } });
        }
        break;
      }
      case 'KILL':
        this.stats.set(pet.stats, { attack: pet.stats.attack, health: 0 });
        break;
      case 'GRANT_EFFECT':
        pet.effects.push(this.pets.instantiate(action.effect, 'PET', `${effect.id}>${pet.id}`));
        break;
    }

    this.record(ctx, owner, effect, action, cause, pet.id, before, { ...pet.stats }, note);
  }

  private applyToShopPet(
    ctx: EngineContext,
    owner: EffectOwner,
    effect: Effect,
    action: TargetedAction,
    target: Extract<TargetRef, { kind: 'SHOP' }>,
    cause: GameEvent | null,
  ): void {
    const item = ctx.rosters[target.side]?.shop?.items[target.index];
    if (item?.kind !== 'PET') return;
    const stats = item.pet.stats;
    const before = { ...stats };
    if (action.kind === 'ADD_STATS') this.stats.add(stats, action.stats);
    else if (action.kind === 'REMOVE_STATS') this.stats.subtract(stats, action.stats);
    else if (action.kind === 'SET_STATS') this.stats.set(stats, action.stats);
    else return;
    this.record(ctx, owner, effect, action, cause, item.pet.id, before, { ...stats });
  }

  /** 소유자 자리에 소환. 살아있는 펫이 가득 차면 건너뛴다 */
  private summon(
    ctx: EngineContext,
    owner: EffectOwner,
    effect: Effect,
    action: Extract<Action, { kind: 'SUMMON' }>,
    cause: GameEvent | null,
    out: EventDraft[],
  ): void {
    const roster = ctx.rosters[owner.side];
    if (!roster) return;
    const at = owner.pet ? Math.max(0, roster.indexOf(owner.pet.id)) : 0;
    const pet = this.pets.createPet(action.pet, action.level ?? 1, { stats: action.stats });
    if (!roster.insertAt(at, pet)) {
      this.record(ctx, owner, effect, action, cause, null, null, null, 'ROSTER_FULL');
      return;
    }
    this.record(ctx, owner, effect, action, cause, pet.id, null, { ...pet.stats });
    out.push({
      kind: 'SUMMONED',
      side: owner.side,
      subject: entityRef(owner.side, pet),
      source: owner.pet ? entityRef(owner.side, owner.pet) : null,
    });
  }

  private addTemporary(pet: Pet, delta: Stats): void {
    pet.temporaryStats = {
      attack: pet.temporaryStats.attack + delta.attack,
      health: pet.temporaryStats.health + delta.health,
    };
  }

  private record(
    ctx: EngineContext,
    owner: EffectOwner,
    effect: Effect,
    action: Action,
    cause: GameEvent | null,
    targetId: string | null,
    before: Stats | null,
    after: Stats | null,
    note?: string,
  ): void {
    ctx.log.recordAction({
      eventId: cause?.id ?? 0,
      effectId: effect.id,
      ownerId: owner.pet?.id ?? null,
      action: action.kind,
      targetId,
      before,
      after,
      ...(note ? { note } : {}),
    });
  }
}
