// 타깃 셀렉터 → 대상 참조 목록 (선택 순서 유지)

import { Injectable } from '@nestjs/common';
import type { GameEvent, Pet, Side, TargetSelector, TeamTarget } from '../../types/index.js';
import { isAlive } from '../roster/roster.js';
import { findPet, opposite } from './engine-context.js';
import type { EffectOwner, EngineContext, TargetRef } from './engine-context.js';

interface Candidate {
  side: Side;
  pet: Pet;
}

@Injectable()
export class TargetingService {
  resolve(
    ctx: EngineContext,
    owner: EffectOwner,
    selector: TargetSelector,
    cause: GameEvent | null,
  ): TargetRef[] {
    const friends = ctx.rosters[owner.side];
    const self = owner.pet;
    const toRefs = (pets: Pet[]) => pets.map((pet) => this.ref({ side: owner.side, pet }));

    switch (selector.kind) {
      case 'NONE':
        return [];
      case 'SELF':
        return self && isAlive(self) ? toRefs([self]) : [];
      case 'AHEAD':
        return self && friends ? toRefs(friends.ahead(self, selector.count)) : [];
      case 'BEHIND':
        return self && friends ? toRefs(friends.behind(self, selector.count)) : [];
      case 'ADJACENT':
        return self && friends
          ? toRefs([...friends.ahead(self, 1), ...friends.behind(self, 1)])
          : [];
      case 'ALL':
        return this.pool(ctx, owner, selector.team, selector.excludeSelf).map((c) => this.ref(c));
      case 'RANDOM': {
        const candidates = this.pool(ctx, owner, selector.team, selector.excludeSelf);
        // 랜덤은 소유 측 로스터 스트림을 쓴다
        const rng = friends?.rng;
        if (!rng) return [];
        return rng.sample(candidates, selector.count).map((c) => this.ref(c));
      }
      case 'POSITION':
        return this.atPosition(ctx, owner, selector.team, selector.index);
      case 'LOWEST':
      case 'HIGHEST': {
        const { stat } = selector;
        const sign = selector.kind === 'LOWEST' ? 1 : -1;
        // 정렬은 안정적이므로 동률이면 앞쪽(우리 편 먼저) 펫
        return this.pool(ctx, owner, selector.team, selector.excludeSelf)
          .sort((a, b) => sign * (a.pet.stats[stat] - b.pet.stats[stat]))
          .slice(0, selector.count ?? 1)
          .map((c) => this.ref(c));
      }
      case 'TRIGGER_SUBJECT':
      case 'TRIGGER_SOURCE': {
        const entity = selector.kind === 'TRIGGER_SUBJECT' ? cause?.subject : cause?.source;
        if (!entity) return [];
        const pet = findPet(ctx, entity.side, entity.id);
        return pet && isAlive(pet) ? [this.ref({ side: entity.side, pet })] : [];
      }
      case 'SHOP_PETS': {
        const shop = friends?.shop;
        if (!shop) return [];
        const refs: TargetRef[] = [];
        shop.items.forEach((item, index) => {
          if (item.kind === 'PET') refs.push({ kind: 'SHOP', side: owner.side, index });
        });
        return refs;
      }
    }
  }

  private pool(
    ctx: EngineContext,
    owner: EffectOwner,
    team: TeamTarget,
    excludeSelf = false,
  ): Candidate[] {
    const enemySide = opposite(owner.side);
    const list: Candidate[] = [];
    if (team !== 'ENEMY') {
      for (const pet of ctx.rosters[owner.side]?.living() ?? []) list.push({ side: owner.side, pet });
    }
    if (team !== 'FRIEND') {
      for (const pet of ctx.rosters[enemySide]?.living() ?? []) list.push({ side: enemySide, pet });
    }
    const self = owner.pet;
    if (!excludeSelf || !self) return list;
    return list.filter((c) => !(c.side === owner.side && c.pet.id === self.id));
  }

  /** 점유 슬롯 기준 index 번째 (음수는 뒤에서부터). 죽은 펫이면 비어있는 것으로 본다 */
  private atPosition(
    ctx: EngineContext,
    owner: EffectOwner,
    team: TeamTarget,
    index: number,
  ): TargetRef[] {
    const side = team === 'ENEMY' ? opposite(owner.side) : owner.side;
    const occupied = ctx.rosters[side]?.occupied() ?? [];
    const pet = occupied[index < 0 ? occupied.length + index : index];
    return pet && isAlive(pet) ? [this.ref({ side, pet })] : [];
  }

  private ref(candidate: Candidate): TargetRef {
    return { kind: 'PET', side: candidate.side, id: candidate.pet.id };
  }
}
