// 로스터: 고정 슬롯 + 기절 기록 + 판매 기록 + 전용 RNG 스트림
//
// 효과는 다른 펫을 id/슬롯으로만 참조한다. 슬롯 배열이 유일한 소유자.

import { InvalidPositionError } from '../../common/errors/game-errors.js';
import type { Pet } from '../../types/index.js';
import type { Rng } from '../rng/rng.service.js';
import type { Shop } from '../shop/shop.js';

export function isAlive(pet: Pet): boolean {
  return !pet.fainted && pet.stats.health > 0;
}

export class Roster {
  readonly fainted: Pet[] = [];
  readonly sold: Pet[] = [];
  shop: Shop | null = null;
  private slots: (Pet | null)[];
  private nextId = 1;

  constructor(
    readonly name: string,
    readonly capacity: number,
    readonly rng: Rng,
    pets: (Pet | null)[] = [],
  ) {
    this.slots = Array.from({ length: capacity }, () => null);
    pets.forEach((pet, i) => {
      if (pet) this.place(i, pet);
    });
  }

  /** 슬롯 수 (소환 중에는 죽은 펫 때문에 capacity를 잠시 넘을 수 있다) */
  get slotCount(): number {
    return this.slots.length;
  }

  at(position: number): Pet | null {
    return this.slots[position] ?? null;
  }

  /** 비어있지 않은 슬롯 (죽었지만 아직 정리 전인 펫 포함) */
  occupied(): Pet[] {
    return this.slots.filter((p): p is Pet => p !== null);
  }

  living(): Pet[] {
    return this.occupied().filter(isAlive);
  }

  front(): Pet | undefined {
    return this.living()[0];
  }

  isFull(): boolean {
    return this.living().length >= this.capacity;
  }

  find(id: string): Pet | undefined {
    return this.occupied().find((p) => p.id === id);
  }

  indexOf(id: string): number {
    return this.slots.findIndex((p) => p?.id === id);
  }

  /** 빈 슬롯에 놓는다. 새 로스터 id 를 부여 */
  place(position: number, pet: Pet): Pet {
    if (position < 0 || position >= this.capacity) {
      throw new InvalidPositionError(`Position ${position} outside 0..${this.capacity - 1}`, {
        position,
      });
    }
    if (this.slots[position]) {
      throw new InvalidPositionError(`Position ${position} is occupied`, { position });
    }
    this.adopt(pet);
    this.slots[position] = pet;
    this.reindex();
    return pet;
  }

  /**
   * position 에 끼워 넣고 뒤를 민다 (소환).
   * 살아있는 펫이 capacity 만큼이면 false.
   */
  insertAt(position: number, pet: Pet): boolean {
    if (this.isFull()) return false;
    const at = Math.max(0, Math.min(position, this.slots.length));
    this.adopt(pet);
    this.slots.splice(at, 0, pet);
    // 뒤쪽 빈 슬롯 하나를 먹어서 길이를 유지한다
    let gap = -1;
    for (let i = at + 1; i < this.slots.length; i++) {
      if (this.slots[i] === null) {
        gap = i;
        break;
      }
    }
    if (gap < 0) {
      for (let i = at - 1; i >= 0; i--) {
        if (this.slots[i] === null) {
          gap = i;
          break;
        }
      }
    }
    if (gap >= 0) this.slots.splice(gap, 1);
    this.reindex();
    return true;
  }

  removeAt(position: number): Pet | null {
    const pet = this.slots[position] ?? null;
    if (pet) {
      this.slots[position] = null;
      pet.position = null;
    }
    return pet;
  }

  removeById(id: string): Pet | undefined {
    const index = this.indexOf(id);
    if (index < 0) return undefined;
    return this.removeAt(index) ?? undefined;
  }

  /** from 의 펫을 to 로 옮기고 사이를 민다 */
  move(from: number, to: number): void {
    const [pet] = this.slots.splice(from, 1);
    this.slots.splice(to, 0, pet);
    this.reindex();
  }

  /** pet 앞쪽(인덱스 감소 방향) 살아있는 펫, 가까운 순 */
  ahead(pet: Pet, count: number): Pet[] {
    const index = this.indexOf(pet.id);
    const out: Pet[] = [];
    for (let i = index - 1; i >= 0 && index >= 0 && out.length < count; i--) {
      const p = this.slots[i];
      if (p && isAlive(p)) out.push(p);
    }
    return out;
  }

  behind(pet: Pet, count: number): Pet[] {
    const index = this.indexOf(pet.id);
    const out: Pet[] = [];
    if (index < 0) return out;
    for (let i = index + 1; i < this.slots.length && out.length < count; i++) {
      const p = this.slots[i];
      if (p && isAlive(p)) out.push(p);
    }
    return out;
  }

  /** 바로 앞 점유 슬롯 (생사 무관) */
  occupiedAhead(pet: Pet): Pet | undefined {
    const index = this.indexOf(pet.id);
    for (let i = index - 1; i >= 0; i--) {
      const p = this.slots[i];
      if (p) return p;
    }
    return undefined;
  }

  /**
   * 죽은 펫을 슬롯에서 빼서 fainted 로. 빈 슬롯은 그대로 둔다.
   * 소환으로 capacity 를 넘긴 슬롯은 뒤쪽 빈칸부터 지워 capacity 로 되돌린다.
   */
  removeFainted(): Pet[] {
    const removed: Pet[] = [];
    this.slots.forEach((pet, i) => {
      if (pet && !isAlive(pet)) {
        pet.fainted = true;
        removed.push(pet);
        this.slots[i] = null;
        pet.position = null;
      }
    });
    this.fainted.push(...removed);
    for (let i = this.slots.length - 1; i >= 0 && this.slots.length > this.capacity; i--) {
      if (this.slots[i] === null) this.slots.splice(i, 1);
    }
    this.reindex();
    return removed;
  }

  /** 빈칸 없이 앞으로 당긴다. 상대 순서 유지 */
  compact(): void {
    const pets = this.occupied();
    this.slots = [
      ...pets,
      ...Array.from({ length: Math.max(0, this.capacity - pets.length) }, () => null),
    ];
    this.reindex();
  }

  /** 전투용 깊은 복제. RNG 는 같은 지점에서 갈라지고 상점은 따라가지 않는다 */
  clone(): Roster {
    const copy = new Roster(this.name, this.capacity, this.rng.clone());
    copy.slots = this.slots.map((p) => (p ? structuredClone(p) : null));
    copy.fainted.push(...this.fainted.map((p) => structuredClone(p)));
    copy.sold.push(...this.sold.map((p) => structuredClone(p)));
    copy.nextId = this.nextId;
    return copy;
  }

  private adopt(pet: Pet): void {
    pet.id = `${this.name}-${this.nextId}`;
    this.nextId += 1;
    pet.fainted = false;
  }

  private reindex(): void {
    this.slots.forEach((pet, i) => {
      if (pet) pet.position = i;
    });
  }
}
