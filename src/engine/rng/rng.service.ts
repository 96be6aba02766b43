// splitmix64 기반 결정적 RNG: 로스터/상점마다 독립 스트림

import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';

export type Seed = string | number;

export interface RngState {
  seed: string;
  cursor: number;
}

export class Rng {
  readonly seed: string;
  private state: bigint;
  private _cursor: number;
  private _consumed: number;

  constructor(seed: Seed, cursor: number = 0) {
    this.seed = String(seed);
    this.state = this.hashSeed(this.seed);
    this._cursor = cursor;
    this._consumed = 0;
    // 커서 위치까지 상태만 진행
    for (let i = 0; i < cursor; i++) {
      this.advanceState();
    }
  }

  private hashSeed(seed: string): bigint {
    let h = 0n;
    for (let i = 0; i < seed.length; i++) {
      h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & 0xFFFFFFFFFFFFFFFFn;
    }
    return h === 0n ? 1n : h;
  }

  private advanceState(): void {
    this.state = (this.state + 0x9E3779B97F4A7C15n) & 0xFFFFFFFFFFFFFFFFn;
  }

  private nextRaw(): bigint {
    this._cursor++;
    this._consumed++;
    this.advanceState();
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xBF58476D1CE4E5B9n) & 0xFFFFFFFFFFFFFFFFn;
    z = ((z ^ (z >> 27n)) * 0x94D049BB133111EBn) & 0xFFFFFFFFFFFFFFFFn;
    return (z ^ (z >> 31n)) & 0xFFFFFFFFFFFFFFFFn;
  }

  /** [0, 1) 실수 */
  next(): number {
    // 상위 53비트만 사용해서 1.0이 나오지 않게 한다
    return Number(this.nextRaw() >> 11n) / 2 ** 53;
  }

  /** min~max 정수 (inclusive) */
  range(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** 목록에서 하나. 빈 목록이면 undefined (RNG 소비 없음) */
  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[this.range(0, items.length - 1)];
  }

  /**
   * 중복 없이 count개 선택 (부분 Fisher-Yates). 선택 순서대로 반환.
   * 후보가 count 이하면 RNG를 쓰지 않고 원래 순서 그대로.
   */
  sample<T>(items: readonly T[], count: number): T[] {
    const pool = [...items];
    if (pool.length <= count) return pool;
    const picked: T[] = [];
    for (let i = 0; i < count; i++) {
      const j = this.range(i, pool.length - 1);
      [pool[i], pool[j]] = [pool[j], pool[i]];
      picked.push(pool[i]);
    }
    return picked;
  }

  /** 같은 seed/cursor 에서 이어지는 복제본 */
  clone(): Rng {
    return new Rng(this.seed, this._cursor);
  }

  getState(): RngState {
    return { seed: this.seed, cursor: this._cursor };
  }

  get cursor(): number {
    return this._cursor;
  }

  get consumed(): number {
    return this._consumed;
  }
}

@Injectable()
export class RngService {
  /** seed 생략 시 비결정적 엔트로피 */
  create(seed?: Seed, cursor: number = 0): Rng {
    return new Rng(seed ?? randomUUID(), cursor);
  }

  restore(state: RngState): Rng {
    return new Rng(state.seed, state.cursor);
  }
}
