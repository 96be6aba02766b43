// 전투/상점 세션 이벤트 로그: 디스패치된 이벤트 + 액션 결과를 순서대로 보관

import type { ActionRecord, EventLogEntry, GameEvent } from '../../types/index.js';

export class EventLog {
  private readonly items: EventLogEntry[] = [];
  private eventSeq = 0;

  /** 큐에 들어가는 이벤트 id 발급 (세션 내 단조 증가) */
  nextEventId(): number {
    this.eventSeq += 1;
    return this.eventSeq;
  }

  recordEvent(event: GameEvent): void {
    this.items.push({ type: 'EVENT', seq: this.items.length, event });
  }

  recordAction(record: ActionRecord): void {
    this.items.push({ type: 'ACTION', seq: this.items.length, ...record });
  }

  events(): GameEvent[] {
    const out: GameEvent[] = [];
    for (const entry of this.items) {
      if (entry.type === 'EVENT') out.push(entry.event);
    }
    return out;
  }

  actions(): ActionRecord[] {
    const out: ActionRecord[] = [];
    for (const entry of this.items) {
      if (entry.type === 'ACTION') {
        const { type: _type, seq: _seq, ...record } = entry;
        out.push(record);
      }
    }
    return out;
  }

  /**
   * 지연 재생. 생성 시점까지 기록된 항목만 돈다.
   * 한 번 소비한 제너레이터는 재시작되지 않으므로 다시 보려면 replay()를 새로 호출.
   */
  *replay(): Generator<EventLogEntry, void, undefined> {
    const end = this.items.length;
    for (let i = 0; i < end; i++) {
      yield this.items[i];
    }
  }

  get size(): number {
    return this.items.length;
  }

  entries(): EventLogEntry[] {
    return [...this.items];
  }

  toJSON(): EventLogEntry[] {
    return this.entries();
  }
}
