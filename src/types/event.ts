import type { ActionKind } from './effect.js';
import type { BattleOutcome, EnginePhase, Side, TriggerKind } from './enums.js';
import type { Stats } from './stats.js';

/** 이벤트 시점의 엔티티 스냅샷: 강한 참조 대신 id로 조회한다 */
export interface EntityRef {
  side: Side;
  id: string;
  name: string;
  position: number | null;
}

export interface EventPayload {
  amount?: number;
  stats?: Stats;
  item?: string;
  gold?: number;
  level?: number;
  outcome?: BattleOutcome;
}

export interface GameEvent {
  readonly id: number;
  readonly kind: TriggerKind;
  readonly phase: EnginePhase;
  readonly phaseIndex: number;
  readonly turn: number;
  readonly side: Side;
  readonly subject: EntityRef | null;
  readonly source: EntityRef | null;
  readonly payload: EventPayload;
}

/** 액션이 반환하는 이벤트 초안: id/phase/turn은 큐가 채운다 */
export type EventDraft = Pick<GameEvent, 'kind' | 'side'> &
  Partial<Pick<GameEvent, 'subject' | 'source' | 'payload'>>;

export interface ActionRecord {
  eventId: number;
  effectId: string;
  ownerId: string | null;
  action: ActionKind;
  targetId: string | null;
  before: Stats | null;
  after: Stats | null;
  note?: string;
}

export type EventLogEntry =
  | { type: 'EVENT'; seq: number; event: GameEvent }
  | ({ type: 'ACTION'; seq: number } & ActionRecord);
