import type { GameEvent } from '../../types/index.js';
import { EventLog } from './event-log.js';

function event(log: EventLog, kind: GameEvent['kind']): GameEvent {
  return {
    id: log.nextEventId(),
    kind,
    phase: 'TURN_START',
    phaseIndex: 1,
    turn: 1,
    side: 'A',
    subject: null,
    source: null,
    payload: {},
  };
}

describe('EventLog', () => {
  let log: EventLog;

  beforeEach(() => {
    log = new EventLog();
  });

  it('이벤트 id는 1부터 단조 증가', () => {
    expect(log.nextEventId()).toBe(1);
    expect(log.nextEventId()).toBe(2);
  });

  it('이벤트와 액션을 기록 순서대로 보관', () => {
    log.recordEvent(event(log, 'TURN_START'));
    log.recordAction({
      eventId: 1,
      effectId: 'Ant#L1.0',
      ownerId: 'A-1',
      action: 'ADD_STATS',
      targetId: 'A-2',
      before: { attack: 1, health: 1 },
      after: { attack: 3, health: 2 },
    });
    log.recordEvent(event(log, 'END_OF_TURN'));

    expect(log.size).toBe(3);
    expect(log.toJSON().map((e) => e.type)).toEqual(['EVENT', 'ACTION', 'EVENT']);
    expect(log.toJSON().map((e) => e.seq)).toEqual([0, 1, 2]);
    expect(log.events().map((e) => e.kind)).toEqual(['TURN_START', 'END_OF_TURN']);
    expect(log.actions()).toEqual([
      {
        eventId: 1,
        effectId: 'Ant#L1.0',
        ownerId: 'A-1',
        action: 'ADD_STATS',
        targetId: 'A-2',
        before: { attack: 1, health: 1 },
        after: { attack: 3, health: 2 },
      },
    ]);
  });

  it('replay: 시작 시점 이후 기록은 포함하지 않는다', () => {
    log.recordEvent(event(log, 'TURN_START'));
    log.recordEvent(event(log, 'BEFORE_ATTACK'));

    const replay = log.replay();
    const first = replay.next();
    log.recordEvent(event(log, 'END_OF_TURN'));
    const rest = [...replay];

    expect(first.done).toBe(false);
    expect(rest).toHaveLength(1);
    expect(log.size).toBe(3);
  });

  it('replay는 호출할 때마다 처음부터', () => {
    log.recordEvent(event(log, 'TURN_START'));
    expect([...log.replay()]).toHaveLength(1);
    expect([...log.replay()]).toHaveLength(1);
  });

  it('toJSON은 사본을 돌려준다', () => {
    log.recordEvent(event(log, 'TURN_START'));
    const snapshot = log.toJSON();
    log.recordEvent(event(log, 'END_OF_TURN'));
    expect(snapshot).toHaveLength(1);
    expect(log.entries()).toEqual(log.toJSON());
    expect(JSON.parse(JSON.stringify(log))).toHaveLength(2);
  });
});
