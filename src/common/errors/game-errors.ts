// 엔진 오류 계층: 모든 연산 오류는 호출자에게 동기적으로 던져진다

import type { EventLogEntry } from '../../types/index.js';

export class GameError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GameError';
  }
}

export class InvalidPositionError extends GameError {
  constructor(message = 'Invalid position', details?: Record<string, unknown>) {
    super('INVALID_POSITION', message, details);
  }
}

export class InvalidShopStateError extends GameError {
  constructor(message = 'Invalid shop state', details?: Record<string, unknown>) {
    super('INVALID_SHOP_STATE', message, details);
  }
}

export class InsufficientFundsError extends GameError {
  constructor(needed: number, available: number) {
    super('INSUFFICIENT_FUNDS', `Need ${needed} gold, have ${available}`, {
      needed,
      available,
    });
  }
}

export class EmptySlotError extends GameError {
  constructor(slot: number) {
    super('EMPTY_SLOT', `Slot ${slot} is empty`, { slot });
  }
}

export class UnknownEntityError extends GameError {
  constructor(kind: 'PET' | 'FOOD', name: string, level?: number) {
    super('UNKNOWN_ENTITY', `Unknown ${kind.toLowerCase()}: ${name}`, {
      kind,
      name,
      level,
    });
  }
}

export class RosterTooLargeError extends GameError {
  constructor(size: number, capacity: number) {
    super('ROSTER_TOO_LARGE', `Roster of ${size} exceeds capacity ${capacity}`, {
      size,
      capacity,
    });
  }
}

export class InvalidTierError extends GameError {
  constructor(tier: number, maxTier: number) {
    super('INVALID_TIER', `Tier ${tier} outside 1..${maxTier}`, { tier, maxTier });
  }
}

/** 무한 트리거 루프: 콘텐츠 오류. 진단용 부분 로그를 싣는다 */
export class CascadeLimitExceededError extends GameError {
  constructor(
    limit: number,
    public readonly partialLog: EventLogEntry[],
  ) {
    super('CASCADE_LIMIT_EXCEEDED', `More than ${limit} events in one phase`, {
      limit,
      entries: partialLog.length,
    });
  }
}

export class InvalidInputError extends GameError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, details);
  }
}
