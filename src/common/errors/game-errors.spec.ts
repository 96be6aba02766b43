import {
  CascadeLimitExceededError,
  EmptySlotError,
  GameError,
  InsufficientFundsError,
  InvalidTierError,
  RosterTooLargeError,
  UnknownEntityError,
} from './game-errors.js';

describe('GameError', () => {
  it('하위 오류는 코드와 세부 정보를 가진다', () => {
    const error = new InsufficientFundsError(3, 1);
    expect(error).toBeInstanceOf(GameError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('INSUFFICIENT_FUNDS');
    expect(error.message).toBe('Need 3 gold, have 1');
    expect(error.details).toEqual({ needed: 3, available: 1 });
  });

  it('종류별 코드', () => {
    expect(new EmptySlotError(2).code).toBe('EMPTY_SLOT');
    expect(new UnknownEntityError('PET', 'Dragon').code).toBe('UNKNOWN_ENTITY');
    expect(new RosterTooLargeError(6, 5).code).toBe('ROSTER_TOO_LARGE');
    expect(new InvalidTierError(7, 6).code).toBe('INVALID_TIER');
  });

  it('CascadeLimitExceededError는 부분 로그를 들고 있다', () => {
    const error = new CascadeLimitExceededError(10, []);
    expect(error.code).toBe('CASCADE_LIMIT_EXCEEDED');
    expect(error.partialLog).toEqual([]);
  });
});
