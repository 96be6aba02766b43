import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { InvalidInputError, UnknownEntityError } from '../common/errors/game-errors.js';
import { EngineConfigService } from '../config/engine-config.service.js';
import { ContentLoaderService } from './content-loader.service.js';

describe('ContentLoaderService', () => {
  let loader: ContentLoaderService;

  beforeAll(async () => {
    loader = new ContentLoaderService(new EngineConfigService());
    await loader.load(join(process.cwd(), 'content', 'pets_v1'));
  });

  it('레벨별 정의', () => {
    const ant = loader.getPet('Ant');
    expect(ant.level).toBe(1);
    expect(ant.baseStats).toEqual({ attack: 2, health: 1 });
    expect(ant.effects).toHaveLength(1);
    expect(ant.effects[0].trigger).toEqual({ kind: 'FAINT', scope: 'SELF' });

    const ant2 = loader.getPet('Ant', 2);
    expect(ant2.level).toBe(2);
    expect(ant2.effects[0].action).toEqual({ kind: 'ADD_STATS', stats: { attack: 4, health: 2 } });
  });

  it('효과 없는 레벨은 빈 목록', () => {
    expect(loader.getPet('Fish', 1).effects).toEqual([]);
    expect(loader.getPet('Fish', 2).effects).toHaveLength(1);
  });

  it('음식 정의: 수식어/효과', () => {
    const melon = loader.getFood('Melon');
    expect(melon.holdable).toBe(true);
    expect(melon.uses).toBe(1);
    expect(melon.modifier).toEqual({ kind: 'DAMAGE_REDUCTION', amount: 20, negateFully: true });
    expect(melon.effect).toBeNull();

    expect(loader.getFood('Apple').effect?.action).toEqual({
      kind: 'ADD_STATS',
      stats: { attack: 1, health: 1 },
    });
  });

  it('없는 이름 → UnknownEntityError', () => {
    expect(() => loader.getPet('Dragon')).toThrow(UnknownEntityError);
    expect(() => loader.getFood('Cake')).toThrow(UnknownEntityError);
    expect(loader.hasPet('Dragon')).toBe(false);
    expect(loader.hasPet('Ant')).toBe(true);
  });

  it('상점 풀: 티어 이하, 토큰 제외, 등록 순서', () => {
    expect(loader.listPets(1, 'TURTLE').map((p) => p.name)).toEqual([
      'Ant',
      'Beaver',
      'Cricket',
      'Duck',
      'Fish',
      'Horse',
      'Mosquito',
      'Otter',
      'Pig',
    ]);
    expect(loader.listFoods(1, 'TURTLE').map((f) => f.name)).toEqual(['Apple', 'Honey']);
    expect(loader.listFoods(6, 'TURTLE').map((f) => f.name)).not.toContain('Coconut');
    expect(loader.listPets(6, 'PUPPY')).toEqual([]);
  });

  describe('검증', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'pets-content-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('형식이 틀린 콘텐츠 → InvalidInputError', async () => {
      await writeFile(join(dir, 'pets.json'), JSON.stringify([{ name: 'Ant', tier: 'one' }]));
      await writeFile(join(dir, 'foods.json'), '[]');
      const fresh = new ContentLoaderService(new EngineConfigService());
      await expect(fresh.load(dir)).rejects.toThrow(InvalidInputError);
      expect(fresh.hasPet('Ant')).toBe(false);
    });

    it('알 수 없는 액션 종류 → InvalidInputError', async () => {
      const pet = {
        name: 'Ant',
        tier: 1,
        cost: 3,
        attack: 2,
        health: 1,
        packs: ['TURTLE'],
        levels: {
          '1': [
            {
              trigger: { kind: 'FAINT', scope: 'SELF' },
              target: { kind: 'SELF' },
              action: { kind: 'EXPLODE' },
              uses: 1,
            },
          ],
        },
      };
      await writeFile(join(dir, 'pets.json'), JSON.stringify([pet]));
      await writeFile(join(dir, 'foods.json'), '[]');
      const fresh = new ContentLoaderService(new EngineConfigService());
      await expect(fresh.load(dir)).rejects.toThrow(InvalidInputError);
    });
  });

  it('register: 같은 이름은 덮어쓴다', () => {
    const fresh = new ContentLoaderService(new EngineConfigService());
    fresh.register([
      { name: 'Ant', tier: 1, cost: 3, attack: 2, health: 1, packs: ['TURTLE'], levels: {} },
      { name: 'Ant', tier: 1, cost: 3, attack: 5, health: 5, packs: ['TURTLE'], levels: {} },
    ]);
    expect(fresh.getPet('Ant').baseStats).toEqual({ attack: 5, health: 5 });
    expect(fresh.getPet('Ant').effects).toEqual([]);
  });
});
