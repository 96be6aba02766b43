import type { Item, Pet } from './pet.js';

export type ShopItem =
  | { kind: 'PET'; name: string; cost: number; frozen: boolean; pet: Pet }
  | { kind: 'FOOD'; name: string; cost: number; frozen: boolean; food: Item };
