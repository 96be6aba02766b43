export * from './enums.js';
export * from './stats.js';
export * from './effect.js';
export * from './pet.js';
export * from './event.js';
export * from './shop.js';
