import type { MatchStore } from './types.js';
import { MemoryMatchStore } from './memory.js';
import { loadConfig } from '../config.js';

export * from './types.js';

let store: MatchStore | null = null;

export const getStore = (): MatchStore => {
  if (!store) {
    store = new MemoryMatchStore(loadConfig().defaultFormat);
  }
  return store;
};
