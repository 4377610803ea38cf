/**
 * History Module
 */

export { JsonlHistoryStore, InMemoryHistoryStore } from './store';
export type { HistoryStore, JsonlHistoryStoreOptions } from './store';
