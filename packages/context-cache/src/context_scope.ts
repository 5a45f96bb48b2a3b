/**
 * Context scope — one set of namespace mappings per execution context.
 *
 * Inside `runWithCacheContext` the mappings live in that call's
 * AsyncLocalStorage slot and follow it through awaits, timers and
 * callbacks. Outside any such call a root set owned by this module is
 * used; worker threads load their own copy of the module, so each worker
 * has a separate root.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

import type { CacheDataStore, CacheNamespace } from './types.js';

type NamespaceSlots = Map<CacheNamespace, CacheDataStore>;

const scope = new AsyncLocalStorage<NamespaceSlots>();
const rootSlots: NamespaceSlots = new Map();

function currentSlots(): NamespaceSlots {
  return scope.getStore() ?? rootSlots;
}

/**
 * Run `fn` in a fresh, empty cache context. Works for sync and async
 * functions; the caller's context is untouched when `fn` finishes.
 */
export function runWithCacheContext<R>(fn: () => R): R {
  return scope.run(new Map(), fn);
}

/** Whether the caller is inside a `runWithCacheContext` call. */
export function inCacheContext(): boolean {
  return scope.getStore() !== undefined;
}

/** The calling context's live mapping for `namespace`, created when absent. */
export function getContextStore(namespace: CacheNamespace): CacheDataStore {
  const slots = currentSlots();
  let store = slots.get(namespace);
  if (!store) {
    store = new Map();
    slots.set(namespace, store);
  }
  return store;
}

/** Whether the calling context has a mapping for `namespace` yet. */
export function hasContextStore(namespace: CacheNamespace): boolean {
  return currentSlots().has(namespace);
}

/** Drop the calling context's mapping for `namespace` entirely. */
export function resetContextStore(namespace: CacheNamespace): void {
  currentSlots().delete(namespace);
}
