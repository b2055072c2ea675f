/**
 * Session store: protocol state held in a vanilla Zustand store.
 *
 * One store per `ChatSession`. Read it with `store.getState()`; watch it
 * with `store.subscribe()`.
 *
 * @module
 */

import { createStore, type StoreApi } from "zustand/vanilla";
import { createSessionSlice, type SessionSlice } from "./session.js";

export type SessionStore = StoreApi<SessionSlice>;

export function createSessionStore(): SessionStore {
  return createStore<SessionSlice>()((...a) => ({
    ...createSessionSlice(...a),
  }));
}
