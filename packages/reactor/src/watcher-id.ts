import type { WatcherId, WatcherKind } from "./types.js";

export function createWatcherId(kind: WatcherKind, seq: number): WatcherId {
  return Object.freeze({ kind, seq });
}
