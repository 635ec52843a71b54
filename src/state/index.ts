/**
 * State module exports
 */

export { MemoryStateStorage } from "./memory-storage.js";
export { SqliteStateStorage } from "./sqlite-storage.js";
export { StatesGroup, StateContext, defineStates } from "./states.js";
export type { StateStorage, StateData } from "./types.js";
