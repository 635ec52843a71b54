/**
 * Named state groups and the per-conversation state handle
 */

import type { StateData, StateStorage } from "./types.js";

/**
 * A group of related states, each identified as "Group:name"
 *
 * @example
 * const Signup = defineStates("Signup", ["name", "age"]);
 * await bot.state(chatId, userId).set(Signup.state("name"));
 */
export class StatesGroup<N extends string> {
  readonly all: readonly string[];

  constructor(
    readonly group: string,
    readonly names: readonly N[]
  ) {
    this.all = names.map((name) => this.state(name));
  }

  state(name: N): string {
    return `${this.group}:${name}`;
  }

  /** Whether a state identifier belongs to this group */
  has(state: string | null): boolean {
    return state !== null && this.all.includes(state);
  }
}

export function defineStates<N extends string>(group: string, names: readonly N[]): StatesGroup<N> {
  return new StatesGroup(group, names);
}

/**
 * State operations bound to one (chat, user) pair
 */
export class StateContext {
  constructor(
    private readonly storage: StateStorage,
    readonly chatId: number,
    readonly userId: number
  ) {}

  get(): Promise<string | null> {
    return this.storage.getState(this.chatId, this.userId);
  }

  set(state: string): Promise<void> {
    return this.storage.setState(this.chatId, this.userId, state);
  }

  delete(): Promise<boolean> {
    return this.storage.deleteState(this.chatId, this.userId);
  }

  data(): Promise<StateData> {
    return this.storage.getData(this.chatId, this.userId);
  }

  update(patch: StateData): Promise<void> {
    return this.storage.updateData(this.chatId, this.userId, patch);
  }

  reset(): Promise<void> {
    return this.storage.resetData(this.chatId, this.userId);
  }
}
