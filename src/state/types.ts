/**
 * Conversation state types
 *
 * A state record is keyed by (chat id, user id) and holds the current state
 * name plus a free-form data object. Data only exists while a state is set.
 */

export type StateData = Record<string, unknown>;

export interface StateStorage {
  getState(chatId: number, userId: number): Promise<string | null>;
  /** Set the state, keeping any existing data */
  setState(chatId: number, userId: number, state: string): Promise<void>;
  /** Remove the record and its data; false when there was none */
  deleteState(chatId: number, userId: number): Promise<boolean>;
  /** Copy of the record's data, empty when there is no record */
  getData(chatId: number, userId: number): Promise<StateData>;
  /** @throws StateNotFoundError when no state is set */
  setData(chatId: number, userId: number, key: string, value: unknown): Promise<void>;
  /** Shallow-merge into the record's data. @throws StateNotFoundError when no state is set */
  updateData(chatId: number, userId: number, patch: StateData): Promise<void>;
  /** Clear the data, keeping the state */
  resetData(chatId: number, userId: number): Promise<void>;
}
