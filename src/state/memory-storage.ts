/**
 * In-memory state storage (lost on restart)
 */

import { StateNotFoundError } from "../errors.js";
import type { StateData, StateStorage } from "./types.js";

interface StateRecord {
  state: string;
  data: StateData;
}

export class MemoryStateStorage implements StateStorage {
  private records: Map<string, StateRecord> = new Map();

  private key(chatId: number, userId: number): string {
    return `${chatId}:${userId}`;
  }

  private require(chatId: number, userId: number): StateRecord {
    const record = this.records.get(this.key(chatId, userId));
    if (!record) throw new StateNotFoundError(chatId, userId);
    return record;
  }

  async getState(chatId: number, userId: number): Promise<string | null> {
    return this.records.get(this.key(chatId, userId))?.state ?? null;
  }

  async setState(chatId: number, userId: number, state: string): Promise<void> {
    const key = this.key(chatId, userId);
    const existing = this.records.get(key);
    this.records.set(key, { state, data: existing?.data ?? {} });
  }

  async deleteState(chatId: number, userId: number): Promise<boolean> {
    return this.records.delete(this.key(chatId, userId));
  }

  async getData(chatId: number, userId: number): Promise<StateData> {
    return { ...this.records.get(this.key(chatId, userId))?.data };
  }

  async setData(chatId: number, userId: number, key: string, value: unknown): Promise<void> {
    this.require(chatId, userId).data[key] = value;
  }

  async updateData(chatId: number, userId: number, patch: StateData): Promise<void> {
    const record = this.require(chatId, userId);
    record.data = { ...record.data, ...patch };
  }

  async resetData(chatId: number, userId: number): Promise<void> {
    const record = this.records.get(this.key(chatId, userId));
    if (record) record.data = {};
  }

  /** Number of stored records */
  get size(): number {
    return this.records.size;
  }
}
