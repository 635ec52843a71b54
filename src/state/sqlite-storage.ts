/**
 * SQLite State Storage - persists conversation state across restarts
 *
 * One row per (chat, user) pair in the bot_states table; data is stored as
 * a JSON object.
 */

import Database from "better-sqlite3";
import { z } from "zod";
import { StateNotFoundError } from "../errors.js";
import type { StateData, StateStorage } from "./types.js";

/**
 * Row type returned from SQLite
 */
interface StateRow {
  state: string;
  data: string;
}

const StateDataSchema = z.record(z.unknown());

export class SqliteStateStorage implements StateStorage {
  private db: Database.Database;

  /**
   * @param path - database file, or ":memory:"
   */
  constructor(path: string) {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.ensureSchema();
  }

  /**
   * Create table if not exists
   */
  private ensureSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS bot_states (
        chat_id INTEGER NOT NULL,
        user_id INTEGER NOT NULL,
        state TEXT NOT NULL,
        data TEXT NOT NULL DEFAULT '{}',
        updated_at TEXT NOT NULL,
        PRIMARY KEY (chat_id, user_id)
      );
    `);
  }

  private row(chatId: number, userId: number): StateRow | undefined {
    return this.db
      .prepare<[number, number], StateRow>(
        `SELECT state, data FROM bot_states WHERE chat_id = ? AND user_id = ?`
      )
      .get(chatId, userId);
  }

  private parseData(row: StateRow): StateData {
    const parsed: unknown = JSON.parse(row.data);
    const result = StateDataSchema.safeParse(parsed);
    return result.success ? result.data : {};
  }

  private writeData(chatId: number, userId: number, data: StateData): void {
    this.db
      .prepare<[string, string, number, number]>(
        `UPDATE bot_states SET data = ?, updated_at = ? WHERE chat_id = ? AND user_id = ?`
      )
      .run(JSON.stringify(data), new Date().toISOString(), chatId, userId);
  }

  async getState(chatId: number, userId: number): Promise<string | null> {
    return this.row(chatId, userId)?.state ?? null;
  }

  async setState(chatId: number, userId: number, state: string): Promise<void> {
    this.db
      .prepare<[number, number, string, string]>(
        `
      INSERT INTO bot_states (chat_id, user_id, state, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(chat_id, user_id) DO UPDATE SET
        state = excluded.state,
        updated_at = excluded.updated_at
    `
      )
      .run(chatId, userId, state, new Date().toISOString());
  }

  async deleteState(chatId: number, userId: number): Promise<boolean> {
    const result = this.db
      .prepare<[number, number]>(`DELETE FROM bot_states WHERE chat_id = ? AND user_id = ?`)
      .run(chatId, userId);
    return result.changes > 0;
  }

  async getData(chatId: number, userId: number): Promise<StateData> {
    const row = this.row(chatId, userId);
    return row ? this.parseData(row) : {};
  }

  async setData(chatId: number, userId: number, key: string, value: unknown): Promise<void> {
    const row = this.row(chatId, userId);
    if (!row) throw new StateNotFoundError(chatId, userId);
    this.writeData(chatId, userId, { ...this.parseData(row), [key]: value });
  }

  async updateData(chatId: number, userId: number, patch: StateData): Promise<void> {
    const row = this.row(chatId, userId);
    if (!row) throw new StateNotFoundError(chatId, userId);
    this.writeData(chatId, userId, { ...this.parseData(row), ...patch });
  }

  async resetData(chatId: number, userId: number): Promise<void> {
    if (this.row(chatId, userId)) this.writeData(chatId, userId, {});
  }

  close(): void {
    this.db.close();
  }
}
