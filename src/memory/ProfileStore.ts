import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { ProfileStore } from '../types/collaborators';
import {
  ConversationSearchHit,
  ConversationTurn,
  FarmerProfile,
  FarmerUpdate,
  MessageType,
  NewConversationTurn,
  TurnMetadata,
  UsageStats
} from '../types/conversation';

interface FarmerRow {
  id: number;
  phone_number: string;
  name: string | null;
  location: string | null;
  crops: string;
  language: string;
  active: number;
  created_at: string;
  last_active: string;
}

interface ConversationRow {
  farmer_phone: string;
  message_type: MessageType;
  user_message: string;
  ai_response: string;
  metadata: string | null;
  created_at: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * SQLite-backed farmer profiles and conversation turns (better-sqlite3).
 * Statements run synchronously on one connection, so writes for the same
 * farmer are serialized; a profile touch is last-write-wins.
 */
export class SqliteProfileStore implements ProfileStore {
  private db: Database.Database;
  private now: () => Date;

  constructor(db: Database.Database, now: () => Date = () => new Date()) {
    this.db = db;
    this.now = now;
    this.initDB();
  }

  private initDB(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS farmers (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        phone_number TEXT NOT NULL UNIQUE,
        name TEXT,
        location TEXT,
        crops TEXT NOT NULL DEFAULT '[]',
        language TEXT NOT NULL DEFAULT 'en',
        active INTEGER NOT NULL DEFAULT 1,
        created_at TEXT NOT NULL,
        last_active TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS conversations (
        id TEXT PRIMARY KEY,
        farmer_phone TEXT NOT NULL,
        message_type TEXT NOT NULL CHECK(message_type IN ('text', 'image', 'voice')),
        user_message TEXT NOT NULL,
        ai_response TEXT NOT NULL,
        metadata TEXT,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_conversations_farmer ON conversations(farmer_phone);
      CREATE INDEX IF NOT EXISTS idx_conversations_created ON conversations(created_at);
    `);
  }

  /**
   * Atomic upsert: concurrent first messages from one number cannot create
   * two profiles.
   */
  async getOrCreate(contactKey: string): Promise<FarmerProfile> {
    const timestamp = this.now().toISOString();
    const inserted = this.db.prepare<[string, string, string]>(`
      INSERT INTO farmers (phone_number, created_at, last_active)
      VALUES (?, ?, ?)
      ON CONFLICT(phone_number) DO NOTHING
    `).run(contactKey, timestamp, timestamp);

    if (inserted.changes > 0) {
      console.log(`👩‍🌾 New farmer created: ${contactKey}`);
    }

    const row = this.findRow(contactKey);
    if (!row) {
      throw new Error(`Farmer ${contactKey} missing after upsert`);
    }
    return this.toProfile(row);
  }

  async getFarmer(contactKey: string): Promise<FarmerProfile | null> {
    const row = this.findRow(contactKey);
    return row ? this.toProfile(row) : null;
  }

  async touch(contactKey: string): Promise<void> {
    this.db.prepare<[string, string]>('UPDATE farmers SET last_active = ? WHERE phone_number = ?')
      .run(this.now().toISOString(), contactKey);
  }

  /**
   * Applies the provided fields only. Returns false for an unknown farmer.
   */
  async updateFarmer(contactKey: string, update: FarmerUpdate): Promise<boolean> {
    const assignments: string[] = [];
    const params: Array<string | number> = [];

    if (update.name !== undefined) {
      assignments.push('name = ?');
      params.push(update.name);
    }
    if (update.location !== undefined) {
      assignments.push('location = ?');
      params.push(update.location);
    }
    if (update.crops !== undefined) {
      assignments.push('crops = ?');
      params.push(JSON.stringify(Array.from(new Set(update.crops.map(c => c.trim().toLowerCase())))));
    }
    if (update.language !== undefined) {
      assignments.push('language = ?');
      params.push(update.language);
    }
    if (update.active !== undefined) {
      assignments.push('active = ?');
      params.push(update.active ? 1 : 0);
    }

    if (assignments.length === 0) {
      return this.findRow(contactKey) !== undefined;
    }

    const result = this.db
      .prepare(`UPDATE farmers SET ${assignments.join(', ')} WHERE phone_number = ?`)
      .run(...params, contactKey);
    return result.changes > 0;
  }

  async appendTurn(turn: NewConversationTurn): Promise<ConversationTurn> {
    const stored: ConversationTurn = { ...turn, createdAt: this.now().toISOString() };

    this.db.prepare<[string, string, string, string, string, string | null, string]>(`
      INSERT INTO conversations (id, farmer_phone, message_type, user_message, ai_response, metadata, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      uuidv4(),
      stored.farmerPhone,
      stored.messageType,
      stored.userMessage,
      stored.aiResponse,
      stored.metadata ? JSON.stringify(stored.metadata) : null,
      stored.createdAt
    );

    return stored;
  }

  async recentTurns(contactKey: string, limit: number): Promise<ConversationTurn[]> {
    const rows = this.db.prepare<[string, number], ConversationRow>(`
      SELECT farmer_phone, message_type, user_message, ai_response, metadata, created_at
      FROM conversations
      WHERE farmer_phone = ?
      ORDER BY created_at DESC, rowid DESC
      LIMIT ?
    `).all(contactKey, limit);

    // Newest rows were fetched first; the dialogue context wants chronological order
    return rows.reverse().map(row => this.toTurn(row));
  }

  async getStats(): Promise<UsageStats> {
    const since = new Date(this.now().getTime() - DAY_MS).toISOString();
    const count = (sql: string, ...params: string[]): number =>
      this.db.prepare<string[], { n: number }>(sql).get(...params)?.n ?? 0;

    return {
      totalFarmers: count('SELECT COUNT(*) AS n FROM farmers'),
      activeFarmers: count('SELECT COUNT(*) AS n FROM farmers WHERE active = 1'),
      totalConversations: count('SELECT COUNT(*) AS n FROM conversations'),
      messages24h: count('SELECT COUNT(*) AS n FROM conversations WHERE created_at >= ?', since),
      activeFarmers24h: count('SELECT COUNT(DISTINCT farmer_phone) AS n FROM conversations WHERE created_at >= ?', since)
    };
  }

  /**
   * Case-insensitive substring search over what farmers asked, newest first.
   */
  async searchConversations(query: string, limit: number = 20): Promise<ConversationSearchHit[]> {
    const pattern = `%${query.replace(/[\\%_]/g, match => `\\${match}`)}%`;
    const rows = this.db.prepare<[string, number], ConversationRow>(`
      SELECT farmer_phone, message_type, user_message, ai_response, metadata, created_at
      FROM conversations
      WHERE user_message LIKE ? ESCAPE '\\'
      ORDER BY created_at DESC, rowid DESC
      LIMIT ?
    `).all(pattern, limit);

    return rows.map(row => ({
      farmerPhone: row.farmer_phone,
      userMessage: row.user_message,
      aiResponse: row.ai_response,
      createdAt: row.created_at
    }));
  }

  private findRow(contactKey: string): FarmerRow | undefined {
    return this.db.prepare<[string], FarmerRow>('SELECT * FROM farmers WHERE phone_number = ?').get(contactKey);
  }

  private toProfile(row: FarmerRow): FarmerProfile {
    const crops: unknown = JSON.parse(row.crops);
    return {
      id: row.id,
      phoneNumber: row.phone_number,
      name: row.name ?? undefined,
      location: row.location ?? undefined,
      crops: Array.isArray(crops) ? crops.filter((c): c is string => typeof c === 'string') : [],
      language: row.language,
      active: row.active === 1,
      createdAt: row.created_at,
      lastActive: row.last_active
    };
  }

  private toTurn(row: ConversationRow): ConversationTurn {
    const metadata: TurnMetadata | undefined = row.metadata ? JSON.parse(row.metadata) : undefined;
    return {
      farmerPhone: row.farmer_phone,
      messageType: row.message_type,
      userMessage: row.user_message,
      aiResponse: row.ai_response,
      metadata,
      createdAt: row.created_at
    };
  }
}
