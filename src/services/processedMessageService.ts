import Database from 'better-sqlite3';

/**
 * Remembers webhook message ids so a redelivered message is answered once.
 */
export class ProcessedMessageService {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.initializeDatabase();
  }

  private initializeDatabase(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS processed_messages (
        message_id TEXT PRIMARY KEY,
        processed_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        sender_number TEXT,
        message_type TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_processed_at ON processed_messages(processed_at);
    `);
  }

  /**
   * Records the id and reports whether it was new. Insert-or-ignore keeps
   * the check and the mark in one statement.
   */
  async markIfNew(messageId: string, senderNumber?: string, messageType?: string): Promise<boolean> {
    const info = this.db.prepare<[string, string | null, string | null]>(`
      INSERT OR IGNORE INTO processed_messages (message_id, sender_number, message_type)
      VALUES (?, ?, ?)
    `).run(messageId, senderNumber ?? null, messageType ?? null);
    return info.changes > 0;
  }

  cleanupOldEntries(daysOlderThan: number = 30): number {
    const info = this.db
      .prepare<[string]>("DELETE FROM processed_messages WHERE processed_at < datetime('now', ?)")
      .run(`-${daysOlderThan} days`);
    return info.changes;
  }

  getStats(): { totalProcessed: number; byType: Record<string, number> } {
    const total = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM processed_messages').get();
    const rows = this.db
      .prepare<[], { message_type: string | null; count: number }>(
        'SELECT message_type, COUNT(*) AS count FROM processed_messages GROUP BY message_type'
      )
      .all();

    const byType: Record<string, number> = {};
    rows.forEach(row => {
      byType[row.message_type || 'unknown'] = row.count;
    });

    return { totalProcessed: total?.count ?? 0, byType };
  }
}
