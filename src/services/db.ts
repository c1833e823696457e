import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export type GatewayDatabase = Database.Database;

export interface InboundMessageRow {
  conversation_id: string;
  event_id: number;
  sender_id: string;
  kind: string;
  text: string | null;
  media_file_id: string | null;
  reply_to_event_id: number | null;
  arrived_at: number;
  flush_reason: string;
  created_at: string;
}

export type InboundMessageInsert = Omit<InboundMessageRow, 'created_at'>;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS inbound_messages (
    conversation_id TEXT NOT NULL,
    event_id INTEGER NOT NULL,
    sender_id TEXT NOT NULL,
    kind TEXT NOT NULL,
    text TEXT,
    media_file_id TEXT,
    reply_to_event_id INTEGER,
    arrived_at INTEGER NOT NULL,
    flush_reason TEXT NOT NULL,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (conversation_id, event_id)
  );

  CREATE INDEX IF NOT EXISTS idx_inbound_messages_arrived_at
    ON inbound_messages(conversation_id, arrived_at DESC);
`;

/** Open (creating if needed) the gateway database. `:memory:` is accepted for tests. */
export function openDatabase(dbPath: string): GatewayDatabase {
  if (dbPath !== ':memory:') {
    const resolved = path.resolve(dbPath);
    if (!fs.existsSync(path.dirname(resolved))) {
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
    }
    dbPath = resolved;
  }

  const db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.exec(SCHEMA);
  return db;
}

/** Insert rows in one transaction; rows already stored are left untouched. Returns the inserted count. */
export function saveInboundMessages(db: GatewayDatabase, rows: InboundMessageInsert[]): number {
  const stmt = db.prepare(`
    INSERT OR IGNORE INTO inbound_messages
      (conversation_id, event_id, sender_id, kind, text, media_file_id, reply_to_event_id, arrived_at, flush_reason)
    VALUES
      (@conversation_id, @event_id, @sender_id, @kind, @text, @media_file_id, @reply_to_event_id, @arrived_at, @flush_reason)
  `);
  const insertAll = db.transaction((batch: InboundMessageInsert[]) => {
    let inserted = 0;
    for (const row of batch) {
      inserted += stmt.run(row).changes;
    }
    return inserted;
  });
  return insertAll(rows);
}

export function getConversationMessages(db: GatewayDatabase, conversationId: string, limit = 50): InboundMessageRow[] {
  const stmt = db.prepare<[string, number], InboundMessageRow>(`
    SELECT * FROM inbound_messages
    WHERE conversation_id = ?
    ORDER BY event_id DESC
    LIMIT ?
  `);
  return stmt.all(conversationId, limit).reverse();
}

export function countInboundMessages(db: GatewayDatabase): number {
  const row = db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM inbound_messages').get();
  return row?.total ?? 0;
}
