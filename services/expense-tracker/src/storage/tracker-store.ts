import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import {
  auditSubject,
  type AuditEvent,
  type CapabilityGrant,
  type CiphertextHandle,
  type Grantee,
  type Identity,
} from "@cxt/shared";

/** Exists only once a contribution has been accepted, so hasTotal is always true. */
export interface AccountState {
  identity: Identity;
  total: CiphertextHandle;
  hasTotal: true;
  contributions: number;
  updatedAt: string;
}

export interface ListEventsFilter {
  identity?: Identity;
  limit?: number;
}

export interface TrackerStore {
  getAccount(identity: Identity): AccountState | null;
  putAccount(account: AccountState): void;
  addGrant(grant: CapabilityGrant): void;
  listGrants(handle: CiphertextHandle): CapabilityGrant[];
  nextSequence(): number;
  appendEvent(event: AuditEvent): void;
  listEvents(filter?: ListEventsFilter): AuditEvent[];
  /** Runs `work` in one transaction; a throw rolls back every write it made. */
  atomically<T>(work: () => T): T;
  close(): void;
}

interface AccountRow {
  identity: string;
  total: string;
  contributions: number;
  updated_at: string;
}

interface GrantRow {
  handle: string;
  grantee_kind: Grantee["kind"];
  grantee_identity: string;
  granted_at: string;
}

interface EventRow {
  event_json: string;
}

interface SequenceRow {
  next: number;
}

function granteeColumns(grantee: Grantee): [Grantee["kind"], string] {
  return [grantee.kind, grantee.kind === "identity" ? grantee.identity : ""];
}

function granteeFromRow(row: GrantRow): Grantee {
  if (row.grantee_kind === "identity") {
    return { kind: "identity", identity: row.grantee_identity };
  }
  return { kind: row.grantee_kind };
}

export class SqliteTrackerStore implements TrackerStore {
  private readonly db: Database.Database;
  private readonly getAccountStmt: Database.Statement<[string], AccountRow>;
  private readonly putAccountStmt: Database.Statement<[string, string, string, number, string]>;
  private readonly addGrantStmt: Database.Statement<[string, string, string, string]>;
  private readonly listGrantsStmt: Database.Statement<[string], GrantRow>;
  private readonly nextSequenceStmt: Database.Statement<[], SequenceRow>;
  private readonly appendEventStmt: Database.Statement<[number, string, string, string, string, string]>;
  private readonly listAllEventsStmt: Database.Statement<[number], EventRow>;
  private readonly listEventsBySubjectStmt: Database.Statement<[string, number], EventRow>;

  constructor(dbPath: string) {
    mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS accounts (
        identity_key TEXT PRIMARY KEY,
        identity TEXT NOT NULL,
        total TEXT NOT NULL,
        contributions INTEGER NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS capability_grants (
        handle TEXT NOT NULL,
        grantee_kind TEXT NOT NULL,
        grantee_identity TEXT NOT NULL,
        granted_at TEXT NOT NULL,
        PRIMARY KEY (handle, grantee_kind, grantee_identity)
      );

      CREATE TABLE IF NOT EXISTS audit_events (
        sequence INTEGER PRIMARY KEY,
        event_id TEXT NOT NULL UNIQUE,
        type TEXT NOT NULL,
        subject TEXT NOT NULL,
        occurred_at TEXT NOT NULL,
        event_json TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_audit_events_subject
      ON audit_events(subject, sequence);
    `);

    this.getAccountStmt = this.db.prepare(`
      SELECT identity, total, contributions, updated_at
      FROM accounts
      WHERE identity_key = ?
      LIMIT 1
    `) as Database.Statement<[string], AccountRow>;

    this.putAccountStmt = this.db.prepare(`
      INSERT INTO accounts (identity_key, identity, total, contributions, updated_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(identity_key) DO UPDATE SET
        total = excluded.total,
        contributions = excluded.contributions,
        updated_at = excluded.updated_at
    `);

    this.addGrantStmt = this.db.prepare(`
      INSERT OR IGNORE INTO capability_grants (handle, grantee_kind, grantee_identity, granted_at)
      VALUES (?, ?, ?, ?)
    `);

    this.listGrantsStmt = this.db.prepare(`
      SELECT handle, grantee_kind, grantee_identity, granted_at
      FROM capability_grants
      WHERE handle = ?
      ORDER BY granted_at ASC, rowid ASC
    `) as Database.Statement<[string], GrantRow>;

    this.nextSequenceStmt = this.db.prepare(`
      SELECT COALESCE(MAX(sequence), 0) + 1 AS next
      FROM audit_events
    `) as Database.Statement<[], SequenceRow>;

    this.appendEventStmt = this.db.prepare(`
      INSERT INTO audit_events (sequence, event_id, type, subject, occurred_at, event_json)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    this.listAllEventsStmt = this.db.prepare(`
      SELECT event_json
      FROM audit_events
      ORDER BY sequence ASC
      LIMIT ?
    `) as Database.Statement<[number], EventRow>;

    this.listEventsBySubjectStmt = this.db.prepare(`
      SELECT event_json
      FROM audit_events
      WHERE subject = ?
      ORDER BY sequence ASC
      LIMIT ?
    `) as Database.Statement<[string, number], EventRow>;
  }

  getAccount(identity: Identity): AccountState | null {
    const row = this.getAccountStmt.get(identity.toLowerCase());
    if (!row) return null;
    return {
      identity: row.identity,
      total: row.total,
      hasTotal: true,
      contributions: row.contributions,
      updatedAt: row.updated_at,
    };
  }

  putAccount(account: AccountState): void {
    this.putAccountStmt.run(
      account.identity.toLowerCase(),
      account.identity,
      account.total.toLowerCase(),
      account.contributions,
      account.updatedAt,
    );
  }

  addGrant(grant: CapabilityGrant): void {
    const [kind, identity] = granteeColumns(grant.grantee);
    this.addGrantStmt.run(grant.handle.toLowerCase(), kind, identity, grant.grantedAt);
  }

  listGrants(handle: CiphertextHandle): CapabilityGrant[] {
    return this.listGrantsStmt.all(handle.toLowerCase()).map((row) => ({
      handle: row.handle,
      grantee: granteeFromRow(row),
      grantedAt: row.granted_at,
    }));
  }

  nextSequence(): number {
    const row = this.nextSequenceStmt.get();
    return row ? row.next : 1;
  }

  appendEvent(event: AuditEvent): void {
    this.appendEventStmt.run(
      event.sequence,
      event.eventId,
      event.type,
      auditSubject(event).toLowerCase(),
      event.occurredAt,
      JSON.stringify(event),
    );
  }

  listEvents(filter: ListEventsFilter = {}): AuditEvent[] {
    const limit = filter.limit ?? -1;
    const rows = filter.identity
      ? this.listEventsBySubjectStmt.all(filter.identity.toLowerCase(), limit)
      : this.listAllEventsStmt.all(limit);
    return rows.map((row) => JSON.parse(row.event_json) as AuditEvent);
  }

  atomically<T>(work: () => T): T {
    return this.db.transaction(work)();
  }

  close(): void {
    this.db.close();
  }
}
