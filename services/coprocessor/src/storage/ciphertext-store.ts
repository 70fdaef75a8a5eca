import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { getAddress } from "ethers";
import type { CiphertextHandle, HandleAcl, Identity } from "@cxt/shared";

export type CiphertextOrigin = "input" | "trivial" | "computed";

export interface StoredCiphertext {
  handle: CiphertextHandle;
  value: bigint;
  origin: CiphertextOrigin;
  createdAt: string;
  /** Set once an input has been accepted by a verifier. */
  consumedAt: string | null;
}

interface CiphertextRow {
  handle: string;
  value: string;
  origin: CiphertextOrigin;
  created_at: string;
  consumed_at: string | null;
}

interface GranteeRow {
  grantee: string;
}

interface PublicRow {
  handle: string;
}

/**
 * Trapdoor storage: plaintext lives next to each handle. Nothing outside the
 * coprocessor may read this table directly.
 */
export interface CiphertextStore {
  insert(record: StoredCiphertext): void;
  get(handle: CiphertextHandle): StoredCiphertext | null;
  /** Returns false when the handle is not an unconsumed input. */
  consumeInput(handle: CiphertextHandle, consumedAt: string): boolean;
  allow(handle: CiphertextHandle, grantee: Identity, grantedAt: string): void;
  isAllowed(handle: CiphertextHandle, grantee: Identity): boolean;
  markPublic(handle: CiphertextHandle, publishedAt: string): void;
  isPublic(handle: CiphertextHandle): boolean;
  acl(handle: CiphertextHandle): HandleAcl;
  close(): void;
}

export class SqliteCiphertextStore implements CiphertextStore {
  private readonly db: Database.Database;
  private readonly insertStmt: Database.Statement<[string, string, string, string]>;
  private readonly getStmt: Database.Statement<[string], CiphertextRow>;
  private readonly consumeInputStmt: Database.Statement<[string, string]>;
  private readonly allowStmt: Database.Statement<[string, string, string]>;
  private readonly isAllowedStmt: Database.Statement<[string, string], GranteeRow>;
  private readonly granteesStmt: Database.Statement<[string], GranteeRow>;
  private readonly markPublicStmt: Database.Statement<[string, string]>;
  private readonly isPublicStmt: Database.Statement<[string], PublicRow>;

  constructor(dbPath: string) {
    mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ciphertexts (
        handle TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        origin TEXT NOT NULL,
        created_at TEXT NOT NULL,
        consumed_at TEXT
      );

      CREATE TABLE IF NOT EXISTS acl_grants (
        handle TEXT NOT NULL,
        grantee TEXT NOT NULL,
        granted_at TEXT NOT NULL,
        PRIMARY KEY (handle, grantee)
      );

      CREATE TABLE IF NOT EXISTS public_handles (
        handle TEXT PRIMARY KEY,
        published_at TEXT NOT NULL
      );
    `);

    this.insertStmt = this.db.prepare(`
      INSERT INTO ciphertexts (handle, value, origin, created_at)
      VALUES (?, ?, ?, ?)
    `);

    this.getStmt = this.db.prepare(`
      SELECT handle, value, origin, created_at, consumed_at
      FROM ciphertexts
      WHERE handle = ?
      LIMIT 1
    `) as Database.Statement<[string], CiphertextRow>;

    this.consumeInputStmt = this.db.prepare(`
      UPDATE ciphertexts
      SET consumed_at = ?
      WHERE handle = ? AND origin = 'input' AND consumed_at IS NULL
    `);

    this.allowStmt = this.db.prepare(`
      INSERT OR IGNORE INTO acl_grants (handle, grantee, granted_at)
      VALUES (?, ?, ?)
    `);

    this.isAllowedStmt = this.db.prepare(`
      SELECT grantee
      FROM acl_grants
      WHERE handle = ? AND grantee = ?
      LIMIT 1
    `) as Database.Statement<[string, string], GranteeRow>;

    this.granteesStmt = this.db.prepare(`
      SELECT grantee
      FROM acl_grants
      WHERE handle = ?
      ORDER BY granted_at ASC, grantee ASC
    `) as Database.Statement<[string], GranteeRow>;

    this.markPublicStmt = this.db.prepare(`
      INSERT OR IGNORE INTO public_handles (handle, published_at)
      VALUES (?, ?)
    `);

    this.isPublicStmt = this.db.prepare(`
      SELECT handle
      FROM public_handles
      WHERE handle = ?
      LIMIT 1
    `) as Database.Statement<[string], PublicRow>;
  }

  insert(record: StoredCiphertext): void {
    this.insertStmt.run(
      record.handle.toLowerCase(),
      record.value.toString(),
      record.origin,
      record.createdAt,
    );
  }

  get(handle: CiphertextHandle): StoredCiphertext | null {
    const row = this.getStmt.get(handle.toLowerCase());
    if (!row) return null;
    return {
      handle: row.handle,
      value: BigInt(row.value),
      origin: row.origin,
      createdAt: row.created_at,
      consumedAt: row.consumed_at,
    };
  }

  consumeInput(handle: CiphertextHandle, consumedAt: string): boolean {
    return this.consumeInputStmt.run(consumedAt, handle.toLowerCase()).changes === 1;
  }

  allow(handle: CiphertextHandle, grantee: Identity, grantedAt: string): void {
    this.allowStmt.run(handle.toLowerCase(), grantee.toLowerCase(), grantedAt);
  }

  isAllowed(handle: CiphertextHandle, grantee: Identity): boolean {
    return this.isAllowedStmt.get(handle.toLowerCase(), grantee.toLowerCase()) !== undefined;
  }

  markPublic(handle: CiphertextHandle, publishedAt: string): void {
    this.markPublicStmt.run(handle.toLowerCase(), publishedAt);
  }

  isPublic(handle: CiphertextHandle): boolean {
    return this.isPublicStmt.get(handle.toLowerCase()) !== undefined;
  }

  acl(handle: CiphertextHandle): HandleAcl {
    const normalized = handle.toLowerCase();
    return {
      handle: normalized,
      grantees: this.granteesStmt.all(normalized).map((row) => getAddress(row.grantee)),
      public: this.isPublic(normalized),
    };
  }

  close(): void {
    this.db.close();
  }
}
