import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { LEDGER_CONFIG } from './config.js';
import type { ProjectStatus } from './types/ledger.js';

const IN_MEMORY = ':memory:';

let db: Database.Database | undefined;

export function initializeDatabase(dbPath: string = LEDGER_CONFIG.databasePath): Database.Database {
  if (db) {
    db.close();
  }

  if (dbPath !== IN_MEMORY) {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  db = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
    console.log(`[Database] Initialized at ${dbPath}`);
  }
  db.pragma('foreign_keys = ON');
  createTables(db);
  return db;
}

function connection(): Database.Database {
  if (!db) {
    throw new Error('[Database] Not initialized: call initializeDatabase() first');
  }
  return db;
}

function createTables(conn: Database.Database) {
  // PLATFORM_STATE - Single row of registry-wide settings and global counters
  conn.exec(`
    CREATE TABLE IF NOT EXISTS platform_state (
      id INTEGER PRIMARY KEY CHECK(id = 1),
      next_project_id INTEGER NOT NULL DEFAULT 1,
      fee_bps INTEGER NOT NULL,
      treasury TEXT NOT NULL,
      paused INTEGER NOT NULL DEFAULT 0,
      allow_all_assets INTEGER NOT NULL DEFAULT 0,
      donation_count INTEGER NOT NULL DEFAULT 0,
      total_raised TEXT NOT NULL DEFAULT '0'
    )
  `);

  // ROLES - Platform role membership
  conn.exec(`
    CREATE TABLE IF NOT EXISTS roles (
      identity TEXT NOT NULL,
      role TEXT NOT NULL CHECK(role IN ('platform_admin', 'project_creator', 'badge_operator')),
      granted_at TEXT NOT NULL,
      PRIMARY KEY (identity, role)
    )
  `);

  // KNOWN_ADMINS - Project admins, recorded on first sight
  conn.exec(`
    CREATE TABLE IF NOT EXISTS known_admins (
      identity TEXT PRIMARY KEY,
      first_seen_at TEXT NOT NULL
    )
  `);

  // ALLOWED_ASSETS - Fungible assets accepted by donateToken
  conn.exec(`
    CREATE TABLE IF NOT EXISTS allowed_assets (
      asset_id TEXT PRIMARY KEY,
      added_at TEXT NOT NULL
    )
  `);

  // PROJECTS - One row per project instance, keyed by instance address
  conn.exec(`
    CREATE TABLE IF NOT EXISTS projects (
      address TEXT PRIMARY KEY,
      project_id INTEGER NOT NULL UNIQUE,
      registry_address TEXT NOT NULL,
      admin TEXT NOT NULL,
      funding_goal TEXT NOT NULL,
      funds_raised TEXT NOT NULL DEFAULT '0',
      status TEXT NOT NULL CHECK(status IN ('Active', 'Funded', 'Completed', 'Cancelled')),
      metadata_ref TEXT NOT NULL,
      created_at TEXT NOT NULL
    )
  `);

  // PROJECT_DONORS - Per-project donor totals; rowid keeps first-donation order
  conn.exec(`
    CREATE TABLE IF NOT EXISTS project_donors (
      project_address TEXT NOT NULL,
      donor TEXT NOT NULL,
      total TEXT NOT NULL,
      native_total TEXT NOT NULL,
      listed INTEGER NOT NULL DEFAULT 1,
      PRIMARY KEY (project_address, donor),
      FOREIGN KEY (project_address) REFERENCES projects(address)
    )
  `);

  // PROJECT_ASSETS - Assets a project has received, paid out on release
  conn.exec(`
    CREATE TABLE IF NOT EXISTS project_assets (
      project_address TEXT NOT NULL,
      asset_id TEXT NOT NULL,
      PRIMARY KEY (project_address, asset_id),
      FOREIGN KEY (project_address) REFERENCES projects(address)
    )
  `);

  // EVIDENCE - Append-only proof-of-completion references
  conn.exec(`
    CREATE TABLE IF NOT EXISTS evidence (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      project_address TEXT NOT NULL,
      evidence_index INTEGER NOT NULL,
      content_hash TEXT NOT NULL,
      submitted_at TEXT NOT NULL,
      submitter TEXT NOT NULL,
      UNIQUE (project_address, evidence_index),
      FOREIGN KEY (project_address) REFERENCES projects(address)
    )
  `);

  // GLOBAL_DONORS - Cross-project totals; rowid keeps first-global-donation order
  conn.exec(`
    CREATE TABLE IF NOT EXISTS global_donors (
      donor TEXT PRIMARY KEY,
      total TEXT NOT NULL,
      first_donation_at TEXT NOT NULL
    )
  `);

  // ASSET_BALANCES / ASSET_ALLOWANCES - Ledger-backed asset accounts
  conn.exec(`
    CREATE TABLE IF NOT EXISTS asset_balances (
      asset_id TEXT NOT NULL,
      account TEXT NOT NULL,
      amount TEXT NOT NULL,
      PRIMARY KEY (asset_id, account)
    )
  `);

  conn.exec(`
    CREATE TABLE IF NOT EXISTS asset_allowances (
      asset_id TEXT NOT NULL,
      owner TEXT NOT NULL,
      spender TEXT NOT NULL,
      amount TEXT NOT NULL,
      PRIMARY KEY (asset_id, owner, spender)
    )
  `);

  // LEDGER_EVENTS - Audit trail written in the same transaction as the mutation
  conn.exec(`
    CREATE TABLE IF NOT EXISTS ledger_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      project_id INTEGER,
      event_type TEXT NOT NULL,
      payload_json TEXT NOT NULL,
      created_at TEXT NOT NULL
    )
  `);

  // BADGES - Minted by the tiered badge issuer
  conn.exec(`
    CREATE TABLE IF NOT EXISTS badges (
      badge_id INTEGER PRIMARY KEY AUTOINCREMENT,
      donor TEXT NOT NULL,
      project_id INTEGER NOT NULL,
      amount TEXT NOT NULL,
      tier TEXT NOT NULL CHECK(tier IN ('bronze', 'silver', 'gold')),
      metadata_ref TEXT NOT NULL,
      minted_at TEXT NOT NULL
    )
  `);

  // Indexes
  conn.exec(`
    CREATE INDEX IF NOT EXISTS idx_evidence_project ON evidence(project_address);
    CREATE INDEX IF NOT EXISTS idx_events_project ON ledger_events(project_id);
    CREATE INDEX IF NOT EXISTS idx_events_type ON ledger_events(event_type);
    CREATE INDEX IF NOT EXISTS idx_badges_donor ON badges(donor);
  `);
}

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

/**
 * Run `fn` as a single transaction. A throw rolls back every write made inside
 * it; nested calls become savepoints of the outer transaction.
 */
export function runInTransaction<T>(fn: () => T): T {
  return connection().transaction(fn)();
}

// ============================================================================
// PLATFORM_STATE TABLE
// ============================================================================

export interface PlatformStateRecord {
  next_project_id: number;
  fee_bps: number;
  treasury: string;
  paused: boolean;
  allow_all_assets: boolean;
  donation_count: number;
  total_raised: string;
}

interface PlatformStateRow extends Omit<PlatformStateRecord, 'paused' | 'allow_all_assets'> {
  paused: number;
  allow_all_assets: number;
}

/** Returns true when the row was created by this call */
export function ensurePlatformState(feeBps: number, treasury: string): boolean {
  const result = connection()
    .prepare('INSERT OR IGNORE INTO platform_state (id, fee_bps, treasury) VALUES (1, ?, ?)')
    .run(feeBps, treasury);
  return result.changes > 0;
}

export function getPlatformState(): PlatformStateRecord {
  const row = connection().prepare('SELECT * FROM platform_state WHERE id = 1').get() as PlatformStateRow | undefined;
  if (!row) {
    throw new Error('[Database] platform_state row missing');
  }
  return {
    next_project_id: row.next_project_id,
    fee_bps: row.fee_bps,
    treasury: row.treasury,
    paused: Boolean(row.paused),
    allow_all_assets: Boolean(row.allow_all_assets),
    donation_count: row.donation_count,
    total_raised: row.total_raised,
  };
}

export function updatePlatformState(updates: Partial<PlatformStateRecord>): void {
  const fields: string[] = [];
  const values: (string | number)[] = [];

  if (updates.next_project_id !== undefined) {
    fields.push('next_project_id = ?');
    values.push(updates.next_project_id);
  }
  if (updates.fee_bps !== undefined) {
    fields.push('fee_bps = ?');
    values.push(updates.fee_bps);
  }
  if (updates.treasury !== undefined) {
    fields.push('treasury = ?');
    values.push(updates.treasury);
  }
  if (updates.paused !== undefined) {
    fields.push('paused = ?');
    values.push(updates.paused ? 1 : 0);
  }
  if (updates.allow_all_assets !== undefined) {
    fields.push('allow_all_assets = ?');
    values.push(updates.allow_all_assets ? 1 : 0);
  }
  if (updates.donation_count !== undefined) {
    fields.push('donation_count = ?');
    values.push(updates.donation_count);
  }
  if (updates.total_raised !== undefined) {
    fields.push('total_raised = ?');
    values.push(updates.total_raised);
  }

  if (fields.length === 0) return;

  connection().prepare(`UPDATE platform_state SET ${fields.join(', ')} WHERE id = 1`).run(...values);
}

// ============================================================================
// ROLES / KNOWN_ADMINS / ALLOWED_ASSETS TABLES
// ============================================================================

export function insertRole(identity: string, role: string, grantedAt: string): boolean {
  const result = connection()
    .prepare('INSERT OR IGNORE INTO roles (identity, role, granted_at) VALUES (?, ?, ?)')
    .run(identity, role, grantedAt);
  return result.changes > 0;
}

export function deleteRole(identity: string, role: string): boolean {
  const result = connection().prepare('DELETE FROM roles WHERE identity = ? AND role = ?').run(identity, role);
  return result.changes > 0;
}

export function roleExists(identity: string, role: string): boolean {
  return connection().prepare('SELECT 1 FROM roles WHERE identity = ? AND role = ?').get(identity, role) !== undefined;
}

export function insertKnownAdmin(identity: string, firstSeenAt: string): boolean {
  const result = connection()
    .prepare('INSERT OR IGNORE INTO known_admins (identity, first_seen_at) VALUES (?, ?)')
    .run(identity, firstSeenAt);
  return result.changes > 0;
}

export function knownAdminExists(identity: string): boolean {
  return connection().prepare('SELECT 1 FROM known_admins WHERE identity = ?').get(identity) !== undefined;
}

export function insertAllowedAsset(assetId: string, addedAt: string): boolean {
  const result = connection()
    .prepare('INSERT OR IGNORE INTO allowed_assets (asset_id, added_at) VALUES (?, ?)')
    .run(assetId, addedAt);
  return result.changes > 0;
}

export function deleteAllowedAsset(assetId: string): boolean {
  return connection().prepare('DELETE FROM allowed_assets WHERE asset_id = ?').run(assetId).changes > 0;
}

export function allowedAssetExists(assetId: string): boolean {
  return connection().prepare('SELECT 1 FROM allowed_assets WHERE asset_id = ?').get(assetId) !== undefined;
}

export function listAllowedAssets(): string[] {
  const rows = connection().prepare('SELECT asset_id FROM allowed_assets ORDER BY rowid').all() as { asset_id: string }[];
  return rows.map(row => row.asset_id);
}

// ============================================================================
// PROJECTS TABLE
// ============================================================================

export interface ProjectRecord {
  address: string;
  project_id: number;
  registry_address: string;
  admin: string;
  funding_goal: string;
  funds_raised: string;
  status: ProjectStatus;
  metadata_ref: string;
  created_at: string;
}

export function insertProject(record: ProjectRecord): void {
  const stmt = connection().prepare(`
    INSERT INTO projects (
      address, project_id, registry_address, admin, funding_goal,
      funds_raised, status, metadata_ref, created_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  stmt.run(
    record.address,
    record.project_id,
    record.registry_address,
    record.admin,
    record.funding_goal,
    record.funds_raised,
    record.status,
    record.metadata_ref,
    record.created_at
  );
}

export function getProjectByAddress(address: string): ProjectRecord | null {
  const row = connection().prepare('SELECT * FROM projects WHERE address = ?').get(address) as ProjectRecord | undefined;
  return row ?? null;
}

export function listProjectAddresses(): { project_id: number; address: string; registry_address: string }[] {
  return connection()
    .prepare('SELECT project_id, address, registry_address FROM projects ORDER BY project_id')
    .all() as { project_id: number; address: string; registry_address: string }[];
}

export function updateProject(address: string, updates: Partial<Pick<ProjectRecord, 'funds_raised' | 'status'>>): void {
  const fields: string[] = [];
  const values: string[] = [];

  if (updates.funds_raised !== undefined) {
    fields.push('funds_raised = ?');
    values.push(updates.funds_raised);
  }
  if (updates.status !== undefined) {
    fields.push('status = ?');
    values.push(updates.status);
  }

  if (fields.length === 0) return;

  values.push(address);
  connection().prepare(`UPDATE projects SET ${fields.join(', ')} WHERE address = ?`).run(...values);
}

// ============================================================================
// PROJECT_DONORS / PROJECT_ASSETS TABLES
// ============================================================================

export interface ProjectDonorRecord {
  donor: string;
  total: string;
  native_total: string;
  listed: boolean;
}

export function getProjectDonor(projectAddress: string, donor: string): ProjectDonorRecord | null {
  const row = connection()
    .prepare('SELECT donor, total, native_total, listed FROM project_donors WHERE project_address = ? AND donor = ?')
    .get(projectAddress, donor) as (Omit<ProjectDonorRecord, 'listed'> & { listed: number }) | undefined;
  if (!row) return null;
  return { ...row, listed: Boolean(row.listed) };
}

export function upsertProjectDonor(projectAddress: string, record: ProjectDonorRecord): void {
  connection().prepare(`
    INSERT INTO project_donors (project_address, donor, total, native_total, listed)
    VALUES (?, ?, ?, ?, ?)
    ON CONFLICT (project_address, donor) DO UPDATE SET
      total = excluded.total,
      native_total = excluded.native_total,
      listed = excluded.listed
  `).run(projectAddress, record.donor, record.total, record.native_total, record.listed ? 1 : 0);
}

/** Listed donors in first-donation order */
export function listProjectDonors(projectAddress: string): ProjectDonorRecord[] {
  const rows = connection()
    .prepare('SELECT donor, total, native_total, listed FROM project_donors WHERE project_address = ? AND listed = 1 ORDER BY rowid')
    .all(projectAddress) as (Omit<ProjectDonorRecord, 'listed'> & { listed: number })[];
  return rows.map(row => ({ ...row, listed: Boolean(row.listed) }));
}

export function clearProjectDonors(projectAddress: string): void {
  connection()
    .prepare("UPDATE project_donors SET total = '0', native_total = '0', listed = 0 WHERE project_address = ?")
    .run(projectAddress);
}

export function insertProjectAsset(projectAddress: string, assetId: string): void {
  connection()
    .prepare('INSERT OR IGNORE INTO project_assets (project_address, asset_id) VALUES (?, ?)')
    .run(projectAddress, assetId);
}

export function listProjectAssets(projectAddress: string): string[] {
  const rows = connection()
    .prepare('SELECT asset_id FROM project_assets WHERE project_address = ? ORDER BY rowid')
    .all(projectAddress) as { asset_id: string }[];
  return rows.map(row => row.asset_id);
}

/** Every asset any project has received, in first-received order */
export function listHeldAssets(): string[] {
  const rows = connection()
    .prepare('SELECT asset_id FROM project_assets GROUP BY asset_id ORDER BY MIN(rowid)')
    .all() as { asset_id: string }[];
  return rows.map(row => row.asset_id);
}

// ============================================================================
// EVIDENCE TABLE
// ============================================================================

export interface EvidenceRow {
  evidence_index: number;
  content_hash: string;
  submitted_at: string;
  submitter: string;
}

export function insertEvidence(projectAddress: string, record: Omit<EvidenceRow, 'evidence_index'>): number {
  const index = countEvidence(projectAddress);
  connection().prepare(`
    INSERT INTO evidence (project_address, evidence_index, content_hash, submitted_at, submitter)
    VALUES (?, ?, ?, ?, ?)
  `).run(projectAddress, index, record.content_hash, record.submitted_at, record.submitter);
  return index;
}

export function countEvidence(projectAddress: string): number {
  const row = connection()
    .prepare('SELECT COUNT(*) as count FROM evidence WHERE project_address = ?')
    .get(projectAddress) as { count: number };
  return row.count;
}

export function getEvidenceAt(projectAddress: string, index: number): EvidenceRow | null {
  const row = connection().prepare(`
    SELECT evidence_index, content_hash, submitted_at, submitter
    FROM evidence WHERE project_address = ? AND evidence_index = ?
  `).get(projectAddress, index) as EvidenceRow | undefined;
  return row ?? null;
}

// ============================================================================
// GLOBAL_DONORS TABLE
// ============================================================================

export interface GlobalDonorRecord {
  donor: string;
  total: string;
}

export function getGlobalDonor(donor: string): GlobalDonorRecord | null {
  const row = connection()
    .prepare('SELECT donor, total FROM global_donors WHERE donor = ?')
    .get(donor) as GlobalDonorRecord | undefined;
  return row ?? null;
}

export function upsertGlobalDonor(donor: string, total: string, at: string): void {
  connection().prepare(`
    INSERT INTO global_donors (donor, total, first_donation_at) VALUES (?, ?, ?)
    ON CONFLICT (donor) DO UPDATE SET total = excluded.total
  `).run(donor, total, at);
}

/** All donors in first-global-donation order */
export function listGlobalDonors(): GlobalDonorRecord[] {
  return connection().prepare('SELECT donor, total FROM global_donors ORDER BY rowid').all() as GlobalDonorRecord[];
}

export function countGlobalDonors(): number {
  const row = connection().prepare('SELECT COUNT(*) as count FROM global_donors').get() as { count: number };
  return row.count;
}

// ============================================================================
// ASSET_BALANCES / ASSET_ALLOWANCES TABLES
// ============================================================================

export function getBalance(assetId: string, account: string): bigint {
  const row = connection()
    .prepare('SELECT amount FROM asset_balances WHERE asset_id = ? AND account = ?')
    .get(assetId, account) as { amount: string } | undefined;
  return row ? BigInt(row.amount) : 0n;
}

export function setBalance(assetId: string, account: string, amount: bigint): void {
  connection().prepare(`
    INSERT INTO asset_balances (asset_id, account, amount) VALUES (?, ?, ?)
    ON CONFLICT (asset_id, account) DO UPDATE SET amount = excluded.amount
  `).run(assetId, account, amount.toString());
}

export function getAllowance(assetId: string, owner: string, spender: string): bigint {
  const row = connection()
    .prepare('SELECT amount FROM asset_allowances WHERE asset_id = ? AND owner = ? AND spender = ?')
    .get(assetId, owner, spender) as { amount: string } | undefined;
  return row ? BigInt(row.amount) : 0n;
}

export function setAllowance(assetId: string, owner: string, spender: string, amount: bigint): void {
  connection().prepare(`
    INSERT INTO asset_allowances (asset_id, owner, spender, amount) VALUES (?, ?, ?, ?)
    ON CONFLICT (asset_id, owner, spender) DO UPDATE SET amount = excluded.amount
  `).run(assetId, owner, spender, amount.toString());
}

// ============================================================================
// LEDGER_EVENTS TABLE
// ============================================================================

export interface LedgerEventRecord {
  id?: number;
  project_id: number | null;
  event_type: string;
  payload_json: string;
  created_at: string;
}

export function insertLedgerEvent(record: Omit<LedgerEventRecord, 'id'>): number {
  const result = connection().prepare(`
    INSERT INTO ledger_events (project_id, event_type, payload_json, created_at)
    VALUES (?, ?, ?, ?)
  `).run(record.project_id, record.event_type, record.payload_json, record.created_at);
  return Number(result.lastInsertRowid);
}

export function getLedgerEvents(projectId?: number): LedgerEventRecord[] {
  if (projectId === undefined) {
    return connection().prepare('SELECT * FROM ledger_events ORDER BY id').all() as LedgerEventRecord[];
  }
  return connection()
    .prepare('SELECT * FROM ledger_events WHERE project_id = ? ORDER BY id')
    .all(projectId) as LedgerEventRecord[];
}

// ============================================================================
// BADGES TABLE
// ============================================================================

export interface BadgeRecord {
  badge_id?: number;
  donor: string;
  project_id: number;
  amount: string;
  tier: 'bronze' | 'silver' | 'gold';
  metadata_ref: string;
  minted_at: string;
}

export function insertBadge(record: Omit<BadgeRecord, 'badge_id'>): number {
  const result = connection().prepare(`
    INSERT INTO badges (donor, project_id, amount, tier, metadata_ref, minted_at)
    VALUES (?, ?, ?, ?, ?, ?)
  `).run(record.donor, record.project_id, record.amount, record.tier, record.metadata_ref, record.minted_at);
  return Number(result.lastInsertRowid);
}

export function getBadgesByDonor(donor: string): BadgeRecord[] {
  return connection().prepare('SELECT * FROM badges WHERE donor = ? ORDER BY badge_id').all(donor) as BadgeRecord[];
}

// ============================================================================
// DATABASE MANAGEMENT
// ============================================================================

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = undefined;
    console.log('[Database] Connection closed');
  }
}
