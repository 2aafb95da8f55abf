/**
 * CRM Database Module
 *
 * SQLite/Turso record store for calendar events, clients, the product
 * catalogue and client purchases.
 *
 * Supports:
 * - Turso cloud database (production)
 * - Local SQLite file (development)
 * - In-memory SQLite (testing)
 *
 * Events are keyed by `event_id` only. Clients and purchases use
 * store-assigned integer ids.
 */

import { createClient, type Client, type InValue, type Row } from "@libsql/client";
import * as fs from "fs";
import * as path from "path";
import {
  buildSetClause,
  buildWhereClause,
  foldCase,
  type ColumnFilter,
} from "./query-filter.js";

// ============================================================================
// Types
// ============================================================================

export type SyncStatus = "synced" | "supabase_only";

export type CalendarPlacement = "primary" | "local";

/**
 * Event record stored in the database
 */
export interface StoredEvent {
  event_id: string; // external calendar id, or local_<hex>
  summary: string;
  start_iso: string; // ISO timestamp with offset
  end_iso: string; // ISO timestamp with offset
  description: string | null;
  location: string | null;
  attendees: string[];
  company_name: string | null;
  person_name: string | null;
  source: SyncStatus;
  calendar_id: CalendarPlacement;
  timezone: string;
  status: string;
  client_id: number | null;
  created_at: string; // ISO timestamp
}

export type NewEvent = Omit<StoredEvent, "created_at">;

/** Fields an update may touch; identity and sync columns are handled separately */
export type EventChanges = Partial<
  Pick<
    StoredEvent,
    | "summary"
    | "start_iso"
    | "end_iso"
    | "description"
    | "location"
    | "attendees"
    | "company_name"
    | "person_name"
    | "client_id"
    | "status"
  >
>;

export interface SyncChanges {
  event_id: string;
  source: SyncStatus;
  calendar_id: CalendarPlacement;
}

export interface StoredClient {
  id: number;
  company_name: string;
  person_name: string | null;
  email: string | null;
  phone: string | null;
}

export type BillingType = "one_time" | "recurring";

export interface StoredProduct {
  product_code: string;
  name: string;
  category: string | null;
  description: string | null;
  base_price: number;
  billing_type: BillingType;
  level: string | null;
  is_active: boolean;
}

export interface StoredPurchase {
  id: number;
  client_id: number;
  product_code: string;
  company_name: string;
  person_name: string | null;
  purchase_date: string; // YYYY-MM-DD
  units: number;
  unit_price: number;
  discount_pct: number;
  notes: string | null;
}

export type NewPurchase = Omit<StoredPurchase, "id">;

export type PurchaseChanges = Partial<NewPurchase>;

export const EVENT_COLUMNS = [
  "event_id",
  "summary",
  "start_iso",
  "end_iso",
  "description",
  "location",
  "attendees_json",
  "company_name",
  "person_name",
  "source",
  "calendar_id",
  "timezone",
  "status",
  "client_id",
  "created_at",
] as const;
export type EventColumn = (typeof EVENT_COLUMNS)[number];

export const CLIENT_COLUMNS = [
  "id",
  "company_name",
  "person_name",
  "email",
  "phone",
  "company_name_folded",
  "person_name_folded",
] as const;
export type ClientColumn = (typeof CLIENT_COLUMNS)[number];

export const PRODUCT_COLUMNS = [
  "product_code",
  "name",
  "category",
  "description",
  "base_price",
  "billing_type",
  "level",
  "is_active",
] as const;
export type ProductColumn = (typeof PRODUCT_COLUMNS)[number];

export const PURCHASE_COLUMNS = [
  "id",
  "client_id",
  "product_code",
  "company_name",
  "person_name",
  "purchase_date",
  "units",
  "unit_price",
  "discount_pct",
  "notes",
] as const;
export type PurchaseColumn = (typeof PURCHASE_COLUMNS)[number];

// ============================================================================
// Connection
// ============================================================================

export interface DatabaseLocation {
  /** ":memory:", a file path, or a libsql:// / https:// URL */
  url: string;
  authToken?: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS clients (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    company_name TEXT NOT NULL,
    person_name TEXT,
    email TEXT,
    phone TEXT,
    company_name_folded TEXT,
    person_name_folded TEXT
  );

  CREATE TABLE IF NOT EXISTS products (
    product_code TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    category TEXT,
    description TEXT,
    base_price REAL NOT NULL,
    billing_type TEXT NOT NULL DEFAULT 'one_time' CHECK(billing_type IN ('one_time', 'recurring')),
    level TEXT,
    is_active INTEGER NOT NULL DEFAULT 1
  );

  CREATE TABLE IF NOT EXISTS calendar_events (
    event_id TEXT PRIMARY KEY,
    summary TEXT NOT NULL,
    start_iso TEXT NOT NULL,
    end_iso TEXT NOT NULL,
    description TEXT,
    location TEXT,
    attendees_json TEXT NOT NULL DEFAULT '[]',
    company_name TEXT,
    person_name TEXT,
    source TEXT NOT NULL CHECK(source IN ('synced', 'supabase_only')),
    calendar_id TEXT NOT NULL CHECK(calendar_id IN ('primary', 'local')),
    timezone TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'confirmed',
    client_id INTEGER REFERENCES clients(id),
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_events_start ON calendar_events(start_iso);
  CREATE INDEX IF NOT EXISTS idx_events_client ON calendar_events(client_id);

  CREATE TABLE IF NOT EXISTS client_products (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    client_id INTEGER NOT NULL REFERENCES clients(id),
    product_code TEXT NOT NULL,
    company_name TEXT NOT NULL,
    person_name TEXT,
    purchase_date TEXT NOT NULL,
    units INTEGER NOT NULL DEFAULT 1,
    unit_price REAL NOT NULL,
    discount_pct REAL NOT NULL DEFAULT 0,
    notes TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_purchases_client ON client_products(client_id);
`;

/**
 * Open a database and create tables if they don't exist
 */
export async function openDatabase(location: DatabaseLocation): Promise<Client> {
  let client: Client;

  if (location.url === ":memory:") {
    client = createClient({ url: ":memory:" });
  } else if (/^(libsql|https?|wss?):\/\//.test(location.url)) {
    client = createClient({ url: location.url, authToken: location.authToken });
  } else {
    const dir = path.dirname(location.url);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    client = createClient({ url: `file:${location.url}` });
  }

  await client.executeMultiple(SCHEMA);
  await addClientFolding(client);
  return client;
}

/**
 * Databases created before the folded name columns existed get them added
 * and filled in here.
 */
async function addClientFolding(client: Client): Promise<void> {
  const info = await client.execute("PRAGMA table_info(clients)");
  const existing = new Set(info.rows.map((row) => readString(row, "name")));
  for (const column of ["company_name_folded", "person_name_folded"]) {
    if (!existing.has(column)) {
      await client.execute(`ALTER TABLE clients ADD COLUMN ${column} TEXT`);
    }
  }

  const stale = await client.execute(
    "SELECT id, company_name, person_name FROM clients WHERE company_name_folded IS NULL"
  );
  for (const row of stale.rows) {
    const person = readNullableString(row, "person_name");
    await client.execute({
      sql: "UPDATE clients SET company_name_folded = ?, person_name_folded = ? WHERE id = ?",
      args: [foldCase(readString(row, "company_name")), person === null ? null : foldCase(person), readNumber(row, "id")],
    });
  }

  await client.execute(
    "CREATE INDEX IF NOT EXISTS idx_clients_company_folded ON clients(company_name_folded)"
  );
}

// ============================================================================
// Row readers
// ============================================================================

function readString(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== "string") {
    throw new Error(`Expected text in column ${column}, got ${typeof value}`);
  }
  return value;
}

function readNullableString(row: Row, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  return readString(row, column);
}

function readNumber(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === "bigint") return Number(value);
  if (typeof value !== "number") {
    throw new Error(`Expected number in column ${column}, got ${typeof value}`);
  }
  return value;
}

function readNullableNumber(row: Row, column: string): number | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  return readNumber(row, column);
}

function readSyncStatus(row: Row): SyncStatus {
  const value = readString(row, "source");
  if (value === "synced" || value === "supabase_only") return value;
  throw new Error(`Unknown sync status: ${value}`);
}

function readPlacement(row: Row): CalendarPlacement {
  const value = readString(row, "calendar_id");
  if (value === "primary" || value === "local") return value;
  throw new Error(`Unknown calendar placement: ${value}`);
}

function readBillingType(row: Row): BillingType {
  const value = readString(row, "billing_type");
  if (value === "one_time" || value === "recurring") return value;
  throw new Error(`Unknown billing type: ${value}`);
}

function parseAttendees(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((v): v is string => typeof v === "string");
}

function rowToStoredEvent(row: Row): StoredEvent {
  return {
    event_id: readString(row, "event_id"),
    summary: readString(row, "summary"),
    start_iso: readString(row, "start_iso"),
    end_iso: readString(row, "end_iso"),
    description: readNullableString(row, "description"),
    location: readNullableString(row, "location"),
    attendees: parseAttendees(readString(row, "attendees_json")),
    company_name: readNullableString(row, "company_name"),
    person_name: readNullableString(row, "person_name"),
    source: readSyncStatus(row),
    calendar_id: readPlacement(row),
    timezone: readString(row, "timezone"),
    status: readString(row, "status"),
    client_id: readNullableNumber(row, "client_id"),
    created_at: readString(row, "created_at"),
  };
}

function rowToClient(row: Row): StoredClient {
  return {
    id: readNumber(row, "id"),
    company_name: readString(row, "company_name"),
    person_name: readNullableString(row, "person_name"),
    email: readNullableString(row, "email"),
    phone: readNullableString(row, "phone"),
  };
}

function rowToProduct(row: Row): StoredProduct {
  return {
    product_code: readString(row, "product_code"),
    name: readString(row, "name"),
    category: readNullableString(row, "category"),
    description: readNullableString(row, "description"),
    base_price: readNumber(row, "base_price"),
    billing_type: readBillingType(row),
    level: readNullableString(row, "level"),
    is_active: readNumber(row, "is_active") === 1,
  };
}

function rowToPurchase(row: Row): StoredPurchase {
  return {
    id: readNumber(row, "id"),
    client_id: readNumber(row, "client_id"),
    product_code: readString(row, "product_code"),
    company_name: readString(row, "company_name"),
    person_name: readNullableString(row, "person_name"),
    purchase_date: readString(row, "purchase_date"),
    units: readNumber(row, "units"),
    unit_price: readNumber(row, "unit_price"),
    discount_pct: readNumber(row, "discount_pct"),
    notes: readNullableString(row, "notes"),
  };
}

function eventChangesToColumns(changes: EventChanges): Partial<Record<EventColumn, InValue>> {
  const { attendees, ...rest } = changes;
  return {
    ...rest,
    attendees_json: attendees === undefined ? undefined : JSON.stringify(attendees),
  };
}

// ============================================================================
// Record store
// ============================================================================

export class RecordStore {
  constructor(private readonly db: Client) {}

  close(): void {
    this.db.close();
  }

  // --- Events ---------------------------------------------------------------

  /**
   * Insert or replace an event keyed by event_id. created_at is kept on conflict.
   */
  async upsertEvent(event: NewEvent): Promise<StoredEvent> {
    const result = await this.db.execute({
      sql: `
        INSERT INTO calendar_events (
          event_id, summary, start_iso, end_iso, description, location,
          attendees_json, company_name, person_name, source, calendar_id,
          timezone, status, client_id, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(event_id) DO UPDATE SET
          summary = excluded.summary,
          start_iso = excluded.start_iso,
          end_iso = excluded.end_iso,
          description = excluded.description,
          location = excluded.location,
          attendees_json = excluded.attendees_json,
          company_name = excluded.company_name,
          person_name = excluded.person_name,
          source = excluded.source,
          calendar_id = excluded.calendar_id,
          timezone = excluded.timezone,
          status = excluded.status,
          client_id = excluded.client_id
        RETURNING *
      `,
      args: [
        event.event_id,
        event.summary,
        event.start_iso,
        event.end_iso,
        event.description,
        event.location,
        JSON.stringify(event.attendees),
        event.company_name,
        event.person_name,
        event.source,
        event.calendar_id,
        event.timezone,
        event.status,
        event.client_id,
        new Date().toISOString(),
      ],
    });
    return rowToStoredEvent(result.rows[0]);
  }

  async getEvent(eventId: string): Promise<StoredEvent | null> {
    const result = await this.db.execute({
      sql: "SELECT * FROM calendar_events WHERE event_id = ?",
      args: [eventId],
    });
    return result.rows.length > 0 ? rowToStoredEvent(result.rows[0]) : null;
  }

  async listEvents(filters: ColumnFilter<EventColumn>[] = []): Promise<StoredEvent[]> {
    const where = buildWhereClause(filters, EVENT_COLUMNS, { timestampColumns: ["start_iso", "end_iso"] });
    const result = await this.db.execute({
      sql: `SELECT * FROM calendar_events ${where.sql} ORDER BY julianday(start_iso), event_id`,
      args: where.args,
    });
    return result.rows.map(rowToStoredEvent);
  }

  /**
   * Apply field changes to an event. Returns null when no row has that event_id.
   */
  async updateEvent(eventId: string, changes: EventChanges): Promise<StoredEvent | null> {
    const set = buildSetClause(eventChangesToColumns(changes), EVENT_COLUMNS);
    if (set.sql === "") {
      return this.getEvent(eventId);
    }
    const result = await this.db.execute({
      sql: `UPDATE calendar_events SET ${set.sql} WHERE event_id = ? RETURNING *`,
      args: [...set.args, eventId],
    });
    return result.rows.length > 0 ? rowToStoredEvent(result.rows[0]) : null;
  }

  /**
   * Move a local-only event onto its external identifier
   */
  async markEventSynced(oldEventId: string, sync: SyncChanges): Promise<StoredEvent | null> {
    const result = await this.db.execute({
      sql: `
        UPDATE calendar_events
        SET event_id = ?, source = ?, calendar_id = ?
        WHERE event_id = ?
        RETURNING *
      `,
      args: [sync.event_id, sync.source, sync.calendar_id, oldEventId],
    });
    return result.rows.length > 0 ? rowToStoredEvent(result.rows[0]) : null;
  }

  /**
   * Delete by event_id. Returns the number of rows removed.
   */
  async deleteEvent(eventId: string): Promise<number> {
    const result = await this.db.execute({
      sql: "DELETE FROM calendar_events WHERE event_id = ?",
      args: [eventId],
    });
    return result.rowsAffected;
  }

  // --- Clients --------------------------------------------------------------

  async findClients(filters: ColumnFilter<ClientColumn>[], limit?: number): Promise<StoredClient[]> {
    const where = buildWhereClause(filters, CLIENT_COLUMNS);
    const limitSql = limit === undefined ? "" : "LIMIT ?";
    const result = await this.db.execute({
      sql: `SELECT * FROM clients ${where.sql} ORDER BY id ${limitSql}`,
      args: limit === undefined ? where.args : [...where.args, limit],
    });
    return result.rows.map(rowToClient);
  }

  async getClient(id: number): Promise<StoredClient | null> {
    const result = await this.db.execute({
      sql: "SELECT * FROM clients WHERE id = ?",
      args: [id],
    });
    return result.rows.length > 0 ? rowToClient(result.rows[0]) : null;
  }

  /**
   * Insert a client along with the case-folded copies of its names used for matching
   */
  async insertClient(companyName: string, personName: string | null): Promise<StoredClient> {
    const result = await this.db.execute({
      sql: `
        INSERT INTO clients (company_name, person_name, company_name_folded, person_name_folded)
        VALUES (?, ?, ?, ?)
        RETURNING *
      `,
      args: [companyName, personName, foldCase(companyName), personName === null ? null : foldCase(personName)],
    });
    return rowToClient(result.rows[0]);
  }

  // --- Products -------------------------------------------------------------

  async listProducts(filters: ColumnFilter<ProductColumn>[] = []): Promise<StoredProduct[]> {
    const where = buildWhereClause(filters, PRODUCT_COLUMNS);
    const result = await this.db.execute({
      sql: `SELECT * FROM products ${where.sql} ORDER BY product_code`,
      args: where.args,
    });
    return result.rows.map(rowToProduct);
  }

  async upsertProduct(product: StoredProduct): Promise<StoredProduct> {
    const result = await this.db.execute({
      sql: `
        INSERT INTO products (
          product_code, name, category, description, base_price,
          billing_type, level, is_active
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(product_code) DO UPDATE SET
          name = excluded.name,
          category = excluded.category,
          description = excluded.description,
          base_price = excluded.base_price,
          billing_type = excluded.billing_type,
          level = excluded.level,
          is_active = excluded.is_active
        RETURNING *
      `,
      args: [
        product.product_code,
        product.name,
        product.category,
        product.description,
        product.base_price,
        product.billing_type,
        product.level,
        product.is_active ? 1 : 0,
      ],
    });
    return rowToProduct(result.rows[0]);
  }

  // --- Purchases ------------------------------------------------------------

  async listPurchases(filters: ColumnFilter<PurchaseColumn>[] = []): Promise<StoredPurchase[]> {
    const where = buildWhereClause(filters, PURCHASE_COLUMNS, { timestampColumns: ["purchase_date"] });
    const result = await this.db.execute({
      sql: `SELECT * FROM client_products ${where.sql} ORDER BY purchase_date, id`,
      args: where.args,
    });
    return result.rows.map(rowToPurchase);
  }

  async insertPurchase(purchase: NewPurchase): Promise<StoredPurchase> {
    const result = await this.db.execute({
      sql: `
        INSERT INTO client_products (
          client_id, product_code, company_name, person_name, purchase_date,
          units, unit_price, discount_pct, notes
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
        RETURNING *
      `,
      args: [
        purchase.client_id,
        purchase.product_code,
        purchase.company_name,
        purchase.person_name,
        purchase.purchase_date,
        purchase.units,
        purchase.unit_price,
        purchase.discount_pct,
        purchase.notes,
      ],
    });
    return rowToPurchase(result.rows[0]);
  }

  async updatePurchase(id: number, changes: PurchaseChanges): Promise<StoredPurchase | null> {
    const set = buildSetClause<PurchaseColumn>(changes, PURCHASE_COLUMNS.filter((c) => c !== "id"));
    if (set.sql === "") {
      const existing = await this.listPurchases([{ column: "id", op: "eq", value: id }]);
      return existing[0] ?? null;
    }
    const result = await this.db.execute({
      sql: `UPDATE client_products SET ${set.sql} WHERE id = ? RETURNING *`,
      args: [...set.args, id],
    });
    return result.rows.length > 0 ? rowToPurchase(result.rows[0]) : null;
  }

  async deletePurchase(id: number): Promise<number> {
    const result = await this.db.execute({
      sql: "DELETE FROM client_products WHERE id = ?",
      args: [id],
    });
    return result.rowsAffected;
  }
}
