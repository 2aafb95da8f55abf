/**
 * Product catalogue and client purchase records.
 *
 * Purchases hang off a client id resolved the same way events are.
 */

import type { ClientResolver } from "./client-resolver.js";
import type {
  BillingType,
  ProductColumn,
  PurchaseChanges,
  PurchaseColumn,
  RecordStore,
  StoredProduct,
  StoredPurchase,
} from "./crm-db.js";
import type { ColumnFilter } from "./query-filter.js";

export interface ProductQuery {
  category?: string;
  min_price?: number;
  max_price?: number;
  /** Defaults to true */
  only_active?: boolean;
}

export interface ProductInput {
  product_code: string;
  name: string;
  category?: string | null;
  description?: string | null;
  base_price: number;
  billing_type?: BillingType;
  level?: string | null;
  is_active?: boolean;
}

export interface PurchaseQuery {
  client_id?: number;
  company_name?: string;
  person_name?: string;
  product_code?: string;
  date_min?: string;
  date_max?: string;
}

export interface PurchaseInput {
  client_id?: number | null;
  company_name?: string | null;
  person_name?: string | null;
  product_code: string;
  purchase_date: string;
  units?: number;
  unit_price: number;
  discount_pct?: number;
  notes?: string | null;
}

export type PurchaseUpdates = PurchaseChanges;

export interface ListResult<T> {
  status: "ok";
  count: number;
  items: T[];
}

export interface RecordResult<T> {
  status: "ok";
  record: T;
}

export interface NotFoundResult {
  status: "not_found";
  id: number;
}

export type DeleteResult = { status: "deleted"; id: number } | NotFoundResult;

export class PurchaseService {
  constructor(
    private readonly store: RecordStore,
    private readonly resolver: ClientResolver
  ) {}

  async listProducts(query: ProductQuery = {}): Promise<ListResult<StoredProduct>> {
    const filters: ColumnFilter<ProductColumn>[] = [];
    if (query.category) filters.push({ column: "category", op: "ilike", value: query.category });
    if (query.min_price !== undefined) filters.push({ column: "base_price", op: "gte", value: query.min_price });
    if (query.max_price !== undefined) filters.push({ column: "base_price", op: "lte", value: query.max_price });
    if (query.only_active ?? true) filters.push({ column: "is_active", op: "eq", value: true });

    const items = await this.store.listProducts(filters);
    return { status: "ok", count: items.length, items };
  }

  async upsertProduct(input: ProductInput): Promise<RecordResult<StoredProduct>> {
    const record = await this.store.upsertProduct({
      product_code: input.product_code,
      name: input.name,
      category: input.category ?? null,
      description: input.description ?? null,
      base_price: input.base_price,
      billing_type: input.billing_type ?? "one_time",
      level: input.level ?? null,
      is_active: input.is_active ?? true,
    });
    return { status: "ok", record };
  }

  async listPurchases(query: PurchaseQuery = {}): Promise<ListResult<StoredPurchase>> {
    const filters: ColumnFilter<PurchaseColumn>[] = [];
    if (query.client_id !== undefined) filters.push({ column: "client_id", op: "eq", value: query.client_id });
    if (query.company_name) filters.push({ column: "company_name", op: "ilike", value: query.company_name });
    if (query.person_name) filters.push({ column: "person_name", op: "ilike", value: query.person_name });
    if (query.product_code) filters.push({ column: "product_code", op: "eq", value: query.product_code });
    if (query.date_min) filters.push({ column: "purchase_date", op: "gte", value: query.date_min });
    if (query.date_max) filters.push({ column: "purchase_date", op: "lte", value: query.date_max });

    const items = await this.store.listPurchases(filters);
    return { status: "ok", count: items.length, items };
  }

  /**
   * Record a purchase. Without a client_id the client is resolved (or
   * created) from the names; with one, missing names are copied from it.
   */
  async addPurchase(input: PurchaseInput): Promise<RecordResult<StoredPurchase>> {
    let clientId = input.client_id ?? null;
    let companyName = input.company_name ?? null;
    let personName = input.person_name ?? null;

    if (clientId === null) {
      clientId = await this.resolver.resolveOrCreate(companyName, personName);
    } else if (!companyName) {
      const client = await this.store.getClient(clientId);
      if (client) {
        companyName = client.company_name;
        personName = personName ?? client.person_name;
      }
    }

    if (clientId === null) {
      throw new Error("A purchase needs a client_id or a company_name");
    }
    if (!companyName) {
      throw new Error(`Client ${clientId} not found and no company_name given`);
    }

    const record = await this.store.insertPurchase({
      client_id: clientId,
      product_code: input.product_code,
      company_name: companyName,
      person_name: personName,
      purchase_date: input.purchase_date,
      units: input.units ?? 1,
      unit_price: input.unit_price,
      discount_pct: input.discount_pct ?? 0,
      notes: input.notes ?? null,
    });
    return { status: "ok", record };
  }

  /**
   * Update a purchase by id; a company change without client_id re-resolves the client.
   */
  async updatePurchase(id: number, updates: PurchaseUpdates): Promise<RecordResult<StoredPurchase> | NotFoundResult> {
    const changes: PurchaseChanges = { ...updates };
    if (updates.company_name && updates.client_id === undefined) {
      const clientId = await this.resolver.resolveOrCreate(updates.company_name, updates.person_name);
      if (clientId !== null) {
        changes.client_id = clientId;
      }
    }

    const record = await this.store.updatePurchase(id, changes);
    if (!record) {
      return { status: "not_found", id };
    }
    return { status: "ok", record };
  }

  async deletePurchase(id: number): Promise<DeleteResult> {
    const removed = await this.store.deletePurchase(id);
    if (removed === 0) {
      return { status: "not_found", id };
    }
    return { status: "deleted", id };
  }
}
