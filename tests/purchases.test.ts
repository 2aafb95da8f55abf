import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ClientResolver } from "../lib/client-resolver.js";
import { openDatabase, RecordStore } from "../lib/crm-db.js";
import { PurchaseService } from "../lib/purchases.js";

describe("PurchaseService", () => {
  let store: RecordStore;
  let purchases: PurchaseService;

  beforeEach(async () => {
    store = new RecordStore(await openDatabase({ url: ":memory:" }));
    purchases = new PurchaseService(store, new ClientResolver(store));
  });

  afterEach(() => {
    store.close();
  });

  describe("products", () => {
    beforeEach(async () => {
      await purchases.upsertProduct({ product_code: "CRS-101", name: "Leadership", category: "Training", base_price: 1200 });
      await purchases.upsertProduct({ product_code: "CRS-201", name: "Negotiation", category: "Training", base_price: 2400 });
      await purchases.upsertProduct({
        product_code: "SUB-001",
        name: "Coaching plan",
        category: "Subscription",
        base_price: 800,
        billing_type: "recurring",
      });
      await purchases.upsertProduct({ product_code: "OLD-001", name: "Retired", base_price: 100, is_active: false });
    });

    it("applies defaults on upsert", async () => {
      const result = await purchases.upsertProduct({ product_code: "NEW-1", name: "New", base_price: 10 });

      expect(result.record).toEqual({
        product_code: "NEW-1",
        name: "New",
        category: null,
        description: null,
        base_price: 10,
        billing_type: "one_time",
        level: null,
        is_active: true,
      });
    });

    it("lists only active products by default", async () => {
      const result = await purchases.listProducts();

      expect(result.count).toBe(3);
      expect(result.items.map((p) => p.product_code)).toEqual(["CRS-101", "CRS-201", "SUB-001"]);
    });

    it("includes inactive products on request", async () => {
      const result = await purchases.listProducts({ only_active: false });

      expect(result.count).toBe(4);
    });

    it("filters by category and price", async () => {
      const result = await purchases.listProducts({ category: "train", max_price: 2000 });

      expect(result.items.map((p) => p.product_code)).toEqual(["CRS-101"]);
    });
  });

  describe("purchases", () => {
    it("resolves the client from the company name", async () => {
      const client = await store.insertClient("Tecnoflex Manufacturing", "Laura");

      const result = await purchases.addPurchase({
        company_name: "tecnoflex",
        product_code: "CRS-101",
        purchase_date: "2026-02-15",
        unit_price: 1200,
      });

      expect(result.record).toMatchObject({
        client_id: client.id,
        company_name: "tecnoflex",
        units: 1,
        discount_pct: 0,
        notes: null,
      });
    });

    it("copies names from an explicit client", async () => {
      const client = await store.insertClient("Acme", "Wile");

      const result = await purchases.addPurchase({
        client_id: client.id,
        product_code: "CRS-201",
        purchase_date: "2026-02-20",
        units: 3,
        unit_price: 2400,
        discount_pct: 15,
      });

      expect(result.record.company_name).toBe("Acme");
      expect(result.record.person_name).toBe("Wile");
      expect(result.record.units).toBe(3);
    });

    it("rejects a purchase without a client", async () => {
      await expect(
        purchases.addPurchase({ product_code: "CRS-101", purchase_date: "2026-02-15", unit_price: 1 })
      ).rejects.toThrow("A purchase needs a client_id or a company_name");
    });

    it("rejects an unknown client id without a company", async () => {
      await expect(
        purchases.addPurchase({ client_id: 99, product_code: "CRS-101", purchase_date: "2026-02-15", unit_price: 1 })
      ).rejects.toThrow("Client 99 not found and no company_name given");
    });

    it("lists purchases in a date window", async () => {
      for (const date of ["2026-01-10", "2026-02-10", "2026-03-10"]) {
        await purchases.addPurchase({
          company_name: "Acme",
          product_code: "CRS-101",
          purchase_date: date,
          unit_price: 100,
        });
      }

      const result = await purchases.listPurchases({ company_name: "acme", date_min: "2026-02-01", date_max: "2026-03-10" });

      expect(result.items.map((p) => p.purchase_date)).toEqual(["2026-02-10", "2026-03-10"]);
    });

    it("re-resolves the client when the company changes", async () => {
      const added = await purchases.addPurchase({
        company_name: "Acme",
        product_code: "CRS-101",
        purchase_date: "2026-02-10",
        unit_price: 100,
      });

      const result = await purchases.updatePurchase(added.record.id, { company_name: "Globex" });

      expect(result.status).toBe("ok");
      if (result.status !== "ok") return;
      expect(result.record.company_name).toBe("Globex");
      expect(result.record.client_id).not.toBe(added.record.client_id);
    });

    it("reports missing purchases on update and delete", async () => {
      expect(await purchases.updatePurchase(42, { units: 2 })).toEqual({ status: "not_found", id: 42 });
      expect(await purchases.deletePurchase(42)).toEqual({ status: "not_found", id: 42 });
    });

    it("deletes a purchase", async () => {
      const added = await purchases.addPurchase({
        company_name: "Acme",
        product_code: "CRS-101",
        purchase_date: "2026-02-10",
        unit_price: 100,
      });

      expect(await purchases.deletePurchase(added.record.id)).toEqual({ status: "deleted", id: added.record.id });
      expect((await purchases.listPurchases()).count).toBe(0);
    });
  });
});
