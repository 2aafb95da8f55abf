import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ClientResolver } from "../lib/client-resolver.js";
import { openDatabase, RecordStore } from "../lib/crm-db.js";

describe("ClientResolver", () => {
  let store: RecordStore;
  let resolver: ClientResolver;

  beforeEach(async () => {
    store = new RecordStore(await openDatabase({ url: ":memory:" }));
    resolver = new ClientResolver(store);
  });

  afterEach(() => {
    store.close();
  });

  it("matches an existing client by partial company name", async () => {
    const existing = await store.insertClient("Tecnoflex Manufacturing S.A. de C.V.", null);

    const resolution = await resolver.resolve("Tecnoflex");

    expect(resolution).toEqual({ client_id: existing.id, created: false });
    expect(await store.findClients([])).toHaveLength(1);
  });

  it("creates a client once and reuses it", async () => {
    const first = await resolver.resolveOrCreate("Nuevo Cliente SA", "Laura");
    const second = await resolver.resolveOrCreate("Nuevo Cliente SA", "Laura");

    expect(first).not.toBeNull();
    expect(second).toBe(first);

    const clients = await store.findClients([]);
    expect(clients).toHaveLength(1);
    expect(clients[0].company_name).toBe("Nuevo Cliente SA");
    expect(clients[0].person_name).toBe("Laura");
  });

  it("returns null without creating when asked not to", async () => {
    const resolution = await resolver.resolve("Unknown Corp", null, false);

    expect(resolution).toEqual({ client_id: null, created: false });
    expect(await store.findClients([])).toEqual([]);
  });

  it("returns null for an empty or missing company", async () => {
    expect(await resolver.resolveOrCreate("   ")).toBeNull();
    expect(await resolver.resolveOrCreate(null, "Laura")).toBeNull();
    expect(await resolver.resolveOrCreate(undefined)).toBeNull();
    expect(await store.findClients([])).toEqual([]);
  });

  it("trims names before matching and storing", async () => {
    const resolution = await resolver.resolve("  Acme  ", "  Wile  ");

    expect(resolution.created).toBe(true);
    const client = await store.getClient(resolution.client_id ?? -1);
    expect(client?.company_name).toBe("Acme");
    expect(client?.person_name).toBe("Wile");
  });

  it("requires the person to match when one is given", async () => {
    const acmeWile = await store.insertClient("Acme", "Wile");

    const other = await resolver.resolve("Acme", "Roadrunner");

    expect(other.created).toBe(true);
    expect(other.client_id).not.toBe(acmeWile.id);
  });

  it("picks the lowest id when several clients match", async () => {
    const north = await store.insertClient("Acme North", null);
    await store.insertClient("Acme South", null);

    expect(await resolver.resolveOrCreate("acme")).toBe(north.id);
  });

  it("ignores case in accented names", async () => {
    const existing = await store.insertClient("Óptima Servicios S.A. de C.V.", "Íñigo Muñoz");

    expect(await resolver.resolveOrCreate("óptima")).toBe(existing.id);
    expect(await resolver.resolveOrCreate("ÓPTIMA SERVICIOS", "íñigo")).toBe(existing.id);
    expect(await store.findClients([])).toHaveLength(1);
  });

  it("matches composed and decomposed accents alike", async () => {
    const existing = await store.insertClient("Construcciones Peña", null);

    expect(await resolver.resolveOrCreate("construcciones pen\u0303a")).toBe(existing.id);
  });
});
