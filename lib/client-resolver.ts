/**
 * Client Identity Resolver
 *
 * Maps free-text company/person names onto a canonical client row.
 * Matching is case-insensitive substring containment, so "Tecnoflex"
 * finds "Tecnoflex Manufacturing S.A. de C.V." and "óptima" finds
 * "Óptima Servicios". It runs against the stored folded names. When
 * several clients match, the lowest id wins.
 */

import { foldCase, type ColumnFilter } from "./query-filter.js";
import type { ClientColumn, RecordStore, StoredClient } from "./crm-db.js";

export interface ClientResolution {
  client_id: number | null;
  created: boolean;
}

export class ClientResolver {
  constructor(private readonly store: RecordStore) {}

  /**
   * Find the first client whose names contain the given text, or create one.
   * Store errors propagate to the caller.
   */
  async resolveOrCreate(
    companyName: string | null | undefined,
    personName?: string | null,
    createIfMissing = true
  ): Promise<number | null> {
    const resolution = await this.resolve(companyName, personName, createIfMissing);
    return resolution.client_id;
  }

  async resolve(
    companyName: string | null | undefined,
    personName?: string | null,
    createIfMissing = true
  ): Promise<ClientResolution> {
    const company = companyName?.trim();
    if (!company) {
      return { client_id: null, created: false };
    }
    const person = personName?.trim() || null;

    const match = await this.findMatch(company, person);
    if (match) {
      return { client_id: match.id, created: false };
    }

    if (!createIfMissing) {
      return { client_id: null, created: false };
    }

    const inserted = await this.store.insertClient(company, person);
    return { client_id: inserted.id, created: true };
  }

  private async findMatch(company: string, person: string | null): Promise<StoredClient | undefined> {
    const filters: ColumnFilter<ClientColumn>[] = [
      { column: "company_name_folded", op: "ilike", value: foldCase(company) },
    ];
    if (person) {
      filters.push({ column: "person_name_folded", op: "ilike", value: foldCase(person) });
    }
    const [first] = await this.store.findClients(filters, 1);
    return first;
  }
}
