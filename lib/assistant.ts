/**
 * Wires the record store, client resolver, calendar gateway, sync engine,
 * purchase service and tool registry from a loaded configuration.
 */

import {
  CalendarConnection,
  GoogleCalendarGateway,
  type CalendarEventsApi,
  type CalendarGateway,
} from "./calendar-gateway.js";
import { EventSyncEngine } from "./calendar-sync.js";
import { ClientResolver } from "./client-resolver.js";
import type { AssistantConfig } from "./config.js";
import { openDatabase, RecordStore } from "./crm-db.js";
import { connectCalendarEvents } from "./google-auth.js";
import { PurchaseService } from "./purchases.js";
import { createAssistantTools, ToolRegistry } from "./tools.js";

export interface Assistant {
  store: RecordStore;
  resolver: ClientResolver;
  gateway: CalendarGateway;
  engine: EventSyncEngine;
  purchases: PurchaseService;
  tools: ToolRegistry;
  close(): void;
}

export interface AssistantOptions {
  log?: (message: string) => void;
  /** Overrides the Google connection factory */
  connect?: () => Promise<CalendarEventsApi>;
}

export async function createAssistant(config: AssistantConfig, options: AssistantOptions = {}): Promise<Assistant> {
  const log = options.log ?? (() => {});
  const store = new RecordStore(await openDatabase(config.database));
  const resolver = new ClientResolver(store);

  const connect =
    options.connect ??
    (() => connectCalendarEvents({ configDir: config.configDir, account: config.googleAccount, log }));
  const gateway = new GoogleCalendarGateway(new CalendarConnection(connect), { log });

  const engine = new EventSyncEngine({
    store,
    resolver,
    gateway,
    timezone: config.timezone,
    timeouts: config.timeouts,
    log,
  });
  const purchases = new PurchaseService(store, resolver);
  const tools = new ToolRegistry(createAssistantTools({ engine, resolver, purchases }));

  return {
    store,
    resolver,
    gateway,
    engine,
    purchases,
    tools,
    close: () => store.close(),
  };
}
