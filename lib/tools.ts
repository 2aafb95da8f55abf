/**
 * Assistant Tools
 *
 * Named operations with zod-validated JSON arguments. Any orchestration
 * layer (the MCP server, a script, an LLM agent) drives the engine
 * through this registry.
 */

import { z } from "zod";
import type { EventSyncEngine } from "./calendar-sync.js";
import type { ClientResolver } from "./client-resolver.js";
import type { PurchaseService } from "./purchases.js";
import { ToolInputError } from "./errors.js";

export interface ToolResult {
  status: string;
}

export type JsonObjectSchema = {
  type: "object";
  properties?: Record<string, object>;
  required?: string[];
};

export interface AssistantTool {
  name: string;
  description: string;
  inputSchema: JsonObjectSchema;
  invoke(args: unknown): Promise<ToolResult>;
}

interface ToolSpec<S extends z.ZodObject> {
  name: string;
  description: string;
  input: S;
  run(args: z.output<S>): Promise<ToolResult> | ToolResult;
}

export function defineTool<S extends z.ZodObject>(spec: ToolSpec<S>): AssistantTool {
  // callers send input, so defaulted fields stay optional
  const jsonSchema = z.toJSONSchema(spec.input, { io: "input" });
  const properties = Object.fromEntries(
    Object.entries(jsonSchema.properties ?? {}).filter(
      (entry): entry is [string, Exclude<(typeof entry)[1], boolean>] => typeof entry[1] === "object"
    )
  );
  return {
    name: spec.name,
    description: spec.description,
    inputSchema: {
      type: "object",
      properties,
      required: jsonSchema.required ?? [],
    },
    async invoke(args: unknown) {
      const parsed = spec.input.safeParse(args ?? {});
      if (!parsed.success) {
        throw new ToolInputError(`Invalid arguments for ${spec.name}:\n${z.prettifyError(parsed.error)}`);
      }
      return spec.run(parsed.data);
    },
  };
}

// ============================================================================
// Schemas
// ============================================================================

const isoTimestamp = z.iso.datetime({ offset: true });
const optionalText = z.string().nullable().optional();

const eventFields = {
  summary: z.string().min(1).describe("Event title"),
  start_iso: isoTimestamp.describe("Start time, ISO 8601 with offset (e.g. 2026-03-10T10:00:00-06:00)"),
  end_iso: isoTimestamp.describe("End time, ISO 8601 with offset"),
  description: optionalText.describe("Event details"),
  location: optionalText.describe("Where the event takes place"),
  attendees: z.array(z.email()).optional().describe("Attendee e-mail addresses"),
  company_name: optionalText.describe("Company the event is with"),
  person_name: optionalText.describe("Contact person at the company"),
};

function endsAfterStart(value: { start_iso?: string; end_iso?: string }): boolean {
  if (value.start_iso === undefined || value.end_iso === undefined) return true;
  return Date.parse(value.end_iso) > Date.parse(value.start_iso);
}

export const createEventInput = z
  .object(eventFields)
  .refine(endsAfterStart, { message: "end_iso must be after start_iso", path: ["end_iso"] });

export const updateEventInput = z.object({
  event_id: z.string().min(1).describe("Identifier of the event to update"),
  updates: z
    .object({
      summary: eventFields.summary.optional(),
      start_iso: isoTimestamp.optional(),
      end_iso: isoTimestamp.optional(),
      description: optionalText,
      location: optionalText,
      attendees: eventFields.attendees,
      company_name: optionalText,
      person_name: optionalText,
      client_id: z.number().int().positive().nullable().optional().describe("Explicit client; skips name resolution"),
      status: z.string().min(1).optional(),
    })
    .strict()
    .refine(endsAfterStart, { message: "end_iso must be after start_iso", path: ["end_iso"] }),
});

export const deleteEventInput = z.object({
  event_id: z.string().min(1).describe("Identifier of the event to delete"),
});

export const listEventsInput = z.object({
  event_id: z.string().min(1).optional(),
  time_min: isoTimestamp.optional().describe("Only events starting at or after this time"),
  time_max: isoTimestamp.optional().describe("Only events starting at or before this time"),
  summary: z.string().min(1).optional().describe("Partial, case-insensitive title match"),
  company: z.string().min(1).optional().describe("Partial, case-insensitive company match"),
  client_id: z.number().int().positive().optional(),
});

export const resolveClientInput = z.object({
  company_name: z.string().min(1),
  person_name: z.string().min(1).optional(),
  create_if_missing: z.boolean().default(true),
});

export const listProductsInput = z.object({
  category: z.string().min(1).optional(),
  min_price: z.number().nonnegative().optional(),
  max_price: z.number().nonnegative().optional(),
  only_active: z.boolean().default(true),
});

export const upsertProductInput = z.object({
  product_code: z.string().min(1),
  name: z.string().min(1),
  category: optionalText,
  description: optionalText,
  base_price: z.number().nonnegative(),
  billing_type: z.enum(["one_time", "recurring"]).default("one_time"),
  level: optionalText,
  is_active: z.boolean().default(true),
});

const purchaseDate = z.iso.date().describe("Purchase date (YYYY-MM-DD)");

export const listPurchasesInput = z.object({
  client_id: z.number().int().positive().optional(),
  company_name: z.string().min(1).optional(),
  person_name: z.string().min(1).optional(),
  product_code: z.string().min(1).optional(),
  date_min: purchaseDate.optional(),
  date_max: purchaseDate.optional(),
});

export const addPurchaseInput = z
  .object({
    client_id: z.number().int().positive().optional(),
    company_name: z.string().min(1).optional(),
    person_name: z.string().min(1).optional(),
    product_code: z.string().min(1),
    purchase_date: purchaseDate,
    units: z.number().int().positive().default(1),
    unit_price: z.number().nonnegative(),
    discount_pct: z.number().min(0).max(100).default(0),
    notes: optionalText,
  })
  .refine((v) => v.client_id !== undefined || v.company_name !== undefined, {
    message: "client_id or company_name is required",
    path: ["company_name"],
  });

export const updatePurchaseInput = z.object({
  id: z.number().int().positive(),
  updates: z
    .object({
      client_id: z.number().int().positive().optional(),
      company_name: z.string().min(1).optional(),
      person_name: z.string().min(1).nullable().optional(),
      product_code: z.string().min(1).optional(),
      purchase_date: purchaseDate.optional(),
      units: z.number().int().positive().optional(),
      unit_price: z.number().nonnegative().optional(),
      discount_pct: z.number().min(0).max(100).optional(),
      notes: optionalText,
    })
    .strict(),
});

export const deletePurchaseInput = z.object({
  id: z.number().int().positive(),
});

// ============================================================================
// Registry
// ============================================================================

export interface ToolDependencies {
  engine: EventSyncEngine;
  resolver: ClientResolver;
  purchases: PurchaseService;
}

export function createAssistantTools({ engine, resolver, purchases }: ToolDependencies): AssistantTool[] {
  return [
    defineTool({
      name: "create_event",
      description:
        "Create an event. It is written to Google Calendar when reachable (status synced) and always to the local store; " +
        "when the calendar fails the event gets a local_ id (status supabase_only).",
      input: createEventInput,
      run: (args) => engine.create(args),
    }),
    defineTool({
      name: "update_event",
      description:
        "Update an event by event_id. Changing company_name or person_name re-resolves the client unless client_id is given. " +
        "Synced events are also updated in Google Calendar.",
      input: updateEventInput,
      run: (args) => engine.update(args.event_id, args.updates),
    }),
    defineTool({
      name: "delete_event",
      description:
        "Delete an event by event_id from the local store, and from Google Calendar unless it is a local_ event.",
      input: deleteEventInput,
      run: (args) => engine.delete(args.event_id),
    }),
    defineTool({
      name: "list_events",
      description: "List stored events, filtered by id, start-time range, title, company or client.",
      input: listEventsInput,
      run: (args) => engine.listEvents(args),
    }),
    defineTool({
      name: "sync_local_events",
      description:
        "Push every local-only event (local_ id) to Google Calendar and adopt the calendar id. Safe to repeat.",
      input: z.object({}),
      run: () => engine.backfillSync(),
    }),
    defineTool({
      name: "reset_calendar_connection",
      description: "Forget a cached calendar failure so the next operation tries to connect again.",
      input: z.object({}),
      run: () => engine.resetConnection(),
    }),
    defineTool({
      name: "resolve_client",
      description: "Find a client by partial company (and person) name, creating it when missing if requested.",
      input: resolveClientInput,
      run: async (args) => {
        const resolution = await resolver.resolve(args.company_name, args.person_name, args.create_if_missing);
        return { status: resolution.client_id === null ? "not_found" : "ok", ...resolution };
      },
    }),
    defineTool({
      name: "list_products",
      description: "List catalogue products by category and price range.",
      input: listProductsInput,
      run: (args) => purchases.listProducts(args),
    }),
    defineTool({
      name: "upsert_product",
      description: "Create or update a catalogue product keyed by product_code.",
      input: upsertProductInput,
      run: (args) => purchases.upsertProduct(args),
    }),
    defineTool({
      name: "list_client_purchases",
      description: "List products bought by clients, filtered by client, names, product or date range.",
      input: listPurchasesInput,
      run: (args) => purchases.listPurchases(args),
    }),
    defineTool({
      name: "add_client_purchase",
      description: "Record a product purchase for a client, resolving or creating the client from its name.",
      input: addPurchaseInput,
      run: (args) => purchases.addPurchase(args),
    }),
    defineTool({
      name: "update_client_purchase",
      description: "Update a purchase record by id.",
      input: updatePurchaseInput,
      run: (args) => purchases.updatePurchase(args.id, args.updates),
    }),
    defineTool({
      name: "delete_client_purchase",
      description: "Delete a purchase record by id.",
      input: deletePurchaseInput,
      run: (args) => purchases.deletePurchase(args.id),
    }),
  ];
}

export class ToolRegistry {
  private readonly tools = new Map<string, AssistantTool>();

  constructor(tools: AssistantTool[]) {
    for (const tool of tools) {
      this.tools.set(tool.name, tool);
    }
  }

  list(): AssistantTool[] {
    return Array.from(this.tools.values());
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  async call(name: string, args: unknown): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolInputError(`Unknown tool: ${name}`);
    }
    return tool.invoke(args);
  }
}
