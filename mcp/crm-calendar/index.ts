#!/usr/bin/env node
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { createAssistant } from "../../lib/assistant.js";
import { loadConfig } from "../../lib/config.js";
import { errorMessage, ToolInputError } from "../../lib/errors.js";

// stdout carries the protocol; everything else goes to stderr
const log = (message: string) => console.error(message);

async function main() {
  const config = loadConfig();
  const assistant = await createAssistant(config, { log });

  const server = new Server(
    {
      name: "crm-calendar",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: assistant.tools.list().map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      })),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      const result = await assistant.tools.call(name, args);
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(result, null, 2),
          },
        ],
      };
    } catch (err) {
      const kind = err instanceof ToolInputError ? "invalid_arguments" : "error";
      log(`Tool ${name} failed: ${errorMessage(err)}`);
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify({ status: "error", kind, error: errorMessage(err) }, null, 2),
          },
        ],
        isError: true,
      };
    }
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log(`CRM calendar MCP server running on stdio (database: ${config.database.url})`);

  const shutdown = () => {
    assistant.close();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
