#!/usr/bin/env node

/**
 * mixer-mcp-server: MCP entry point.
 *
 * Registers tools and starts the stdio transport.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import {
  executeHandleEvents,
  executeListControls,
  executeListElements,
  executeSetEnumItem,
  executeSetSwitch,
  executeSetVolume,
} from "./tools/mixer.js";
import { MixerSession } from "./tools/session.js";
import {
  handleEventsSchema,
  listControlsSchema,
  listElementsSchema,
  setEnumItemSchema,
  setSwitchSchema,
  setVolumeSchema,
} from "./schemas/mixer.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("server");

const server = new McpServer({
  name: "mixer-mcp-server",
  version: "0.1.0",
});

const session = new MixerSession();

type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

async function respond(action: string, run: () => Promise<string>): Promise<ToolResult> {
  try {
    const text = await run();
    return { content: [{ type: "text", text }] };
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    return {
      content: [{ type: "text", text: `Error ${action}: ${msg}` }],
      isError: true,
    };
  }
}

// ---------------------------------------------------------------------------
// Tool: list_controls
// ---------------------------------------------------------------------------

server.tool(
  "list_controls",
  "List the raw controls of a mixer's cards in sorted cache order, with their compare weights.",
  listControlsSchema,
  async (input) => respond("listing controls", () => executeListControls(session, input)),
);

// ---------------------------------------------------------------------------
// Tool: list_elements
// ---------------------------------------------------------------------------

server.tool(
  "list_elements",
  "List a mixer's simple elements (Master, PCM, Capture, ...) with their capabilities, " +
    "volume ranges, switch states and enumerated items.",
  listElementsSchema,
  async (input) => respond("listing elements", () => executeListElements(session, input)),
);

// ---------------------------------------------------------------------------
// Tool: set_volume
// ---------------------------------------------------------------------------

server.tool(
  "set_volume",
  "Set the volume of a simple element on one channel or on every channel. " +
    "Use db: true to give the value in hundredths of a dB.",
  setVolumeSchema,
  async (input) => respond("setting volume", () => executeSetVolume(session, input)),
);

// ---------------------------------------------------------------------------
// Tool: set_switch
// ---------------------------------------------------------------------------

server.tool(
  "set_switch",
  "Turn a simple element's playback, capture or common switch on or off.",
  setSwitchSchema,
  async (input) => respond("setting switch", () => executeSetSwitch(session, input)),
);

// ---------------------------------------------------------------------------
// Tool: set_enum_item
// ---------------------------------------------------------------------------

server.tool(
  "set_enum_item",
  "Select an item of an enumerated simple element (e.g. the capture source) by position or name.",
  setEnumItemSchema,
  async (input) => respond("selecting item", () => executeSetEnumItem(session, input)),
);

// ---------------------------------------------------------------------------
// Tool: handle_events
// ---------------------------------------------------------------------------

server.tool(
  "handle_events",
  "Process pending control events on a mixer and report how many element events they produced.",
  handleEventsSchema,
  async (input) => respond("handling events", () => executeHandleEvents(session, input)),
);

// ---------------------------------------------------------------------------
// Start server
// ---------------------------------------------------------------------------

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("listening on stdio");
}

main().catch((error) => {
  console.error("Fatal error starting MCP server:", error);
  process.exit(1);
});
