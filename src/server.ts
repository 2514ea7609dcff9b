import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import packageJson from "../package.json" with { type: "json" };
import { stopwatchActionShape } from "./tools/stopwatchTool.js";
import type { StopwatchToolset } from "./tools/stopwatchTool.js";
import type { StopwatchUpdateResult } from "./types.js";
import { buildStructuredContent } from "./ui/builders.js";

export function createStopwatchServer(toolset: StopwatchToolset): McpServer {
  const server = new McpServer(
    {
      name: "breakwatch",
      version: packageJson.version,
      description: "Stopwatch that signals when a break is due."
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  server.registerTool(
    "stopwatch",
    {
      title: "Stopwatch",
      description: "Show the elapsed time and break status, pause or resume the stopwatch, or reset it to zero.",
      inputSchema: stopwatchActionShape,
      annotations: {
        readOnlyHint: false
      }
    },
    async input => buildResult(await toolset.run(input))
  );

  return server;
}

function buildResult(result: StopwatchUpdateResult) {
  return {
    content: [
      {
        type: "text" as const,
        text: result.message
      }
    ],
    structuredContent: { ...buildStructuredContent(result.view) }
  };
}
