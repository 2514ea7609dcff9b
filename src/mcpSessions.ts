import { randomUUID } from "crypto";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";

/**
 * Live MCP sessions by id. Each session owns its transport and the server
 * connected to it; closing either side releases both.
 */
export class McpSessions {
  private readonly transports = new Map<string, StreamableHTTPServerTransport>();

  constructor(private readonly createServer: () => McpServer) {}

  get(sessionId: string): StreamableHTTPServerTransport | undefined {
    return this.transports.get(sessionId);
  }

  /** Open a transport for an initialize request; it is registered once the session id is issued. */
  async open(): Promise<StreamableHTTPServerTransport> {
    const server = this.createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      enableJsonResponse: true,
      onsessioninitialized: sessionId => {
        this.transports.set(sessionId, transport);
      },
      onsessionclosed: sessionId => {
        this.transports.delete(sessionId);
      }
    });

    let closed = false;
    transport.onclose = () => {
      if (transport.sessionId) {
        this.transports.delete(transport.sessionId);
      }
      // server.close() closes the transport again, which lands back here
      if (closed) {
        return;
      }
      closed = true;
      server.close().catch(error => {
        console.error("Error closing MCP server", error);
      });
    };

    await server.connect(transport);
    return transport;
  }

  async closeAll(): Promise<void> {
    const open = [...this.transports.values()];
    this.transports.clear();
    await Promise.all(
      open.map(async transport => {
        try {
          await transport.close();
        } catch (error) {
          console.error("Error closing transport", error);
        }
      })
    );
  }
}
