import express from "express";
import cors from "cors";
import type { Express, Request, Response } from "express";
import type { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { McpSessions } from "./mcpSessions.js";
import { createStopwatchServer } from "./server.js";
import type { StopwatchToolset } from "./tools/stopwatchTool.js";
import { renderPage } from "./ui/page.js";

export interface HttpAppContext {
  app: Express;
  closeSessions(): Promise<void>;
}

export function createHttpApp(toolset: StopwatchToolset): HttpAppContext {
  const app = express();
  app.use(express.json({ limit: "2mb" }));
  app.use(
    cors({
      origin: "*",
      exposedHeaders: ["Mcp-Session-Id"]
    })
  );

  app.get("/", (_req: Request, res: Response) => {
    res.type("html").send(renderPage());
  });

  app.get("/api/stopwatch", (_req: Request, res: Response) => {
    res.json({ view: toolset.getView() });
  });

  app.post("/api/stopwatch/toggle", async (_req: Request, res: Response) => {
    try {
      res.json(await toolset.toggle());
    } catch (error) {
      console.error("Error toggling stopwatch", error);
      res.status(500).json({
        error: "internal_error",
        message: "Failed to toggle the stopwatch."
      });
    }
  });

  app.post("/api/stopwatch/reset", (_req: Request, res: Response) => {
    res.json(toolset.reset());
  });

  const sessions = new McpSessions(() => createStopwatchServer(toolset));

  const sendError = (res: Response, status: number, error: string, message: string) => {
    if (!res.headersSent) {
      res.status(status).json({ error, message });
    }
  };

  const findSession = (req: Request, res: Response): StreamableHTTPServerTransport | null => {
    const sessionId = req.header("mcp-session-id");
    if (!sessionId) {
      sendError(res, 400, "missing_session", "Provide an MCP-Session-Id header.");
      return null;
    }
    const transport = sessions.get(sessionId);
    if (!transport) {
      sendError(res, 404, "unknown_session", "Session not found. Start a new session to initialize.");
      return null;
    }
    return transport;
  };

  app.post("/mcp", async (req: Request, res: Response) => {
    try {
      if (req.header("mcp-session-id")) {
        const transport = findSession(req, res);
        if (transport) {
          await transport.handleRequest(req, res, req.body);
        }
        return;
      }

      if (!isInitializeRequest(req.body)) {
        sendError(res, 400, "not_initialized", "Start a session with an initialize request before calling tools.");
        return;
      }

      const transport = await sessions.open();
      await transport.handleRequest(req, res, req.body);
      if (!transport.sessionId) {
        await transport.close();
      }
    } catch (error) {
      console.error("Error handling MCP POST request", error);
      sendError(res, 500, "internal_error", "breakwatch encountered an unexpected error.");
    }
  });

  const forwardToSession = (purpose: string) => async (req: Request, res: Response) => {
    const transport = findSession(req, res);
    if (!transport) {
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      console.error(`Failed to ${purpose}`, error);
      sendError(res, 500, "internal_error", `Failed to ${purpose}.`);
    }
  };

  app.get("/mcp", forwardToSession("stream MCP updates"));
  app.delete("/mcp", forwardToSession("close the MCP session"));

  return { app, closeSessions: () => sessions.closeAll() };
}
