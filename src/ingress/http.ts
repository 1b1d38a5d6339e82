import { Express, Request, Response as ExResponse } from "express";
import { AgentServices } from "../agent";
import { ToolDispatcher } from "../tools/toolDispatcher";
import { ToolInvocation, isJsonObject } from "../types";
import { IngressAdapter } from "./types";

export type HttpReply =
  | { status: number; kind: "json"; body: unknown }
  | { status: number; kind: "text"; body: string };

/**
 * Accepts `{toolName, arguments}`. `arguments` is normally a JSON string; an object is
 * re-serialised so the dispatcher always sees raw text.
 */
export function parseToolRequest(body: unknown): ToolInvocation | undefined {
  if (!isJsonObject(body)) {
    return undefined;
  }
  const toolName = typeof body.toolName === "string" ? body.toolName.trim() : "";
  if (!toolName) {
    return undefined;
  }

  const args = body.arguments;
  let rawArguments: string;
  if (typeof args === "string") {
    rawArguments = args;
  } else if (args === undefined || args === null) {
    rawArguments = "";
  } else {
    rawArguments = JSON.stringify(args);
  }
  return { toolName, rawArguments };
}

export async function executeToolRequest(dispatcher: ToolDispatcher, body: unknown): Promise<HttpReply> {
  const invocation = parseToolRequest(body);
  if (!invocation) {
    return { status: 400, kind: "json", body: { error: "Missing toolName" } };
  }
  const text = await dispatcher.execute(invocation.toolName, invocation.rawArguments);
  return { status: 200, kind: "text", body: text };
}

export class HttpIngressAdapter implements IngressAdapter {
  register(app: Express, services: AgentServices): void {
    app.get("/health", (_req, res) => {
      res.json({ ok: true, tools: services.registry.listNames().length });
    });

    app.get("/tools", (_req, res) => {
      res.json({ tools: services.registry.buildOpenAITools() });
    });

    app.get("/operations", (_req, res) => {
      res.json({
        operations: services.tracker.list(),
        running: services.tracker.runningCount,
        selectedId: services.tracker.selectedId ?? null,
        stats: services.dispatcher.stats(),
        diagnostics: services.tracker.diagnostics()
      });
    });

    app.post("/tools/execute", async (req: Request, res: ExResponse) => {
      try {
        const reply = await executeToolRequest(services.dispatcher, req.body);
        if (reply.kind === "json") {
          res.status(reply.status).json(reply.body);
          return;
        }
        res.status(reply.status).type("application/json").send(reply.body);
      } catch (error) {
        services.logger.error("Tool request failed", error);
        res.status(500).json({ error: "Internal error" });
      }
    });
  }
}
