import express, { NextFunction, Request, Response } from "express";
import { z } from "zod";
import type { AgentManager } from "./core/AgentManager.js";
import { formatIssues } from "./core/config.js";
import { describeError } from "./core/errors.js";
import { JsonValue, canIngest } from "./core/types.js";
import { FallRiskServiceOptions, createFallRiskService } from "./agentService.js";
import { requireApiKey } from "./middleware.js";
import type { MemoryOutput } from "./outputs/MemoryOutput.js";

export interface ServerOptions {
  manager: AgentManager;
  // Backs GET /events when present
  eventLog?: MemoryOutput;
  // Required in the X-API-Key header of mutating routes when set
  apiKey?: string;
  // Scoring settings for the on-demand fall-risk service
  fallRisk?: Omit<FallRiskServiceOptions, "apiKey">;
}

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const ReadingSchema = z.object({
  subjectId: z.string().min(1),
  modality: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
  value: JsonValueSchema,
});

/**
 * HTTP surface: health, agent status, reading ingestion and the
 * on-demand fall-risk agent service
 */
export function createServer(options: ServerOptions): express.Express {
  const { manager, eventLog, apiKey, fallRisk } = options;
  const app = express();

  app.use(express.json());

  const guard = requireApiKey(apiKey);

  app.use("/agents/v1/fallrisk", createFallRiskService({ ...fallRisk, apiKey }));

  app.get("/health", (req, res) => {
    res.status(200).send("Agent manager is running");
  });

  app.get("/agents", (req, res) => {
    res.status(200).json(manager.listAgentStatuses());
  });

  app.get("/agents/:agentId", (req, res) => {
    const status = manager.getAgentStatus(req.params.agentId);
    if (!status) {
      res.status(404).json({ error: `Agent "${req.params.agentId}" not found` });
      return;
    }
    res.status(200).json(status);
  });

  if (eventLog) {
    app.get("/events", (req, res) => {
      const limit = typeof req.query.limit === "string" ? Number(req.query.limit) : undefined;
      if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
        res.status(400).json({ error: "limit must be a non-negative integer" });
        return;
      }
      res.status(200).json(eventLog.list(limit));
    });
  }

  app.post("/sources/:sourceId/readings", guard, (req, res) => {
    const { sourceId } = req.params;
    const source = manager.getDataSource(sourceId);
    if (!source) {
      res.status(404).json({ error: `Data source "${sourceId}" not found` });
      return;
    }
    if (!canIngest(source)) {
      res.status(409).json({ error: `Data source "${sourceId}" does not accept readings` });
      return;
    }

    const reading = ReadingSchema.safeParse(req.body);
    if (!reading.success) {
      res.status(400).json({ error: "Invalid reading", issues: formatIssues(reading.error) });
      return;
    }

    try {
      source.ingest(reading.data);
    } catch (error) {
      res.status(400).json({ error: describeError(error) });
      return;
    }

    console.log(
      `📥 Ingested ${reading.data.modality} reading for ${reading.data.subjectId} into ${sourceId}`
    );
    res.status(202).json({ accepted: true });
  });

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (isBadRequest(error)) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }
    console.error("Error handling request:", error);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}

// body-parser marks unparseable bodies with status 400
function isBadRequest(error: unknown): boolean {
  return (
    typeof error === "object" && error !== null && "status" in error && error.status === 400
  );
}
