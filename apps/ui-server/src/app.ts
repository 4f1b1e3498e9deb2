import cors from "cors";
import path from "path";
import express, { NextFunction, Request, Response } from "express";
import { z } from "zod";
import {
  BenchController,
  Campaign,
  ConfigValidationError,
  PreviewEvent,
  SessionStatus,
  campaignSchema,
  parseCampaign,
  sutSchema,
} from "@benchfleet/orchestrator";
import { errorHandler, NotFoundError } from "./errorHandler";
import { loadGames } from "./games";

export interface AppOptions {
  /** Campaign game references resolve against this directory. */
  gamesDir: string;
  keepAliveMs?: number;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

const sharedCampaignSchema = z.object({
  suts: z.array(z.string().min(1)).min(1),
  campaign: campaignSchema,
});

function writeEvent(res: Response, event: string, payload: unknown): void {
  res.write(`event: ${event}\ndata: ${JSON.stringify(payload)}\n\n`);
}

function previewPayload(event: PreviewEvent): Record<string, unknown> {
  if (event.type === "frame") {
    return { type: "frame", at: event.at, image: event.image.toString("base64") };
  }
  return { type: "disconnected", at: event.at, error: event.error };
}

function requestCampaign(value: unknown, gamesDir: string): Campaign {
  const campaign = parseCampaign(value, "request body", gamesDir);
  const root = path.resolve(gamesDir);
  const issues = campaign.entries.flatMap((entry, index) => {
    const relative = path.relative(root, entry.game);
    const outside = relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative);
    return outside ? [{ path: `entries.${index}.game`, message: "game must be inside the games directory" }] : [];
  });
  if (issues.length > 0) {
    throw new ConfigValidationError("request body", issues);
  }
  return campaign;
}

export function createApp(controller: BenchController, options: AppOptions) {
  const app = express();
  app.use(cors({ origin: true }));
  app.use(express.json());

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.get(
    "/api/games",
    route(async (_req, res) => {
      const games = await loadGames(options.gamesDir, {
        stepTimeoutMs: controller.config.runtime.defaultStepTimeoutMs,
        expectedDelayMs: controller.config.runtime.defaultExpectedDelayMs,
      });
      res.json({ games });
    }),
  );

  app.get("/api/suts", (_req: Request, res: Response) => {
    res.json({ suts: controller.listSuts() });
  });

  app.post("/api/suts", (req: Request, res: Response) => {
    const registration = sutSchema.parse(req.body);
    res.status(201).json(controller.registerSut(registration));
  });

  app.delete(
    "/api/suts/:id",
    route(async (req, res) => {
      await controller.removeSut(req.params.id);
      res.status(204).end();
    }),
  );

  app.get("/api/suts/:id/status", (req: Request, res: Response) => {
    res.json(controller.getSessionStatus(req.params.id));
  });

  app.get("/api/suts/:id/logs", (req: Request, res: Response) => {
    res.json({ logs: controller.logs(req.params.id) });
  });

  app.post("/api/suts/:id/campaign", (req: Request, res: Response) => {
    const campaign = requestCampaign(req.body, options.gamesDir);
    const handle = controller.startCampaign(req.params.id, campaign);
    res.status(202).json({ campaignId: handle.id, status: controller.campaignStatus(handle.id) });
  });

  app.post("/api/suts/:id/stop", (req: Request, res: Response) => {
    res.json({ stopped: controller.stopSession(req.params.id) });
  });

  app.post(
    "/api/suts/:id/reconnect",
    route(async (req, res) => {
      const status = await controller.reconnectSut(req.params.id);
      res.json({ status });
    }),
  );

  app.post(
    "/api/suts/:id/preview/stop",
    route(async (req, res) => {
      await controller.stopPreview(req.params.id);
      res.json({ stopped: true });
    }),
  );

  app.post("/api/campaigns/shared", (req: Request, res: Response) => {
    const body = sharedCampaignSchema.parse(req.body);
    const campaign = requestCampaign(body.campaign, options.gamesDir);
    const handle = controller.startSharedCampaign(body.suts, campaign);
    res.status(202).json({ campaignId: handle.id, status: controller.campaignStatus(handle.id) });
  });

  app.get("/api/campaigns/:id", (req: Request, res: Response) => {
    const status = controller.campaignStatus(req.params.id);
    if (!status) {
      throw new NotFoundError(`Campaign ${req.params.id} not found`);
    }
    res.json(status);
  });

  app.post("/api/campaigns/:id/stop", (req: Request, res: Response) => {
    res.json({ stopped: controller.stopCampaign(req.params.id) });
  });

  app.get("/api/suts/:id/stream", (req: Request, res: Response) => {
    const sutId = req.params.id;
    const initial = controller.getSessionStatus(sutId);
    const withPreview = req.query.preview === "1" || req.query.preview === "true";

    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });

    writeEvent(res, "status", initial);
    for (const line of controller.logs(sutId)) {
      writeEvent(res, "log", line);
    }

    const unsubscribers = [
      controller.subscribeStatus((status: SessionStatus) => {
        if (status.sutId === sutId) {
          writeEvent(res, "status", status);
        }
      }),
      controller.subscribeLogs(sutId, (line) => writeEvent(res, "log", line)),
    ];
    if (withPreview) {
      unsubscribers.push(controller.subscribePreview(sutId, (event) => writeEvent(res, "preview", previewPayload(event))));
    }

    const keepAlive = setInterval(() => {
      res.write(":\n\n");
    }, options.keepAliveMs ?? 15000);

    req.on("close", () => {
      clearInterval(keepAlive);
      for (const unsubscribe of unsubscribers) {
        unsubscribe();
      }
    });
  });

  app.use(errorHandler);
  return app;
}
