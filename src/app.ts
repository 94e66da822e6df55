import express from "express";
import { v4 as uuidv4 } from "uuid";
import type { AppConfig } from "./config/env";
import type { ConsentBackend } from "./consentTwilio/types";
import healthRouter from "./routes/health";
import { createConsentTwilioRouter } from "./routes/consentTwilio";
import type { BackgroundTaskRunner } from "./utils/backgroundTasks";
import logger, { asyncLocalStorage } from "./utils/logger";

export type AppDeps = {
  config: AppConfig;
  store: ConsentBackend;
  tasks: BackgroundTaskRunner;
};

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  // Middleware to assign a unique request ID and run the request in AsyncLocalStorage context
  app.use((req: express.Request, res: express.Response, next: express.NextFunction) => {
    const requestId = uuidv4();
    asyncLocalStorage.run(new Map([["requestId", requestId]]), () => {
      next();
    });
  });

  // Twilio webhooks POST as application/x-www-form-urlencoded
  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());

  app.use((req: express.Request, res: express.Response, next: express.NextFunction) => {
    logger.info(`Incoming request: ${req.method} ${req.originalUrl} - Body: ${JSON.stringify(req.body ?? {})}`);

    // Hook into res.send to log response body
    const originalSend = res.send.bind(res);
    res.send = (body?: unknown): express.Response => {
      logger.info(`Response for ${req.method} ${req.originalUrl} - Status: ${res.statusCode} - Body: ${String(body)}`);
      return originalSend(body);
    };

    next();
  });

  app.use("/", healthRouter);
  app.use(
    "/twilio",
    createConsentTwilioRouter({
      store: deps.store,
      tasks: deps.tasks,
      programName: deps.config.programName,
      twilioAuthToken: deps.config.twilioAuthToken,
      publicBaseUrl: deps.config.publicBaseUrl,
    })
  );

  app.use((req: express.Request, res: express.Response) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error(`Unhandled error for ${req.method} ${req.originalUrl}`, {
      errorMessage: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    if (res.headersSent) return;
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
