import { Router, type Request, type Response } from "express";
import { SERVICE_NAME } from "../config/env";
import { isoNow } from "../utils/timeUtils";

const router = Router();

function healthHandler(_req: Request, res: Response): void {
  res.status(200).json({ status: "ok", service: SERVICE_NAME, time: isoNow() });
}

router.get("/", healthHandler);
router.get("/health", healthHandler);

export default router;
