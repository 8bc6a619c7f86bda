import { Router, type IRouter } from "express";

const router: IRouter = Router();

// Liveness only: no credential, no payment, no dependency checks.
router.get("/health", (_req, res) => {
  res.json({
    status: "ok",
    service: "paywire-gateway",
    timestamp: new Date().toISOString(),
  });
});

export default router;
