import { Router, type IRouter } from "express";
import type { GatewayContext } from "../context.js";
import { admissionGate, takeAdmission } from "../middleware/admission.js";
import { serperQuery } from "../tools/catalog.js";
import { invokeTool } from "../tools/invoke.js";
import { PAYMENT_HEADERS } from "../types.js";
import { toBase64 } from "../utils/base64.js";

// ---------------------------------------------------------------------------
// POST /tools/:toolId   { ...tool arguments }
//
// Plain-HTTP tool transport.  The admission gate runs before the arguments
// are even looked at; a paid call that fails validation or upstream is
// never settled.
// ---------------------------------------------------------------------------

export function toolsRouter(ctx: GatewayContext): IRouter {
  const router: IRouter = Router();

  router.post("/tools/:toolId", (req, res, next) => {
    if (!ctx.tools.has(req.params.toolId)) {
      res.status(404).json({ success: false, error: `Unknown tool: ${req.params.toolId}` });
      return;
    }
    next();
  });

  router.post(
    "/tools/:toolId",
    admissionGate(ctx, (req) => [req.params.toolId]),
    async (req, res, next) => {
      const toolId = req.params.toolId;
      const tool = ctx.tools.get(toolId);
      const admission = takeAdmission(res.locals, toolId);

      if (!tool || !admission) {
        next(new Error(`Tool ${toolId} reached its handler without an admission`));
        return;
      }

      const args = serperQuery.safeParse(req.body ?? {});
      if (!args.success) {
        res.status(400).json({
          success: false,
          error: `Invalid arguments: ${args.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ")}`,
        });
        return;
      }

      try {
        const { result, receipt } = await invokeTool(ctx, tool, args.data, admission);

        if (!result.ok) {
          res.status(502).json({ success: false, error: result.error, endpoint: result.endpoint });
          return;
        }

        if (receipt) res.set(PAYMENT_HEADERS.RESPONSE, toBase64(receipt));
        res.json({
          success: true,
          data: result.data,
          ...(receipt ? { receipt } : {}),
        });
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}
