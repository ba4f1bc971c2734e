import { OK, sendError } from "@/utils";
import type { TrackingEngine } from "@/services/tracking";
import { Request, Response, Router } from "express";

export type HealthProbe = () => Promise<Record<string, unknown>>;

class HealthController {
  rt = Router();
  baseRoute = "/health";

  constructor(
    private readonly engine: TrackingEngine,
    private readonly probe: HealthProbe = async () => ({}),
  ) {}

  routes() {
    this.rt.route(`${this.baseRoute}`).get(this.get);
    return this.rt;
  }

  get = [
    async (_req: Request, res: Response) => {
      try {
        const checks = await this.probe();
        return res.status(OK).json({
          status: "ok",
          uptimeSeconds: Math.round(process.uptime()),
          pendingTripLocks: this.engine.lock.pendingKeys(),
          cache: this.engine.cache.status(),
          ...checks,
          timestamp: Date.now(),
        });
      } catch (error) {
        return sendError(res, error, { route: "health" });
      }
    },
  ];
}

export default HealthController;
