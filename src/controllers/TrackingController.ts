import {
  ACCEPTED,
  OK,
  bodyRecord,
  checkReqDataError,
  queryString,
  sendError,
  serializeArrival,
  serializeIngestResult,
  serializeRouteEstimate,
  serializeVisualization,
  stringParam,
} from "@/utils";
import type { TrackingEngine } from "@/services/tracking";
import { classifyRejectReason, logRejectedReport } from "@/services/tracking/rejects";
import { withTimeout } from "@/utils/helpers/timeout";
import { toLocationReport } from "@/utils/gps";
import { errorMessage } from "@/utils/errors";
import { Request, Response, Router } from "express";
import { check, query } from "express-validator";

class TrackingController {
  rt = Router();

  constructor(private readonly engine: TrackingEngine) {}

  routes() {
    this.rt.route("/location-update").post(this.locationUpdate);
    this.rt.route("/route-estimate").get(this.routeEstimate);
    this.rt.route("/arrivals").get(this.arrivals);
    this.rt.route("/visualization").get(this.visualization);
    return this.rt;
  }

  locationUpdate = [
    check("tripId").isString().trim().notEmpty(),
    check("latitude").isFloat(),
    check("longitude").isFloat(),
    check("accuracy").isFloat(),
    check("speed").optional({ values: "null" }).isFloat(),
    check("heading").optional({ values: "null" }).isFloat(),
    check("timestamp").exists({ values: "null" }),
    checkReqDataError,
    async (req: Request, res: Response) => {
      const body = bodyRecord(req);
      const tripId = stringParam(body.tripId) ?? "";

      try {
        const report = toLocationReport(body, { lat: "latitude", lng: "longitude" });
        const result = await this.engine.trips.ingest(tripId, report);
        return res.status(ACCEPTED).json(serializeIngestResult(result));
      } catch (error) {
        logRejectedReport(classifyRejectReason(error), {
          tripId,
          source: "http",
          message: errorMessage(error),
        });
        return sendError(res, error, { route: "location-update", tripId });
      }
    },
  ];

  routeEstimate = [
    query("tripId").isString().trim().notEmpty(),
    query("destinationStopId").optional().isString().trim().notEmpty(),
    checkReqDataError,
    async (req: Request, res: Response) => {
      const tripId = queryString(req, "tripId") ?? "";
      try {
        const estimate = await withTimeout(
          this.engine.routes.estimate(tripId, queryString(req, "destinationStopId")),
          this.engine.rules.readTimeoutMs,
          "route estimate",
        );
        return res.status(OK).json(serializeRouteEstimate(estimate));
      } catch (error) {
        return sendError(res, error, { route: "route-estimate", tripId });
      }
    },
  ];

  arrivals = [
    query("stopId").isString().trim().notEmpty(),
    query("lineId").optional().isString().trim().notEmpty(),
    checkReqDataError,
    async (req: Request, res: Response) => {
      const stopId = queryString(req, "stopId") ?? "";
      try {
        const data = await this.engine.arrivals.arrivalsForStop(
          stopId,
          queryString(req, "lineId"),
        );
        return res.status(OK).json(data.map(serializeArrival));
      } catch (error) {
        return sendError(res, error, { route: "arrivals", stopId });
      }
    },
  ];

  visualization = [
    query("lineId").isString().trim().notEmpty(),
    checkReqDataError,
    async (req: Request, res: Response) => {
      const lineId = queryString(req, "lineId") ?? "";
      try {
        const snapshot = await this.engine.visualization.getVisualization(lineId);
        return res.status(OK).json(serializeVisualization(snapshot));
      } catch (error) {
        return sendError(res, error, { route: "visualization", lineId });
      }
    },
  ];
}

export default TrackingController;
