import {
  CREATED,
  OK,
  bodyRecord,
  checkReqDataError,
  queryString,
  requiredParam,
  sendError,
  serializeAnomaly,
  serializeTrip,
  stringParam,
} from "@/utils";
import type { TrackingEngine } from "@/services/tracking";
import { Request, Response, Router } from "express";
import { check, param, query } from "express-validator";

class TripController {
  rt = Router();
  baseRoute = "/trips";

  constructor(private readonly engine: TrackingEngine) {}

  routes() {
    this.rt.route(`${this.baseRoute}`).post(this.create);
    this.rt.route(`${this.baseRoute}/:tripId`).get(this.get);
    this.rt.route(`${this.baseRoute}/:tripId/start`).post(this.start);
    this.rt.route(`${this.baseRoute}/:tripId/complete`).post(this.complete);
    this.rt.route(`${this.baseRoute}/:tripId/anomalies`).get(this.anomalies);
    return this.rt;
  }

  create = [
    check("busId").isString().trim().notEmpty(),
    check("driverId").isString().trim().notEmpty(),
    check("lineId").isString().trim().notEmpty(),
    checkReqDataError,
    async (req: Request, res: Response) => {
      const body = bodyRecord(req);
      try {
        const trip = await this.engine.trips.create({
          busId: stringParam(body.busId) ?? "",
          driverId: stringParam(body.driverId) ?? "",
          lineId: stringParam(body.lineId) ?? "",
        });
        return res.status(CREATED).json(serializeTrip(trip));
      } catch (error) {
        return sendError(res, error, { route: "trips.create" });
      }
    },
  ];

  get = [
    param("tripId").trim().notEmpty(),
    checkReqDataError,
    async (req: Request, res: Response) => {
      try {
        const trip = await this.engine.trips.getTrip(requiredParam(req, "tripId"));
        return res.status(OK).json(serializeTrip(trip));
      } catch (error) {
        return sendError(res, error, { route: "trips.get" });
      }
    },
  ];

  start = [
    param("tripId").trim().notEmpty(),
    checkReqDataError,
    async (req: Request, res: Response) => {
      try {
        const trip = await this.engine.trips.start(requiredParam(req, "tripId"));
        return res.status(OK).json(serializeTrip(trip));
      } catch (error) {
        return sendError(res, error, { route: "trips.start" });
      }
    },
  ];

  complete = [
    param("tripId").trim().notEmpty(),
    checkReqDataError,
    async (req: Request, res: Response) => {
      try {
        const trip = await this.engine.trips.complete(requiredParam(req, "tripId"));
        return res.status(OK).json(serializeTrip(trip));
      } catch (error) {
        return sendError(res, error, { route: "trips.complete" });
      }
    },
  ];

  anomalies = [
    param("tripId").trim().notEmpty(),
    query("since").optional().isISO8601(),
    checkReqDataError,
    async (req: Request, res: Response) => {
      try {
        const since = queryString(req, "since");
        const data = await this.engine.trips.listAnomalies(
          requiredParam(req, "tripId"),
          since === undefined ? undefined : Date.parse(since),
        );
        return res.status(OK).json({ data: data.map(serializeAnomaly) });
      } catch (error) {
        return sendError(res, error, { route: "trips.anomalies" });
      }
    },
  ];
}

export default TripController;
