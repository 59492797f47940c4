/**
 * Route table. Handlers validate their inputs with the request schemas and
 * call the services directly; thrown errors reach the error handler.
 */

import { Router, type Request } from "express";
import {
  destinationRequestSchema,
  guidanceQuerySchema,
  positionRequestSchema,
  scanRequestSchema,
} from "./models/requests.js";
import type { GuidanceStreamService } from "./services/guidance-stream.service.js";
import type { NavigationService } from "./services/navigation.service.js";

export interface RouteServices {
  navigation: NavigationService;
  stream: GuidanceStreamService;
}

function deviceId(req: Request): string {
  return req.params["deviceId"] ?? "";
}

export function registerRoutes(services: RouteServices): Router {
  const { navigation, stream } = services;
  const router = Router();

  router.get("/health", (_req, res) => {
    res.json(navigation.health());
  });

  router.get("/api/waypoints", (_req, res) => {
    res.json(navigation.listWaypoints());
  });

  router.get("/api/waypoints/:id", (req, res) => {
    res.json(navigation.getWaypoint(req.params["id"] ?? ""));
  });

  // Ingestion: 202, the event has been consumed but guidance is spoken asynchronously
  router.post("/api/devices/:deviceId/scans", (req, res) => {
    res.status(202).json(navigation.reportScan(deviceId(req), scanRequestSchema.parse(req.body)));
  });

  router.post("/api/devices/:deviceId/positions", (req, res) => {
    res.status(202).json(navigation.reportPosition(deviceId(req), positionRequestSchema.parse(req.body)));
  });

  router.post("/api/devices/:deviceId/destination", (req, res) => {
    res
      .status(202)
      .json(navigation.chooseDestination(deviceId(req), destinationRequestSchema.parse(req.body)));
  });

  router.post("/api/devices/:deviceId/cancel", (req, res) => {
    res.status(202).json(navigation.cancel(deviceId(req)));
  });

  router.delete("/api/devices/:deviceId", (req, res) => {
    navigation.removeDevice(deviceId(req));
    res.status(204).end();
  });

  router.get("/api/devices/:deviceId/session", (req, res) => {
    res.json(navigation.getSession(deviceId(req)));
  });

  router.get("/api/devices/:deviceId/guidance", (req, res) => {
    const { limit } = guidanceQuerySchema.parse(req.query);
    res.json(navigation.recentGuidance(deviceId(req), limit));
  });

  router.get("/api/devices/:deviceId/diagnostics", (req, res) => {
    res.json(navigation.diagnostics(deviceId(req)));
  });

  router.get("/api/devices/:deviceId/guidance/stream", (req, res) => {
    // Opened before the headers go out so an unknown device still gets a 404
    const close = stream.open(deviceId(req), (frame) => {
      res.write(frame);
    });
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.write(": connected\n\n");
    req.on("close", close);
  });

  return router;
}
