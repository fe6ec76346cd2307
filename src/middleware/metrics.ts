import { NextFunction, Request, Response } from "express";
import { Metrics } from "../metrics";

// Counts and times every request except scrapes of the metrics endpoint itself.
export function trackRequests(metrics: Metrics) {
  return (req: Request, res: Response, next: NextFunction) => {
    const endpoint = req.path;
    if (endpoint === "/metrics") {
      next();
      return;
    }
    const endTimer = metrics.requestLatency.startTimer({ method: req.method, endpoint });
    res.on("finish", () => {
      endTimer();
      metrics.requestCount.inc({ method: req.method, endpoint, http_status: String(res.statusCode) });
    });
    next();
  };
}

export function metricsEndpoint(metrics: Metrics) {
  return (_req: Request, res: Response, next: NextFunction) => {
    metrics.registry
      .metrics()
      .then(body => {
        res.set("Content-Type", metrics.registry.contentType);
        res.send(body);
      })
      .catch(next);
  };
}
