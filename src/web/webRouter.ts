import express, { Request, Response } from "express";
import path from "path";
import { readFileSync } from "fs";
import swaggerUi from "swagger-ui-express";

import { readObservations } from "../observationLog.js";
import { buildReport, renderChart } from "../report/index.js";
import type { Airport } from "../types.js";
import { readSinceParam } from "../utils/parseSince.js";

export interface WebOptions {
  airport: Airport;
  logFilePath: string;
  thresholdMinutes: number;
  topN: number;
  viewsDir: string;
}

const escapeHtml = (text: string): string =>
  text.replace(/[&<>"']/g, (ch) => `&#${ch.charCodeAt(0)};`);

function createRouter({ airport, logFilePath, thresholdMinutes, topN, viewsDir }: WebOptions) {
  const router = express.Router();

  const loadReport = (since: Date | null) => {
    const rows = readObservations(logFilePath);
    return rows === null ? null : buildReport(rows, { topN, since });
  };

  router.get("/", (req: Request, res: Response) => {
    const sinceParam = readSinceParam(req.query.since);
    if (!sinceParam.ok) {
      return res.status(400).send(`Invalid since value "${escapeHtml(sinceParam.raw)}"`);
    }

    try {
      const report = loadReport(sinceParam.since);
      res.render("report", {
        airport,
        thresholdMinutes,
        report,
        chart: report?.analysis ? renderChart(report.top, airport.name, viewsDir) : null,
      });
    } catch (error) {
      console.error("Error rendering report:", error);
      res.status(500).send("Internal Server Error");
    }
  });

  router.get("/report.svg", (req: Request, res: Response) => {
    const sinceParam = readSinceParam(req.query.since);
    if (!sinceParam.ok) {
      return res.status(400).type("text/plain").send(`Invalid since value "${sinceParam.raw}"`);
    }

    try {
      const report = loadReport(sinceParam.since);
      if (!report) {
        return res.status(404).send("Observation log not found");
      }
      res.type("image/svg+xml").send(renderChart(report.top, airport.name, viewsDir));
    } catch (error) {
      console.error("Error rendering chart:", error);
      res.status(500).send("Internal Server Error");
    }
  });

  // API Documentation with Swagger UI
  const swaggerDocument: Record<string, unknown> = JSON.parse(
    readFileSync(path.join(viewsDir, "..", "swagger.json"), "utf8")
  );
  const swaggerOptions = {
    customCss: ".swagger-ui .topbar { display: none }",
    customSiteTitle: "Ground-Time Monitor API",
    swaggerOptions: {
      docExpansion: "none",
      tryItOutEnabled: true,
    },
  };

  router.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDocument, swaggerOptions));

  return router;
}

function configureViews(app: express.Application, viewsDir: string) {
  app.set("view engine", "ejs");
  app.set("views", viewsDir);
}

export default { createRouter, configureViews };
