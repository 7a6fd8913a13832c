import express from "express";
import { createServer } from "http";
import { createApiRouter } from "./api.js";
import { config } from "./config.js";
import { openDatabase } from "./db.js";
import webRouterModule from "./web/webRouter.js";

const db = openDatabase(config.stateDbPath);

const app = express();
const server = createServer(app);

webRouterModule.configureViews(app, config.viewsDir);

app.use(
  createApiRouter({
    db,
    logFilePath: config.logFilePath,
    thresholdMinutes: config.groundThresholdMinutes,
    topN: config.reportTopN,
  })
);
app.use(
  "/",
  webRouterModule.createRouter({
    airport: config.airport,
    logFilePath: config.logFilePath,
    thresholdMinutes: config.groundThresholdMinutes,
    topN: config.reportTopN,
    viewsDir: config.viewsDir,
  })
);

server.listen(config.port, () =>
  console.log(`Report server listening on :${config.port} - open http://localhost:${config.port}`)
);
