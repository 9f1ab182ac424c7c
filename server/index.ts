import express from "express";
import { createServer } from "http";
import { registerRoutes } from "./routes";
import { getConfig } from "./config";

const config = getConfig();
const app = express();

app.use(express.json({ limit: "5mb" }));

app.use((req, res, next) => {
  const start = Date.now();
  res.on("finish", () => {
    if (req.path.startsWith("/api")) {
      console.log(`[server] ${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
    }
  });
  next();
});

const httpServer = createServer(app);

registerRoutes(httpServer, app)
  .then((server) => {
    server.listen(config.PORT, () => {
      console.log(`[server] Listening on port ${config.PORT}`);
    });
  })
  .catch((error: unknown) => {
    console.error("[server] Failed to start:", error);
    process.exit(1);
  });
