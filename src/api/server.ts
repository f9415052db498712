import express from "express";
import { createRouter, errorHandler } from "./routes";
import { AppConfig, loadConfig } from "../config";
import { DepositStore, InMemoryDepositStore } from "../store/depositStore";

/**
 * Build the Express app around a deposit store.
 */
export function createApp(
  store: DepositStore = new InMemoryDepositStore(),
  config: AppConfig = loadConfig()
): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // CORS headers for development
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Methods", "GET, POST, PUT, DELETE, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept");
    if (req.method === "OPTIONS") {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Routes
  app.use("/api", createRouter(store, config));

  // Root endpoint
  app.get("/", (req, res) => {
    res.json({
      message: "Savings Projection API",
      version: "1.0.0",
      endpoints: {
        deposits: "GET|POST|DELETE /api/users/:user/deposits",
        history: "GET /api/users/:user/history",
        projection: "POST /api/users/:user/forecast",
        forecast: "POST /api/forecast",
        health: "GET /api/health",
      },
    });
  });

  // Error handling middleware
  app.use(errorHandler);

  return app;
}

const app = createApp();

// Start server
if (require.main === module) {
  const { port } = loadConfig();
  app.listen(port, () => {
    console.log(`Server running on port ${port}`);
    console.log(`API available at http://localhost:${port}/api`);
  });
}

export default app;
