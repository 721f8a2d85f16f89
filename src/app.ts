import express from "express";
import { ControllerDependencies } from "./controllers/access-controller";
import { cors } from "./middleware/cors";
import { createApiRoutes } from "./routes/api-routes";

function isBodyParseError(err: unknown): err is SyntaxError {
  return err instanceof SyntaxError && "status" in err && err.status === 400;
}

export function createApp(deps: ControllerDependencies) {
  const app = express();

  // Middleware
  app.use(cors);
  app.use(express.json());

  // Routes
  app.use("/api", createApiRoutes(deps));

  // Health check endpoint
  app.get("/health", (req, res) => {
    res.status(200).json({ status: "UP" });
  });

  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: "Not Found",
      message: `No route for ${req.method} ${req.originalUrl}`,
    });
  });

  // Error handling middleware
  app.use(
    (
      err: unknown,
      req: express.Request,
      res: express.Response,
      // Express only treats four-argument functions as error handlers
      next: express.NextFunction
    ) => {
      if (isBodyParseError(err)) {
        return res.status(400).json({
          success: false,
          error: "Invalid JSON request",
          message: err.message,
        });
      }

      console.error(err instanceof Error ? err.stack : err);
      res.status(500).json({ success: false, error: "Internal Server Error" });
    }
  );

  return app;
}
