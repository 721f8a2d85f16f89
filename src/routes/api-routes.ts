import { Request, Response, Router } from "express";
import {
  ControllerDependencies,
  createAccessController,
} from "../controllers/access-controller";

/**
 * 405 for any other method on a known path
 */
function methodNotAllowed(allowed: string[]) {
  return (req: Request, res: Response) => {
    res.setHeader("Allow", [...allowed, "OPTIONS"].join(", "));
    return res.status(405).json({
      success: false,
      error: "Method not allowed",
      message: `${req.method} is not supported on ${req.originalUrl}`,
    });
  };
}

export function createApiRoutes(deps: ControllerDependencies): Router {
  const router = Router();
  const controller = createAccessController(deps);

  // GET /api/ip-info (never blocked)
  router.get("/ip-info", controller.ipInfo);
  router.all("/ip-info", methodNotAllowed(["GET"]));

  // GET /api/test-access (geo-blocked)
  router.get("/test-access", deps.gate.middleware(), controller.testAccess);
  router.all("/test-access", methodNotAllowed(["GET"]));

  router.post("/simulate-vpn", controller.simulateVpn);
  router.all("/simulate-vpn", methodNotAllowed(["POST"]));

  router.post("/block-countries", controller.blockCountries);
  router.all("/block-countries", methodNotAllowed(["POST"]));

  router.post("/validate-blocking", controller.validateBlocking);
  router.all("/validate-blocking", methodNotAllowed(["POST"]));

  return router;
}
