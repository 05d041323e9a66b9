import { Router, type Request, type Response } from "express";

export const API_VERSION = "1.0.0";

export function healthRouter(): Router {
  const router = Router();

  router.get("/", (_req: Request, res: Response) => {
    res.json({
      status: "healthy",
      message: "ATS Match API is running",
      version: API_VERSION,
    });
  });

  return router;
}
