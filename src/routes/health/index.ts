import express from "express";
import { loadConfig } from "../../configs/environment";
import { sessionStore } from "../../services/session.service";

const healthRouter = express.Router();

healthRouter.get("/", (_req, res) => {
  res.json({
    success: true,
    message: "Fitness planner backend is healthy",
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    environment: loadConfig().nodeEnv,
  });
});

healthRouter.get("/status", (_req, res) => {
  res.json({
    success: true,
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    services: {
      planner: "active",
      sessions: sessionStore.size,
    },
    endpoints: {
      plans: "/api/v1/fitness/plans",
      history: "/api/v1/fitness/history",
    },
  });
});

export default healthRouter;
