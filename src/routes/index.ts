import express from "express";
const router = express.Router();

import healthRoute from "./health";
import fitnessRoute from "./fitness";

router.use("/health", healthRoute);
router.use("/api/health", healthRoute);

router.use("/api/v1/fitness", fitnessRoute);

export default router;
