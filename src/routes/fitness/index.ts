import express from "express";
import fitnessPlanController from "../../controllers/fitnessPlan.controller";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import { validateContentType } from "../../middlewares/validation.middleware";
import { createFitnessPlanSchema } from "../../validators/fitness-plan.validator";

const router = express.Router();

router.post(
  "/plans",
  validateContentType,
  validateRequest(createFitnessPlanSchema),
  fitnessPlanController.createPlan
);

router.get("/history", fitnessPlanController.getHistory);

export default router;
