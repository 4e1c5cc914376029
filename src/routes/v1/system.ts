import {
  healthController,
  initializeController,
} from "@interfaces/http/HealthController";
import { Router } from "express";

const router = Router();

router.get("/health", healthController);
router.post("/initialize", initializeController);

export default router;
