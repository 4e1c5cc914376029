import {
  addKnowledgeController,
  ingestKnowledgeController,
  searchKnowledgeController,
} from "@interfaces/http/KnowledgeController";
import { Router } from "express";

const router = Router();

router.post("/", addKnowledgeController);
router.post("/ingest", ingestKnowledgeController);
router.get("/search", searchKnowledgeController);

export default router;
