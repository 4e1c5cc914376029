import {
  createChainController,
  deleteChainController,
  getChainController,
  listChainsController,
  searchChainsController,
  updateChainController,
} from "@interfaces/http/ChainController";
import { Router } from "express";

const router = Router();

// "/search" must be registered ahead of "/:id".
router.get("/search", searchChainsController);

router.post("/", createChainController);
router.get("/", listChainsController);
router.get("/:id", getChainController);
router.put("/:id", updateChainController);
router.delete("/:id", deleteChainController);

export default router;
