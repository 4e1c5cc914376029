import { queryController } from "@interfaces/http/QueryController";
import { Router } from "express";

const router = Router();

router.post("/", queryController);

export default router;
