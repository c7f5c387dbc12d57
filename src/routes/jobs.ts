import express, { NextFunction, Request, Response } from "express";
import { AppContext } from "../context";
import { authenticate } from "../middlewares/auth";
import { getJobStatus } from "../services/jobs";
import { ZJobIdParam } from "../validations/common";

export function jobRouter({ store, queue }: AppContext) {
  const router = express.Router();
  router.use(authenticate(store));

  router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = ZJobIdParam.parse(req.params);
      const state = await getJobStatus(queue, id);
      res.status(200).json({ Status: true, Task: state });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
