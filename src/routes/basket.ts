import express, { NextFunction, Response } from "express";
import { AppContext } from "../context";
import { AuthRequest, authenticate, currentUser } from "../middlewares/auth";
import { addItem, getBasket, removeLines, updateLines } from "../services/basket";
import { requestValidator } from "../utils/requestValidator";
import {
  AddItemRequest,
  RemoveLinesRequest,
  UpdateLinesRequest,
  ZAddItemSchema,
  ZRemoveLinesSchema,
  ZUpdateLinesSchema,
} from "../validations/basket";

export function basketRouter({ store }: AppContext) {
  const router = express.Router();
  router.use(authenticate(store));

  router.get("/", async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const basket = await getBasket(store, currentUser(req).id);
      res.status(200).json({ Status: true, Basket: basket });
    } catch (err) {
      next(err);
    }
  });

  router.post(
    "/",
    requestValidator(ZAddItemSchema),
    async (req: AuthRequest<AddItemRequest>, res: Response, next: NextFunction) => {
      try {
        const { listing_id, quantity } = req.body;
        const line = await addItem(store, currentUser(req).id, listing_id, quantity);
        res.status(201).json({ Status: true, Line: line });
      } catch (err) {
        next(err);
      }
    }
  );

  router.patch(
    "/",
    requestValidator(ZUpdateLinesSchema),
    async (req: AuthRequest<UpdateLinesRequest>, res: Response, next: NextFunction) => {
      try {
        const updated = await updateLines(store, currentUser(req).id, req.body.items);
        res.status(200).json({ Status: true, Updated: updated });
      } catch (err) {
        next(err);
      }
    }
  );

  router.delete(
    "/",
    requestValidator(ZRemoveLinesSchema),
    async (req: AuthRequest<RemoveLinesRequest>, res: Response, next: NextFunction) => {
      try {
        const removed = await removeLines(store, currentUser(req).id, req.body.items);
        res.status(200).json({ Status: true, Removed: removed });
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
