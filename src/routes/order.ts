import express, { NextFunction, Response } from "express";
import { AppContext } from "../context";
import { AuthRequest, authenticate, currentUser } from "../middlewares/auth";
import {
  checkout,
  confirmOrder,
  getOrder,
  listOrders,
  updateOrderStatus,
} from "../services/order";
import { requestValidator } from "../utils/requestValidator";
import { StatusUpdate, ZIdParam, ZStatusUpdate } from "../validations/common";
import { CheckoutRequest, ZCheckoutSchema } from "../validations/order";

export function orderRouter(ctx: AppContext) {
  const router = express.Router();
  router.use(authenticate(ctx.store));

  router.get("/", async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const orders = await listOrders(ctx, currentUser(req));
      res.status(200).json({ Status: true, Orders: orders });
    } catch (err) {
      next(err);
    }
  });

  router.post(
    "/",
    requestValidator(ZCheckoutSchema),
    async (req: AuthRequest<CheckoutRequest>, res: Response, next: NextFunction) => {
      try {
        const order = await checkout(ctx, currentUser(req), req.body.contact_id);
        res.status(201).json({ Status: true, Order: order });
      } catch (err) {
        next(err);
      }
    }
  );

  router.get("/:id", async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { id } = ZIdParam.parse(req.params);
      const order = await getOrder(ctx, currentUser(req), id);
      res.status(200).json({ Status: true, Order: order });
    } catch (err) {
      next(err);
    }
  });

  router.patch(
    "/:id/status",
    requestValidator(ZStatusUpdate),
    async (req: AuthRequest<StatusUpdate>, res: Response, next: NextFunction) => {
      try {
        const { id } = ZIdParam.parse(req.params);
        const order = await updateOrderStatus(ctx, currentUser(req), id, req.body.status);
        res.status(200).json({ Status: true, Order: order });
      } catch (err) {
        next(err);
      }
    }
  );

  router.post("/:id/confirm", async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { id } = ZIdParam.parse(req.params);
      const job = await confirmOrder(ctx, currentUser(req), id);
      // Confirmed either way; TaskID is null when the email was not queued.
      res.status(job ? 202 : 200).json({ Status: true, TaskID: job?.id ?? null });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
