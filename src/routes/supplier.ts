import express, { NextFunction, Response } from "express";
import { AppContext } from "../context";
import { AuthRequest, authenticate, currentUser } from "../middlewares/auth";
import {
  getShopState,
  getSupplierOrder,
  listSupplierOrders,
  requestImport,
  requestImportAsStaff,
  setShopActive,
  updateSupplierOrderStatus,
} from "../services/supplier";
import { requestValidator } from "../utils/requestValidator";
import { StatusUpdate, ZIdParam, ZStatusUpdate } from "../validations/common";
import {
  ImportRequest,
  ShopStateRequest,
  StaffImportRequest,
  ZImportRequestSchema,
  ZShopStateSchema,
  ZStaffImportSchema,
} from "../validations/supplier";

export function supplierRouter(ctx: AppContext) {
  const router = express.Router();
  router.use(authenticate(ctx.store));

  router.post(
    "/update",
    requestValidator(ZImportRequestSchema),
    async (req: AuthRequest<ImportRequest>, res: Response, next: NextFunction) => {
      try {
        const job = await requestImport(ctx, currentUser(req), {
          url: req.body.url,
          shopName: req.body.shop_name,
        });
        res.status(202).json({ Status: true, TaskID: job.id });
      } catch (err) {
        next(err);
      }
    }
  );

  router.post(
    "/admin/import",
    requestValidator(ZStaffImportSchema),
    async (req: AuthRequest<StaffImportRequest>, res: Response, next: NextFunction) => {
      try {
        const job = await requestImportAsStaff(ctx, currentUser(req), {
          shopId: req.body.shop_id,
          url: req.body.import_url,
        });
        res.status(202).json({ Status: true, TaskID: job.id });
      } catch (err) {
        next(err);
      }
    }
  );

  router.get("/orders", async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const orders = await listSupplierOrders(ctx, currentUser(req));
      res.status(200).json({ Status: true, Orders: orders });
    } catch (err) {
      next(err);
    }
  });

  router.get("/orders/:id", async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { id } = ZIdParam.parse(req.params);
      const order = await getSupplierOrder(ctx, currentUser(req), id);
      res.status(200).json({ Status: true, Order: order });
    } catch (err) {
      next(err);
    }
  });

  router.patch(
    "/orders/:id",
    requestValidator(ZStatusUpdate),
    async (req: AuthRequest<StatusUpdate>, res: Response, next: NextFunction) => {
      try {
        const { id } = ZIdParam.parse(req.params);
        const order = await updateSupplierOrderStatus(ctx, currentUser(req), id, req.body.status);
        res.status(200).json({ Status: true, Order: order });
      } catch (err) {
        next(err);
      }
    }
  );

  router.get("/state", async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const state = await getShopState(ctx, currentUser(req));
      res.status(200).json({ Status: true, ...state });
    } catch (err) {
      next(err);
    }
  });

  router.patch(
    "/state",
    requestValidator(ZShopStateSchema),
    async (req: AuthRequest<ShopStateRequest>, res: Response, next: NextFunction) => {
      try {
        const state = await setShopActive(ctx, currentUser(req), req.body.is_active);
        res.status(200).json({ Status: true, ...state });
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
