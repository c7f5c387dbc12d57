import express, { NextFunction, Request, Response } from "express";
import { AppContext } from "../context";
import { getListing, listCategories, listListings, listShops } from "../services/products";
import { ZListingQuery } from "../validations/catalog";
import { ZIdParam } from "../validations/common";

export function catalogRouter({ store }: AppContext) {
  const router = express.Router();

  router.get("/shops", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const shops = await listShops(store);
      res.status(200).json({ Status: true, Shops: shops });
    } catch (err) {
      next(err);
    }
  });

  router.get("/categories", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const categories = await listCategories(store);
      res.status(200).json({ Status: true, Categories: categories });
    } catch (err) {
      next(err);
    }
  });

  router.get("/products", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = ZListingQuery.parse(req.query);
      const products = await listListings(store, {
        shopId: query.shop_id,
        categoryId: query.category_id,
      });
      res.status(200).json({ Status: true, Products: products });
    } catch (err) {
      next(err);
    }
  });

  router.get("/products/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = ZIdParam.parse(req.params);
      const product = await getListing(store, id);
      res.status(200).json({ Status: true, Product: product });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
