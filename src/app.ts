import express from "express";
import { AppContext } from "./context";
import { errorHandler } from "./middlewares/errorHandler";
import { basketRouter } from "./routes/basket";
import { jobRouter } from "./routes/jobs";
import { orderRouter } from "./routes/order";
import { catalogRouter } from "./routes/products";
import { supplierRouter } from "./routes/supplier";
import { userRouter } from "./routes/user";
import { requestLogger } from "./utils/requestLogger";

export function createApp(ctx: AppContext) {
  const app = express();
  app.use(express.json());
  app.use(requestLogger);

  app.get("/api/health", (_req, res) => {
    res.status(200).json({ Status: true });
  });

  app.use("/api", catalogRouter(ctx));
  app.use("/api/user", userRouter(ctx));
  app.use("/api/basket", basketRouter(ctx));
  app.use("/api/orders", orderRouter(ctx));
  app.use("/api/jobs", jobRouter(ctx));
  app.use("/api/supplier", supplierRouter(ctx));

  app.use((_req, res) => {
    res.status(404).json({ Status: false, Error: "Not found" });
  });
  app.use(errorHandler);

  return app;
}
