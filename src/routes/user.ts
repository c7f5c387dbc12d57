import express, { NextFunction, Response } from "express";
import { AppContext } from "../context";
import { AuthRequest, authenticate, currentUser } from "../middlewares/auth";
import { addContact, deleteContact, getProfile, listContacts } from "../services/contacts";
import { requestValidator } from "../utils/requestValidator";
import { ZIdParam } from "../validations/common";
import { ContactRequest, ZContactSchema } from "../validations/contacts";

export function userRouter({ store }: AppContext) {
  const router = express.Router();
  router.use(authenticate(store));

  router.get("/profile", (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      res.status(200).json({ Status: true, User: getProfile(currentUser(req)) });
    } catch (err) {
      next(err);
    }
  });

  router.get("/contacts", async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const contacts = await listContacts(store, currentUser(req));
      res.status(200).json({ Status: true, Contacts: contacts });
    } catch (err) {
      next(err);
    }
  });

  router.post(
    "/contacts",
    requestValidator(ZContactSchema),
    async (req: AuthRequest<ContactRequest>, res: Response, next: NextFunction) => {
      try {
        const contact = await addContact(store, currentUser(req), req.body);
        res.status(201).json({ Status: true, Contact: contact });
      } catch (err) {
        next(err);
      }
    }
  );

  router.delete("/contacts/:id", async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { id } = ZIdParam.parse(req.params);
      await deleteContact(store, currentUser(req), id);
      res.status(200).json({ Status: true });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
