import { Router, Request, Response, RequestHandler } from "express";
import { currentAccount, requireCapability } from "../middleware/auth";
import { addProductSchema, createReceptionSchema, parse } from "../schemas";
import { Capability } from "../services/policy";
import { ProductService } from "../services/productService";
import { ReceptionService } from "../services/receptionService";

export function createReceptionRoutes(
  receptions: ReceptionService,
  products: ProductService,
  auth: RequestHandler
): Router {
  const router = Router();

  router.post('/receptions', auth, requireCapability(Capability.OPEN_RECEPTION), (req: Request, res: Response) => {
    const { pvzId } = parse(createReceptionSchema, req.body);
    const reception = receptions.openReception(currentAccount(req).role, pvzId);
    res.status(201).json(reception);
  });

  router.post('/products', auth, requireCapability(Capability.ADD_PRODUCT), (req: Request, res: Response) => {
    const { type, pvzId } = parse(addProductSchema, req.body);
    const product = products.addProduct(currentAccount(req).role, pvzId, type);
    res.status(201).json(product);
  });

  return router;
}
