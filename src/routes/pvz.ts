import { Router, Request, Response, RequestHandler } from "express";
import { currentAccount, requireCapability } from "../middleware/auth";
import { createPickupPointSchema, listPickupPointsSchema, parse } from "../schemas";
import { Services } from "../services";
import { Capability } from "../services/policy";

/**
 * Pickup point routes - HTTP mapping only
 * Business rules live in the services
 */
export function createPvzRoutes(services: Services, auth: RequestHandler): Router {
  const router = Router();

  /**
   * POST /pvz
   * Body: { city }
   */
  router.post('/pvz', auth, requireCapability(Capability.CREATE_PICKUP_POINT), (req: Request, res: Response) => {
    const { city } = parse(createPickupPointSchema, req.body);
    const pickupPoint = services.pickupPoints.create(currentAccount(req).role, city);
    res.status(201).json(pickupPoint);
  });

  /**
   * GET /pvz?startDate=&endDate=&page=&limit=
   */
  router.get('/pvz', auth, requireCapability(Capability.LIST_PICKUP_POINTS), (req: Request, res: Response) => {
    const query = parse(listPickupPointsSchema, req.query);
    const summaries = services.catalog.listPickupPoints(currentAccount(req).role, query);
    res.status(200).json(summaries);
  });

  router.post('/pvz/:pvzId/close_last_reception', auth, requireCapability(Capability.CLOSE_RECEPTION), (req: Request, res: Response) => {
    const reception = services.receptions.closeReception(currentAccount(req).role, req.params.pvzId);
    res.status(200).json(reception);
  });

  router.post('/pvz/:pvzId/delete_last_product', auth, requireCapability(Capability.DELETE_LAST_PRODUCT), (req: Request, res: Response) => {
    const product = services.products.deleteLastProduct(currentAccount(req).role, req.params.pvzId);
    res.status(200).json({ message: "Product deleted", product });
  });

  return router;
}
