import { Metrics } from "../metrics";
import { Store } from "../models/store";
import { CatalogService } from "./catalogService";
import { IdentityService } from "./identityService";
import { PickupPointService } from "./pickupPointService";
import { ProductService } from "./productService";
import { ReceptionService } from "./receptionService";

export interface Services {
    identity: IdentityService;
    pickupPoints: PickupPointService;
    receptions: ReceptionService;
    products: ProductService;
    catalog: CatalogService;
}

export function createServices(store: Store, metrics: Metrics): Services {
    const identity = new IdentityService(store);
    const pickupPoints = new PickupPointService(store, metrics);
    const receptions = new ReceptionService(store, pickupPoints, metrics);
    const products = new ProductService(store, receptions, metrics);
    const catalog = new CatalogService(pickupPoints, receptions, products);
    return { identity, pickupPoints, receptions, products, catalog };
}
