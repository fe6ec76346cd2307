import { randomUUID } from "crypto";
import { isProductType, Role } from "../config";
import { Metrics } from "../metrics";
import { Product, Store } from "../models/store";
import { ErrorCode, ServiceError } from "./errors";
import { authorize, Capability } from "./policy";
import { ReceptionService } from "./receptionService";

/**
 * Products of the open reception, kept as a stack per reception.
 * Insertion order decides which product is "last", never the timestamp.
 */
export class ProductService {
    private store: Store;
    private receptions: ReceptionService;
    private metrics: Metrics;

    constructor(store: Store, receptions: ReceptionService, metrics: Metrics) {
        this.store = store;
        this.receptions = receptions;
        this.metrics = metrics;
    }

    addProduct(actorRole: Role, pickupPointId: string, type: string): Product {
        authorize(actorRole, Capability.ADD_PRODUCT);
        const reception = this.receptions.requireOpen(pickupPointId);
        if (!isProductType(type)) {
            throw new ServiceError(ErrorCode.INVALID_PRODUCT_TYPE, "Invalid product type");
        }

        const product: Product = {
            id: randomUUID(),
            dateTime: new Date().toISOString(),
            type,
            receptionId: reception.id
        };
        this.productsOf(reception.id).push(product);

        this.metrics.productsAdded.inc();
        console.log(`Product added: ${product.id} (${type}) to reception ${reception.id}`);
        return product;
    }

    deleteLastProduct(actorRole: Role, pickupPointId: string): Product {
        authorize(actorRole, Capability.DELETE_LAST_PRODUCT);
        const reception = this.receptions.requireOpen(pickupPointId);

        const product = this.productsOf(reception.id).pop();
        if (!product) {
            throw new ServiceError(ErrorCode.NO_PRODUCTS, "No products to delete");
        }

        console.log(`Product deleted: ${product.id} from reception ${reception.id}`);
        return product;
    }

    listProducts(receptionId: string): readonly Product[] {
        return this.store.productsByReception.get(receptionId) ?? [];
    }

    private productsOf(receptionId: string): Product[] {
        let products = this.store.productsByReception.get(receptionId);
        if (!products) {
            products = [];
            this.store.productsByReception.set(receptionId, products);
        }
        return products;
    }
}
