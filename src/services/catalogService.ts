import { DEFAULT_LIMIT, DEFAULT_PAGE, MAX_LIMIT, Role } from "../config";
import { PickupPoint, Product, Reception } from "../models/store";
import { ErrorCode, ServiceError } from "./errors";
import { PickupPointService } from "./pickupPointService";
import { authorize, Capability } from "./policy";
import { ProductService } from "./productService";
import { ReceptionService } from "./receptionService";

export interface ListQuery {
    startDate?: Date;
    endDate?: Date;
    page?: number;
    limit?: number;
}

export interface ReceptionWithProducts {
    reception: Reception;
    products: Product[];
}

export interface PickupPointSummary {
    pvz: PickupPoint;
    receptions: ReceptionWithProducts[];
}

// Read side: pickup points joined with their receptions and products.
export class CatalogService {
    private pickupPoints: PickupPointService;
    private receptions: ReceptionService;
    private products: ProductService;

    constructor(pickupPoints: PickupPointService, receptions: ReceptionService, products: ProductService) {
        this.pickupPoints = pickupPoints;
        this.receptions = receptions;
        this.products = products;
    }

    listPickupPoints(actorRole: Role, query: ListQuery = {}): PickupPointSummary[] {
        authorize(actorRole, Capability.LIST_PICKUP_POINTS);
        const page = query.page ?? DEFAULT_PAGE;
        const limit = query.limit ?? DEFAULT_LIMIT;
        if (!Number.isInteger(page) || page < 1) {
            throw new ServiceError(ErrorCode.VALIDATION_ERROR, "page must be an integer >= 1");
        }
        if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT) {
            throw new ServiceError(ErrorCode.VALIDATION_ERROR, `limit must be an integer between 1 and ${MAX_LIMIT}`);
        }

        const result: PickupPointSummary[] = [];
        for (const pvz of this.pickupPoints.list()) {
            const receptions: ReceptionWithProducts[] = this.receptions
                .receptionsOf(pvz.id)
                .filter(reception => inRange(reception, query.startDate, query.endDate))
                .map(reception => ({
                    reception: { ...reception },
                    products: this.products.listProducts(reception.id).map(product => ({ ...product }))
                }));
            result.push({ pvz: { ...pvz }, receptions });
        }

        const start = (page - 1) * limit;
        return result.slice(start, start + limit);
    }
}

// Filters only when both bounds are given; a single bound is ignored.
export function inRange(reception: Reception, startDate?: Date, endDate?: Date): boolean {
    if (!startDate || !endDate) {
        return true;
    }
    const openedAt = new Date(reception.dateTime).getTime();
    return startDate.getTime() <= openedAt && openedAt <= endDate.getTime();
}
