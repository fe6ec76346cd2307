import { randomUUID } from "crypto";
import { isCity, Role } from "../config";
import { Metrics } from "../metrics";
import { PickupPoint, Store } from "../models/store";
import { ErrorCode, ServiceError } from "./errors";
import { authorize, Capability } from "./policy";

export class PickupPointService {
    private store: Store;
    private metrics: Metrics;

    constructor(store: Store, metrics: Metrics) {
        this.store = store;
        this.metrics = metrics;
    }

    create(actorRole: Role, city: string): PickupPoint {
        // Role is checked before the city, so an employee gets Forbidden even for an unlisted city.
        authorize(actorRole, Capability.CREATE_PICKUP_POINT);
        if (!isCity(city)) {
            throw new ServiceError(
                ErrorCode.INVALID_CITY,
                "PVZ can only be created in Москва, Санкт-Петербург or Казань"
            );
        }

        const pickupPoint: PickupPoint = {
            id: randomUUID(),
            registrationDate: new Date().toISOString(),
            city
        };
        this.store.pickupPoints.set(pickupPoint.id, pickupPoint);
        this.store.receptionIdsByPoint.set(pickupPoint.id, []);

        this.metrics.pvzCreated.inc();
        console.log(`Pickup point created: ${pickupPoint.id} in ${city}`);
        return pickupPoint;
    }

    get(id: string): PickupPoint {
        const pickupPoint = this.store.pickupPoints.get(id);
        if (!pickupPoint) {
            throw new ServiceError(ErrorCode.NOT_FOUND, "PVZ not found");
        }
        return pickupPoint;
    }

    // Each call starts a fresh pass in registration order.
    *list(): Generator<PickupPoint> {
        yield* this.store.pickupPoints.values();
    }
}
