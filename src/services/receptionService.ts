import { randomUUID } from "crypto";
import { Role } from "../config";
import { Metrics } from "../metrics";
import { Reception, ReceptionStatus, Store } from "../models/store";
import { ErrorCode, ServiceError } from "./errors";
import { PickupPointService } from "./pickupPointService";
import { authorize, Capability } from "./policy";

/**
 * Reception lifecycle per pickup point
 *
 * Valid transitions:
 * - (none) → IN_PROGRESS (openReception, only when no reception is open)
 * - IN_PROGRESS → CLOSED (closeReception, terminal)
 *
 * Invariant: at most one IN_PROGRESS reception per pickup point.
 * Methods are synchronous, so every check-then-mutate runs without interleaving.
 */
export class ReceptionService {
    private store: Store;
    private pickupPoints: PickupPointService;
    private metrics: Metrics;

    constructor(store: Store, pickupPoints: PickupPointService, metrics: Metrics) {
        this.store = store;
        this.pickupPoints = pickupPoints;
        this.metrics = metrics;
    }

    openReception(actorRole: Role, pickupPointId: string): Reception {
        authorize(actorRole, Capability.OPEN_RECEPTION);
        this.pickupPoints.get(pickupPointId);
        if (this.findOpen(pickupPointId)) {
            throw new ServiceError(ErrorCode.CONFLICT_OPEN_RECEPTION_EXISTS, "There is already an open reception");
        }

        const reception: Reception = {
            id: randomUUID(),
            dateTime: new Date().toISOString(),
            pvzId: pickupPointId,
            status: ReceptionStatus.IN_PROGRESS
        };
        this.store.receptions.set(reception.id, reception);
        this.store.receptionIdsByPoint.set(pickupPointId, [...this.receptionIdsOf(pickupPointId), reception.id]);
        this.store.productsByReception.set(reception.id, []);

        this.metrics.receptionsCreated.inc();
        console.log(`Reception opened: ${reception.id} at pickup point ${pickupPointId}`);
        return reception;
    }

    closeReception(actorRole: Role, pickupPointId: string): Reception {
        authorize(actorRole, Capability.CLOSE_RECEPTION);
        const reception = this.requireOpen(pickupPointId);

        reception.status = ReceptionStatus.CLOSED;

        console.log(`Reception closed: ${reception.id} at pickup point ${pickupPointId}`);
        return reception;
    }

    // Searches by pickup point and status rather than recency: uniqueness of the open reception is what holds, not ordering.
    findOpen(pickupPointId: string): Reception | undefined {
        for (const id of this.receptionIdsOf(pickupPointId)) {
            const reception = this.store.receptions.get(id);
            if (reception && reception.status === ReceptionStatus.IN_PROGRESS) {
                return reception;
            }
        }
        return undefined;
    }

    /**
     * Resolves the open reception of a known pickup point.
     * Throws NotFound for an unknown pickup point and NoOpenReception when nothing is open.
     */
    requireOpen(pickupPointId: string): Reception {
        this.pickupPoints.get(pickupPointId);
        const reception = this.findOpen(pickupPointId);
        if (!reception) {
            throw new ServiceError(ErrorCode.NO_OPEN_RECEPTION, "No open reception found");
        }
        return reception;
    }

    receptionsOf(pickupPointId: string): Reception[] {
        const receptions: Reception[] = [];
        for (const id of this.receptionIdsOf(pickupPointId)) {
            const reception = this.store.receptions.get(id);
            if (reception) {
                receptions.push(reception);
            }
        }
        return receptions;
    }

    private receptionIdsOf(pickupPointId: string): readonly string[] {
        return this.store.receptionIdsByPoint.get(pickupPointId) ?? [];
    }
}
