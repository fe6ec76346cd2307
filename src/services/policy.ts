import { Role } from "../config";
import { ErrorCode, ServiceError } from "./errors";

export enum Capability {
    CREATE_PICKUP_POINT = 'createPickupPoint',
    LIST_PICKUP_POINTS = 'listPickupPoints',
    OPEN_RECEPTION = 'openReception',
    CLOSE_RECEPTION = 'closeReception',
    ADD_PRODUCT = 'addProduct',
    DELETE_LAST_PRODUCT = 'deleteLastProduct'
}

interface Rule {
    roles: readonly Role[];
    denied: string;
}

const POLICY: Record<Capability, Rule> = {
    [Capability.CREATE_PICKUP_POINT]: { roles: ["moderator"], denied: "Only moderators can create PVZs" },
    [Capability.LIST_PICKUP_POINTS]: { roles: ["employee", "moderator"], denied: "Access denied" },
    [Capability.OPEN_RECEPTION]: { roles: ["employee"], denied: "Only employees can create receptions" },
    [Capability.CLOSE_RECEPTION]: { roles: ["employee"], denied: "Only employees can close receptions" },
    [Capability.ADD_PRODUCT]: { roles: ["employee"], denied: "Only employees can add products" },
    [Capability.DELETE_LAST_PRODUCT]: { roles: ["employee"], denied: "Only employees can delete products" }
};

export function can(role: string, capability: Capability): boolean {
    return POLICY[capability].roles.some(allowed => allowed === role);
}

// Throws Forbidden unless the role holds the capability.
export function authorize(role: string, capability: Capability) {
    if (!can(role, capability)) {
        throw new ServiceError(ErrorCode.FORBIDDEN, POLICY[capability].denied);
    }
}
