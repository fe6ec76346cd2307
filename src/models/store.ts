// In-memory data storage. Owned by one Store instance that the services share, so tests can build their own.

import { City, ProductType, Role } from "../config";

export interface Account {
    id: string;
    role: Role;
    email?: string;
    password?: string;
}

export interface PickupPoint {
    id: string;
    registrationDate: string; // ISO date string
    city: City;
}

export enum ReceptionStatus {
    IN_PROGRESS = 'in_progress',
    CLOSED = 'closed'
}

export interface Reception {
    id: string;
    dateTime: string; // ISO date string
    pvzId: string;
    status: ReceptionStatus;
}

export interface Product {
    id: string;
    dateTime: string; // ISO date string
    type: ProductType;
    receptionId: string;
}

export class Store {
    public accounts: Map<string, Account> = new Map();
    public accountIdsByEmail: Map<string, string> = new Map();
    public accountIdsByToken: Map<string, string> = new Map();

    public pickupPoints: Map<string, PickupPoint> = new Map();
    public receptions: Map<string, Reception> = new Map();

    // Reception ids per pickup point, in opening order.
    public receptionIdsByPoint: Map<string, string[]> = new Map();

    // Products per reception, in insertion order. The last element is the most recently added product.
    public productsByReception: Map<string, Product[]> = new Map();

    countProducts(): number {
        let total = 0;
        for (const products of this.productsByReception.values()) {
            total += products.length;
        }
        return total;
    }
}

export const store = new Store();
