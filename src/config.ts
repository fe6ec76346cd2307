import { z } from "zod";

export const CITIES = ["Москва", "Санкт-Петербург", "Казань"] as const;
export type City = typeof CITIES[number];

export const PRODUCT_TYPES = ["электроника", "одежда", "обувь"] as const;
export type ProductType = typeof PRODUCT_TYPES[number];

export const ROLES = ["employee", "moderator"] as const;
export type Role = typeof ROLES[number];

export const DEFAULT_PAGE = 1;
export const DEFAULT_LIMIT = 10;
export const MAX_LIMIT = 30;

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(8080)
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
    return envSchema.parse(env);
}

export function isCity(value: string): value is City {
    return CITIES.some(city => city === value);
}

export function isProductType(value: string): value is ProductType {
    return PRODUCT_TYPES.some(type => type === value);
}

export function isRole(value: string): value is Role {
    return ROLES.some(role => role === value);
}
