import { randomUUID } from "crypto";
import { isRole } from "../config";
import { Account, Store } from "../models/store";
import { ErrorCode, ServiceError } from "./errors";

export interface Session {
    account: Account;
    token: string;
}

/**
 * Accounts and bearer tokens.
 *
 * Tokens are never revoked: each login adds a new one, and earlier tokens for the
 * same account keep working.
 */
export class IdentityService {
    private store: Store;

    constructor(store: Store) {
        this.store = store;
    }

    register(email: string, password: string, role: string): Session {
        if (!isRole(role)) {
            throw new ServiceError(ErrorCode.INVALID_ROLE, "Invalid role");
        }
        if (this.store.accountIdsByEmail.has(email)) {
            throw new ServiceError(ErrorCode.DUPLICATE_EMAIL, "Email already registered");
        }

        const account: Account = { id: randomUUID(), email, password, role };
        this.store.accounts.set(account.id, account);
        this.store.accountIdsByEmail.set(email, account.id);

        return { account, token: this.issueToken(account) };
    }

    login(email: string, password: string): Session {
        const accountId = this.store.accountIdsByEmail.get(email);
        const account = accountId ? this.store.accounts.get(accountId) : undefined;
        if (!account || account.password !== password) {
            throw new ServiceError(ErrorCode.INVALID_CREDENTIALS, "Invalid credentials");
        }
        return { account, token: this.issueToken(account) };
    }

    // Role-only login: fabricates an anonymous account so role-gated endpoints can be exercised without registering.
    dummyLogin(role: string): Session {
        if (!isRole(role)) {
            throw new ServiceError(ErrorCode.INVALID_ROLE, "Invalid role");
        }
        const account: Account = { id: randomUUID(), role };
        this.store.accounts.set(account.id, account);
        return { account, token: this.issueToken(account) };
    }

    authenticate(token: string): Account {
        const accountId = this.store.accountIdsByToken.get(token);
        const account = accountId ? this.store.accounts.get(accountId) : undefined;
        if (!account) {
            throw new ServiceError(ErrorCode.UNAUTHENTICATED, "Invalid authentication credentials");
        }
        return account;
    }

    private issueToken(account: Account): string {
        const token = randomUUID();
        this.store.accountIdsByToken.set(token, account.id);
        return token;
    }
}
