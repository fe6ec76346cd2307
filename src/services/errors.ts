export enum ErrorCode {
    INVALID_ROLE = 'InvalidRole',
    DUPLICATE_EMAIL = 'DuplicateEmail',
    INVALID_CREDENTIALS = 'InvalidCredentials',
    UNAUTHENTICATED = 'Unauthenticated',
    FORBIDDEN = 'Forbidden',
    NOT_FOUND = 'NotFound',
    CONFLICT_OPEN_RECEPTION_EXISTS = 'ConflictOpenReceptionExists',
    NO_OPEN_RECEPTION = 'NoOpenReception',
    NO_PRODUCTS = 'NoProducts',
    INVALID_CITY = 'InvalidCity',
    INVALID_PRODUCT_TYPE = 'InvalidProductType',
    VALIDATION_ERROR = 'ValidationError'
}

const HTTP_STATUS: Record<ErrorCode, number> = {
    [ErrorCode.INVALID_ROLE]: 400,
    [ErrorCode.DUPLICATE_EMAIL]: 400,
    [ErrorCode.INVALID_CREDENTIALS]: 401,
    [ErrorCode.UNAUTHENTICATED]: 401,
    [ErrorCode.FORBIDDEN]: 403,
    [ErrorCode.NOT_FOUND]: 404,
    [ErrorCode.CONFLICT_OPEN_RECEPTION_EXISTS]: 400,
    [ErrorCode.NO_OPEN_RECEPTION]: 400,
    [ErrorCode.NO_PRODUCTS]: 400,
    [ErrorCode.INVALID_CITY]: 400,
    [ErrorCode.INVALID_PRODUCT_TYPE]: 400,
    [ErrorCode.VALIDATION_ERROR]: 400
};

/**
 * Business-rule or input failure local to one request.
 * Thrown before any state is touched, so a failed operation leaves the store unchanged.
 */
export class ServiceError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string) {
        super(message);
        this.name = "ServiceError";
        this.code = code;
    }

    get status(): number {
        return HTTP_STATUS[this.code];
    }
}
