// src/L0/Guards.ts
import { ErrorCode, IsaError } from '../Errors.js';
import type { ErrorMetadata } from '../Errors.js';

// --- Guard Pattern ---
export interface GuardResult {
    ok: boolean;
    code?: ErrorCode;
    violation?: string;
    details?: ErrorMetadata;
}

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, msg: string, details?: ErrorMetadata): GuardResult => ({ ok: false, code, violation: msg, details });

// --- Concrete Guards ---

// 1. Exact size (single fixed-width record)
export const ExactLengthGuard = (expected: number): Guard<ArrayLike<number>> => (bytes) => {
    if (bytes.length !== expected) {
        return FAIL(ErrorCode.INVALID_LENGTH, `Invalid byte length: got ${bytes.length}, expected ${expected}`, { actual: bytes.length, expected });
    }
    return OK;
};

// 2. Whole number of records
export const MultipleLengthGuard = (multiple: number): Guard<ArrayLike<number>> => (bytes) => {
    if (bytes.length % multiple !== 0) {
        return FAIL(ErrorCode.INVALID_LENGTH, `Invalid byte length: got ${bytes.length}, expected multiple of ${multiple}`, { actual: bytes.length, expected: multiple });
    }
    return OK;
};

// 3. Minimum size (envelope header, payload body)
export const MinLengthGuard = (min: number): Guard<ArrayLike<number>> => (bytes) => {
    if (bytes.length < min) {
        return FAIL(ErrorCode.INVALID_LENGTH, `Invalid byte length: got ${bytes.length}, expected ${min}`, { actual: bytes.length, expected: min });
    }
    return OK;
};

// 4. Integer range (payload field construction)
export const RangeGuard = (field: string, min: number, max: number): Guard<number> => (value) => {
    if (!Number.isInteger(value) || value < min || value > max) {
        return FAIL(ErrorCode.VALUE_OUT_OF_RANGE, `${field} out of range: ${value} not in [${min}, ${max}]`, { field });
    }
    return OK;
};

/**
 * Runs a guard and throws its violation as an IsaError.
 */
export function enforce<T>(guard: Guard<T>, input: T): void {
    const result = guard(input);
    if (!result.ok) {
        throw new IsaError(
            result.code ?? ErrorCode.INVALID_LENGTH,
            result.violation ?? 'Guard rejected input',
            result.details
        );
    }
}
