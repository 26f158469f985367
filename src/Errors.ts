/**
 * Frame ISA Error Taxonomy
 * Centralized error codes for framing failures during encode/decode.
 *
 * Unknown Action/Subject/Modifier values are never errors; only malformed
 * framing (lengths, tag bytes, opcode text) is.
 */

import { hex8 } from './L0/Hex.js';

export enum ErrorCode {
    // I. Framing
    INVALID_LENGTH = 'INVALID_LENGTH',

    // II. Opcode Text
    INVALID_OPCODE_STRING = 'INVALID_OPCODE_STRING',
    UNKNOWN_PAYLOAD_TYPE = 'UNKNOWN_PAYLOAD_TYPE',
    PAYLOAD_DECODE_FAILED = 'PAYLOAD_DECODE_FAILED',

    // III. Construction
    VALUE_OUT_OF_RANGE = 'VALUE_OUT_OF_RANGE',
}

export interface ErrorMetadata {
    actual?: number;
    expected?: number;
    input?: string;
    byte?: number;
    field?: string;
}

// Tag-byte failures are reported through the opcode-text kind.
const OPCODE_TEXT_KIND: ReadonlySet<ErrorCode> = new Set([
    ErrorCode.INVALID_OPCODE_STRING,
    ErrorCode.UNKNOWN_PAYLOAD_TYPE,
    ErrorCode.PAYLOAD_DECODE_FAILED,
]);

export class IsaError extends Error {
    constructor(
        public readonly code: ErrorCode,
        public readonly detail: string,
        public readonly metadata: ErrorMetadata = {}
    ) {
        super(`[Isa:${code}] ${detail}`);
        this.name = 'IsaError';
    }

    public isLengthError(): boolean {
        return this.code === ErrorCode.INVALID_LENGTH;
    }

    public isOpcodeTextError(): boolean {
        return OPCODE_TEXT_KIND.has(this.code);
    }

    // --- Factories ---

    static invalidOpcodeString(input: string): IsaError {
        return new IsaError(ErrorCode.INVALID_OPCODE_STRING, `Invalid opcode string: ${input}`, { input });
    }

    static unknownPayloadType(byte: number): IsaError {
        const input = `Unknown payload type: 0x${hex8(byte)}`;
        return new IsaError(ErrorCode.UNKNOWN_PAYLOAD_TYPE, input, { input, byte });
    }

    static payloadDecodeFailed(field: string, byte: number): IsaError {
        const input = `Failed to parse payload: unknown ${field} 0x${hex8(byte)}`;
        return new IsaError(ErrorCode.PAYLOAD_DECODE_FAILED, input, { input, byte, field });
    }

    static outOfRange(field: string, value: number | bigint, min: number | bigint, max: number | bigint): IsaError {
        return new IsaError(
            ErrorCode.VALUE_OUT_OF_RANGE,
            `${field} out of range: ${value} not in [${min}, ${max}]`,
            { field }
        );
    }
}

/**
 * Outcome of a non-throwing decode.
 */
export type DecodeResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: IsaError };

export function attempt<T>(decode: () => T): DecodeResult<T> {
    try {
        return { ok: true, value: decode() };
    } catch (e) {
        if (e instanceof IsaError) return { ok: false, error: e };
        throw e;
    }
}
