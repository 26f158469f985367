// src/L2/ExtendedInstruction.ts
import { Instruction, INSTRUCTION_SIZE } from '../L1/Instruction.js';
import type { InstructionJSON } from '../L1/Instruction.js';
import { MinLengthGuard, enforce } from '../L0/Guards.js';
import { IsaError, attempt } from '../Errors.js';
import type { DecodeResult } from '../Errors.js';
import {
    CalcPayload,
    TimePayload,
    PayloadType,
    PAYLOAD_TYPE_SIZE,
    NO_PAYLOAD,
    payloadTypeFromByte,
    totalSize,
    encodePayload,
    decodePayload,
    payloadEquals,
    unitName,
} from './Payload.js';
import type { Payload } from './Payload.js';

const HEADER_SIZE = INSTRUCTION_SIZE + PAYLOAD_TYPE_SIZE;

export type PayloadJSON =
    | { type: 'NONE' }
    | { type: 'CALC'; op: string; a: number; b: number }
    | { type: 'TIME'; reference: string; delta: number; unit: string; tzOffset: number; target: string };

export interface ExtendedInstructionJSON {
    base: InstructionJSON;
    payload: PayloadJSON;
}

/**
 * Base instruction with an argument payload:
 *
 *   [BASE:6][PAYLOAD_TYPE:1][PAYLOAD:N]
 */
export class ExtendedInstruction {
    constructor(
        public readonly base: Instruction,
        public readonly payload: Payload = NO_PAYLOAD
    ) {
        Object.freeze(this);
    }

    static withCalc(base: Instruction, calc: CalcPayload): ExtendedInstruction {
        return new ExtendedInstruction(base, { type: PayloadType.CALC, calc });
    }

    static withTime(base: Instruction, time: TimePayload): ExtendedInstruction {
        return new ExtendedInstruction(base, { type: PayloadType.TIME, time });
    }

    public payloadType(): PayloadType {
        return this.payload.type;
    }

    public byteSize(): number {
        return totalSize(this.payload.type);
    }

    public toBytes(): Uint8Array {
        const bytes = new Uint8Array(this.byteSize());
        bytes.set(this.base.toBytes(), 0);
        bytes[INSTRUCTION_SIZE] = this.payload.type;
        bytes.set(encodePayload(this.payload), HEADER_SIZE);
        return bytes;
    }

    /**
     * Decodes one extended instruction from the front of `bytes`.
     * Trailing bytes past the size implied by the type tag are ignored.
     */
    static fromBytes(bytes: Uint8Array): ExtendedInstruction {
        // 1. Header
        enforce(MinLengthGuard(HEADER_SIZE), bytes);

        // 2. Base
        const base = Instruction.parseOne(bytes.subarray(0, INSTRUCTION_SIZE));

        // 3. Tag
        const tag = bytes[INSTRUCTION_SIZE];
        const type = payloadTypeFromByte(tag);
        if (type === undefined) throw IsaError.unknownPayloadType(tag);

        // 4. Body size implied by the tag
        enforce(MinLengthGuard(totalSize(type)), bytes);

        // 5. Body
        const body = bytes.subarray(HEADER_SIZE, totalSize(type));
        return new ExtendedInstruction(base, decodePayload(type, body));
    }

    static tryFromBytes(bytes: Uint8Array): DecodeResult<ExtendedInstruction> {
        return attempt(() => ExtendedInstruction.fromBytes(bytes));
    }

    public asCalc(): CalcPayload | undefined {
        return this.payload.type === PayloadType.CALC ? this.payload.calc : undefined;
    }

    public asTime(): TimePayload | undefined {
        return this.payload.type === PayloadType.TIME ? this.payload.time : undefined;
    }

    public equals(other: ExtendedInstruction): boolean {
        return this.base.equals(other.base) && payloadEquals(this.payload, other.payload);
    }

    public toString(): string {
        switch (this.payload.type) {
            case PayloadType.NONE: return this.base.toString();
            case PayloadType.CALC: return `${this.base.toString()} + ${this.payload.calc.toString()}`;
            case PayloadType.TIME: return `${this.base.toString()} @ ${this.payload.time.targetTimestamp()}`;
        }
    }

    public toJSON(): ExtendedInstructionJSON {
        return { base: this.base.toJSON(), payload: payloadToJSON(this.payload) };
    }
}

function payloadToJSON(payload: Payload): PayloadJSON {
    switch (payload.type) {
        case PayloadType.NONE:
            return { type: 'NONE' };
        case PayloadType.CALC:
            return { type: 'CALC', op: String.fromCharCode(payload.calc.op), a: payload.calc.a, b: payload.calc.b };
        case PayloadType.TIME: {
            const { time } = payload;
            return {
                type: 'TIME',
                reference: time.reference.toString(),
                delta: time.delta,
                unit: unitName(time.unit),
                tzOffset: time.tzOffset,
                target: time.targetTimestamp().toString(),
            };
        }
    }
}
