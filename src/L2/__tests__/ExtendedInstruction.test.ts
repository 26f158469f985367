import { describe, test, expect } from '@jest/globals';
import { ExtendedInstruction } from '../ExtendedInstruction.js';
import {
    CalcPayload,
    TimePayload,
    TimeUnit,
    Op,
    PayloadType,
    payloadSize,
    totalSize,
    unitSeconds,
    unitName,
    formatOperand,
} from '../Payload.js';
import { Instruction } from '../../L1/Instruction.js';
import { Action } from '../../L0/Action.js';
import { Subject } from '../../L0/Subject.js';
import { ErrorCode, IsaError } from '../../Errors.js';

function captureError(fn: () => unknown): IsaError {
    try {
        fn();
    } catch (e) {
        if (e instanceof IsaError) return e;
        throw e;
    }
    throw new Error('Expected an IsaError');
}

const CALC_BASE = Instruction.simple(Action.CALCULATE, Subject.NUMBER);
const TIME_BASE = Instruction.simple(Action.RESPOND, Subject.TIME);

describe('Payload Types', () => {
    test('Fixed sizes per tag', () => {
        expect(payloadSize(PayloadType.NONE)).toBe(0);
        expect(payloadSize(PayloadType.CALC)).toBe(17);
        expect(payloadSize(PayloadType.TIME)).toBe(14);

        expect(totalSize(PayloadType.NONE)).toBe(7);
        expect(totalSize(PayloadType.CALC)).toBe(24);
        expect(totalSize(PayloadType.TIME)).toBe(21);
    });

    test('Unit constants', () => {
        expect(unitSeconds(TimeUnit.SECOND)).toBe(1n);
        expect(unitSeconds(TimeUnit.WEEK)).toBe(604_800n);
        expect(unitSeconds(TimeUnit.MONTH)).toBe(2_592_000n);
        expect(unitSeconds(TimeUnit.YEAR)).toBe(31_536_000n);
        expect(unitName(TimeUnit.HOUR)).toBe('hour');
    });
});

describe('CalcPayload', () => {
    test('Encodes operator and big-endian doubles', () => {
        const calc = new CalcPayload(Op.ADD, 15.0, 7.0);
        const bytes = calc.toBytes();
        expect(bytes).toHaveLength(17);
        expect(bytes[0]).toBe(0x2B);
        expect(Array.from(bytes.subarray(1, 3))).toEqual([0x40, 0x2E]);
        expect(Array.from(bytes.subarray(9, 11))).toEqual([0x40, 0x1C]);
        expect(CalcPayload.fromBytes(bytes)).toEqual(calc);
    });

    test('Text form', () => {
        expect(new CalcPayload(Op.ADD, 15.0, 7.0).toString()).toBe('15 + 7');
        expect(new CalcPayload(Op.MUL, 2, 7.5).toString()).toBe('2 * 7.5');
        expect(new CalcPayload(Op.POW, 2, 10).toString()).toBe('2 ^ 10');
        expect(CalcPayload.unary(Op.SQRT, 144.0).toString()).toBe('sqrt(144)');
    });

    test('Operands are written positionally, never in exponent form', () => {
        expect(new CalcPayload(Op.ADD, 1e21, -0).toString()).toBe('1000000000000000000000 + -0');
        expect(new CalcPayload(Op.DIV, Infinity, -Infinity).toString()).toBe('inf / -inf');
        expect(CalcPayload.unary(Op.SQRT, Number.NaN).toString()).toBe('sqrt(NaN)');
        expect(formatOperand(1e-7)).toBe('0.0000001');
        expect(formatOperand(-1.5e-7)).toBe('-0.00000015');
        expect(formatOperand(2.5e22)).toBe('25000000000000000000000');
        expect(formatOperand(123.456)).toBe('123.456');
        expect(formatOperand(0)).toBe('0');
    });

    test('Unary operators carry B as zero', () => {
        const sqrt = CalcPayload.unary(Op.SQRT, 144);
        expect(sqrt.b).toBe(0);
        expect(sqrt.toBytes()[0]).toBe(0x53);
    });

    test('Unknown operator byte fails payload decode', () => {
        const bytes = new CalcPayload(Op.SUB, 1, 2).toBytes();
        bytes[0] = 0x41;
        const err = captureError(() => CalcPayload.fromBytes(bytes));
        expect(err.code).toBe(ErrorCode.PAYLOAD_DECODE_FAILED);
        expect(err.message).toBe('[Isa:PAYLOAD_DECODE_FAILED] Failed to parse payload: unknown operator 0x41');
    });
});

describe('TimePayload', () => {
    test('Target applies delta in the chosen unit', () => {
        const time = new TimePayload({ reference: 1_000_000, delta: 5, unit: TimeUnit.MINUTE, tzOffset: 0 });
        expect(time.targetTimestamp()).toBe(1_000_300n);
    });

    test('Target applies the timezone offset in hours', () => {
        const time = new TimePayload({ reference: 1_000_000, delta: 0, unit: TimeUnit.SECOND, tzOffset: -8 });
        expect(time.targetTimestamp()).toBe(1_000_000n - 28_800n);
    });

    test('Wire layout and round trip', () => {
        const time = TimePayload.withDelta(1_000_000, -5, TimeUnit.MINUTE).withTz(-8);
        const bytes = time.toBytes();
        expect(bytes).toHaveLength(14);
        expect(Array.from(bytes.subarray(0, 8))).toEqual([0x00, 0x00, 0x00, 0x00, 0x00, 0x0F, 0x42, 0x40]);
        expect(Array.from(bytes.subarray(8, 12))).toEqual([0xFF, 0xFF, 0xFF, 0xFB]);
        expect(bytes[12]).toBe(TimeUnit.MINUTE);
        expect(bytes[13]).toBe(0xF8);
        expect(TimePayload.fromBytes(bytes)).toEqual(time);
    });

    test('Unknown unit code fails payload decode', () => {
        const bytes = TimePayload.at(0).toBytes();
        bytes[12] = 7;
        const err = captureError(() => TimePayload.fromBytes(bytes));
        expect(err.code).toBe(ErrorCode.PAYLOAD_DECODE_FAILED);
        expect(err.metadata.byte).toBe(7);
    });

    test('Construction rejects values the wire cannot carry', () => {
        expect(() => TimePayload.withDelta(0, 2 ** 31, TimeUnit.SECOND)).toThrow(IsaError);
        expect(() => TimePayload.at(0).withTz(128)).toThrow(/tzOffset out of range/);
        expect(() => TimePayload.at(1.5)).toThrow(/reference out of range/);
        expect(() => TimePayload.at(2n ** 63n)).toThrow(IsaError);
        expect(TimePayload.at(-(2n ** 63n)).reference).toBe(-(2n ** 63n));
    });
});

describe('Extended Instruction', () => {
    test('No payload is 7 bytes', () => {
        const ext = new ExtendedInstruction(TIME_BASE);
        const bytes = ext.toBytes();
        expect(bytes).toHaveLength(7);
        expect(bytes[6]).toBe(0x00);

        const parsed = ExtendedInstruction.fromBytes(bytes);
        expect(parsed.base).toEqual(TIME_BASE);
        expect(parsed.payloadType()).toBe(PayloadType.NONE);
        expect(parsed.toString()).toBe(TIME_BASE.toString());
    });

    test('Calc payload is 24 bytes', () => {
        const calc = new CalcPayload(Op.MUL, 6.0, 7.0);
        const ext = ExtendedInstruction.withCalc(CALC_BASE, calc);
        const bytes = ext.toBytes();
        expect(bytes).toHaveLength(24);
        expect(ext.byteSize()).toBe(24);
        expect(bytes[6]).toBe(0x01);
        expect(bytes[7]).toBe(0x2A);

        const parsed = ExtendedInstruction.fromBytes(bytes);
        expect(parsed.base).toEqual(CALC_BASE);
        expect(parsed.asCalc()).toEqual(calc);
        expect(parsed.asTime()).toBeUndefined();
        expect(parsed.equals(ext)).toBe(true);
    });

    test('Time payload is 21 bytes', () => {
        const time = TimePayload.withDelta(1_735_300_000, 3, TimeUnit.HOUR);
        const ext = ExtendedInstruction.withTime(TIME_BASE, time);
        const bytes = ext.toBytes();
        expect(bytes).toHaveLength(21);
        expect(bytes[6]).toBe(0x02);

        const parsed = ExtendedInstruction.fromBytes(bytes);
        expect(parsed.asTime()).toEqual(time);
        expect(parsed.asCalc()).toBeUndefined();
    });

    test('Text form appends the payload', () => {
        const calc = ExtendedInstruction.withCalc(CALC_BASE, new CalcPayload(Op.MUL, 6, 7));
        expect(calc.toString()).toBe(`${CALC_BASE.toString()} + 6 * 7`);

        const time = ExtendedInstruction.withTime(TIME_BASE, TimePayload.withDelta(1_735_300_000, 3, TimeUnit.HOUR));
        expect(time.toString()).toBe(`${TIME_BASE.toString()} @ 1735310800`);
    });

    test('Buffers shorter than the header fail', () => {
        const err = captureError(() => ExtendedInstruction.fromBytes(CALC_BASE.toBytes()));
        expect(err.code).toBe(ErrorCode.INVALID_LENGTH);
        expect(err.metadata).toEqual({ actual: 6, expected: 7 });
    });

    test('Buffers shorter than their own tag implies fail', () => {
        const bytes = ExtendedInstruction.withCalc(CALC_BASE, new CalcPayload(Op.ADD, 1, 2)).toBytes().subarray(0, 20);
        const err = captureError(() => ExtendedInstruction.fromBytes(bytes));
        expect(err.code).toBe(ErrorCode.INVALID_LENGTH);
        expect(err.metadata).toEqual({ actual: 20, expected: 24 });
    });

    test('Unknown type byte fails with an opcode-text error', () => {
        const bytes = new Uint8Array([...CALC_BASE.toBytes(), 0x03]);
        const err = captureError(() => ExtendedInstruction.fromBytes(bytes));
        expect(err.code).toBe(ErrorCode.UNKNOWN_PAYLOAD_TYPE);
        expect(err.isOpcodeTextError()).toBe(true);
        expect(err.metadata.byte).toBe(3);
        expect(err.message).toBe('[Isa:UNKNOWN_PAYLOAD_TYPE] Unknown payload type: 0x03');
    });

    test('Bad operator inside an envelope fails payload decode', () => {
        const bytes = ExtendedInstruction.withCalc(CALC_BASE, new CalcPayload(Op.DIV, 1, 2)).toBytes();
        bytes[7] = 0x00;
        const result = ExtendedInstruction.tryFromBytes(bytes);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.code).toBe(ErrorCode.PAYLOAD_DECODE_FAILED);
    });

    test('Trailing bytes past the tagged size are ignored', () => {
        const bytes = new Uint8Array([...TIME_BASE.toBytes(), 0x00, 0xAA, 0xBB]);
        const parsed = ExtendedInstruction.fromBytes(bytes);
        expect(parsed.payloadType()).toBe(PayloadType.NONE);
        expect(parsed.byteSize()).toBe(7);
    });

    test('JSON form', () => {
        const calc = ExtendedInstruction.withCalc(CALC_BASE, new CalcPayload(Op.MUL, 6, 7));
        expect(calc.toJSON()).toEqual({
            base: { action: 0x0400, subject: 0x0200, modifier: 0x0450 },
            payload: { type: 'CALC', op: '*', a: 6, b: 7 },
        });

        const time = ExtendedInstruction.withTime(TIME_BASE, TimePayload.withDelta(1_735_300_000, 3, TimeUnit.HOUR));
        expect(JSON.parse(JSON.stringify(time)).payload).toEqual({
            type: 'TIME',
            reference: '1735300000',
            delta: 3,
            unit: 'hour',
            tzOffset: 0,
            target: '1735310800',
        });
    });
});
