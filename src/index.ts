/**
 * FRAME ISA
 * 6-byte opcode format for AI output decisions, with typed argument payloads.
 *
 *   [ACT:2][SUBJ:2][MOD:2]                      Instruction
 *   [ACT:2][SUBJ:2][MOD:2][TYPE:1][PAYLOAD:N]   ExtendedInstruction
 */

export const ISA_VERSION = '0.1.0';

// Errors
export { ErrorCode, IsaError, attempt } from './Errors.js';
export type { DecodeResult, ErrorMetadata } from './Errors.js';

// L0: Codespaces
export { Action, ActionCategory } from './L0/Action.js';
export {
    Subject,
    SubjectCategory,
    TRM_REF_START,
    TRM_REF_END,
    RAG_START,
    RAG_END,
    RAG_MAX_DOC_ID,
} from './L0/Subject.js';
export { Modifier, Voice, Tone, Warmth, Format, Accuracy, Urgency, RESERVED_MASK } from './L0/Modifier.js';
export { ExactLengthGuard, MultipleLengthGuard, MinLengthGuard, RangeGuard, enforce } from './L0/Guards.js';
export type { GuardResult, Guard } from './L0/Guards.js';

// L1: Instruction
export { Instruction, INSTRUCTION_SIZE } from './L1/Instruction.js';
export type { InstructionJSON } from './L1/Instruction.js';
export { InstructionBuilder, instruction } from './L1/InstructionBuilder.js';

// L2: Extended Instruction
export {
    PayloadType,
    PAYLOAD_TYPE_SIZE,
    CALC_PAYLOAD_SIZE,
    TIME_PAYLOAD_SIZE,
    Op,
    CalcPayload,
    TimeUnit,
    TimePayload,
    NO_PAYLOAD,
    payloadTypeFromByte,
    payloadSize,
    totalSize,
    opFromByte,
    opSymbol,
    formatOperand,
    isUnary,
    timeUnitFromByte,
    unitSeconds,
    unitName,
} from './L2/Payload.js';
export type { Payload, TimePayloadFields } from './L2/Payload.js';
export { ExtendedInstruction } from './L2/ExtendedInstruction.js';
export type { ExtendedInstructionJSON, PayloadJSON } from './L2/ExtendedInstruction.js';

// Platform
export { ConsoleLogger } from './Platform/Logger.js';
export type { Logger } from './Platform/Logger.js';
export { OpcodeInspector, parseHex, EXIT_OK, EXIT_DECODE_ERROR, EXIT_USAGE } from './Platform/Console/Inspector.js';
