// src/L0/Subject.ts
import { hex8, hex16 } from './Hex.js';

/**
 * Subject / Topic Codespace (2 bytes)
 *
 * Same category-by-high-byte scheme as Action, plus two computed ranges:
 *   0x0600-0x06FF  TRM reference (delegation to another model, 8-bit id)
 *   0xE000-0xEFFF  RAG reference (document lookup, 12-bit id)
 */
export enum SubjectCategory {
    SYSTEM = 0x00,
    COMMON = 0x01,
    MATH_SCIENCE = 0x02,
    TECHNOLOGY = 0x03,
    KNOWLEDGE = 0x04,
    EMOTION = 0x05,
}

export const TRM_REF_START = 0x0600;
export const TRM_REF_END = 0x06FF;
export const RAG_START = 0xE000;
export const RAG_END = 0xEFFF;
export const RAG_MAX_DOC_ID = RAG_END - RAG_START;

export class Subject {
    // --- System ---
    static readonly NULL = new Subject(0x0000);
    static readonly SELF = new Subject(0x0001);
    static readonly USER = new Subject(0x0002);
    static readonly CONTEXT = new Subject(0x0003);

    // --- Common Topics ---
    static readonly WEATHER = new Subject(0x0100);
    static readonly TIME = new Subject(0x0101);
    static readonly DATE = new Subject(0x0102);
    static readonly SCHEDULE = new Subject(0x0103);
    static readonly HEALTH = new Subject(0x0104);
    static readonly HELP = new Subject(0x0105);
    static readonly TIMEZONE = new Subject(0x0106);

    // --- Math / Science ---
    static readonly NUMBER = new Subject(0x0200);
    static readonly EQUATION = new Subject(0x0201);
    static readonly PHYSICS = new Subject(0x0202);
    static readonly CHEMISTRY = new Subject(0x0203);

    // --- Technology ---
    static readonly COMPUTER = new Subject(0x0300);
    static readonly SOFTWARE = new Subject(0x0301);
    static readonly HARDWARE = new Subject(0x0302);
    static readonly AI = new Subject(0x0303);
    static readonly API = new Subject(0x0304);

    // --- Knowledge ---
    static readonly DOCUMENTATION = new Subject(0x0400);
    static readonly CONCEPT = new Subject(0x0401);

    // --- Emotions ---
    static readonly FEELINGS = new Subject(0x0500);
    static readonly STRESS = new Subject(0x0501);
    static readonly ANXIETY = new Subject(0x0502);

    private constructor(private readonly value: number) {
        Object.freeze(this);
    }

    static fromU16(value: number): Subject {
        return new Subject(value & 0xFFFF);
    }

    /**
     * Document reference. Ids above 0x0FFF are clamped, not rejected.
     */
    static ragRef(docId: number): Subject {
        const id = Number.isNaN(docId) ? 0 : Math.min(Math.max(Math.trunc(docId), 0), RAG_MAX_DOC_ID);
        return new Subject(RAG_START + id);
    }

    /**
     * Model-chain reference for an 8-bit model id.
     */
    static trmRef(modelId: number): Subject {
        return new Subject(TRM_REF_START + (modelId & 0xFF));
    }

    public asU16(): number {
        return this.value;
    }

    public category(): number {
        return this.value >> 8;
    }

    public subcategory(): number {
        return this.value & 0xFF;
    }

    public isRagReference(): boolean {
        return this.value >= RAG_START && this.value <= RAG_END;
    }

    public isTrmReference(): boolean {
        return this.value >= TRM_REF_START && this.value <= TRM_REF_END;
    }

    public isSystem(): boolean { return this.category() === SubjectCategory.SYSTEM; }
    public isCommonTopic(): boolean { return this.category() === SubjectCategory.COMMON; }
    public isMathScience(): boolean { return this.category() === SubjectCategory.MATH_SCIENCE; }
    public isTechnology(): boolean { return this.category() === SubjectCategory.TECHNOLOGY; }
    public isKnowledge(): boolean { return this.category() === SubjectCategory.KNOWLEDGE; }
    public isEmotion(): boolean { return this.category() === SubjectCategory.EMOTION; }

    public ragDocId(): number | undefined {
        return this.isRagReference() ? this.value - RAG_START : undefined;
    }

    public trmModelId(): number | undefined {
        return this.isTrmReference() ? this.value - TRM_REF_START : undefined;
    }

    /**
     * Catalog name first, then the dynamic ranges, then UNKNOWN.
     */
    public name(): string {
        const named = SUBJECT_NAMES.get(this.value);
        if (named !== undefined) return named;
        if (this.isRagReference()) return 'RAG_REF';
        if (this.isTrmReference()) return 'TRM_REF';
        return 'UNKNOWN';
    }

    public equals(other: Subject): boolean {
        return this.value === other.value;
    }

    public toString(): string {
        const modelId = this.trmModelId();
        if (this.isRagReference()) return `SUBJ(RAG:0x${hex16(this.value)})`;
        if (modelId !== undefined) return `SUBJ(TRM:0x${hex8(modelId)})`;
        return `SUBJ(0x${hex16(this.value)}:${this.name()})`;
    }

    public toJSON(): number {
        return this.value;
    }
}

const SUBJECT_NAMES: ReadonlyMap<number, string> = new Map(
    Object.entries(Subject)
        .filter((entry): entry is [string, Subject] => entry[1] instanceof Subject)
        .map(([name, subject]): [number, string] => [subject.asU16(), name])
);
