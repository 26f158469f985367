/**
 * Action Codespace (2 bytes)
 *
 * What operation to perform. The high byte selects the category:
 *
 *   0x00xx System     0x04xx Skill
 *   0x01xx Response   0x05xx Emotion
 *   0x02xx Query      0x06xx Template
 *   0x03xx Knowledge  0x07xx Chain
 *
 * Any 16-bit value is a legal Action. Values outside the catalog keep their
 * code and report the name UNKNOWN.
 */

import { hex16 } from './Hex.js';

export enum ActionCategory {
    SYSTEM = 0x00,
    RESPONSE = 0x01,
    QUERY = 0x02,
    KNOWLEDGE = 0x03,
    SKILL = 0x04,
    EMOTION = 0x05,
    TEMPLATE = 0x06,
    CHAIN = 0x07,
}

export class Action {
    // --- 1. System (0x0000-0x00FF) ---
    static readonly NOP = new Action(0x0000);
    static readonly HALT = new Action(0x0001);
    static readonly ERROR = new Action(0x0002);
    static readonly STATUS = new Action(0x0003);

    // --- 2. Response (0x0100-0x01FF) ---
    static readonly GREET = new Action(0x0100);
    static readonly CONFIRM = new Action(0x0101);
    static readonly DENY = new Action(0x0102);
    static readonly EXPLAIN = new Action(0x0103);
    static readonly CLARIFY = new Action(0x0104);
    static readonly APOLOGIZE = new Action(0x0105);
    static readonly THANK = new Action(0x0106);
    static readonly RESPOND = new Action(0x0107);

    // --- 3. Query (0x0200-0x02FF) ---
    static readonly ASK = new Action(0x0200);
    static readonly REQUEST = new Action(0x0201);
    static readonly SEARCH = new Action(0x0202);
    static readonly RETRIEVE = new Action(0x0203);

    // --- 4. Knowledge (0x0300-0x03FF) ---
    static readonly DEFINE = new Action(0x0300);
    static readonly DESCRIBE = new Action(0x0301);
    static readonly COMPARE = new Action(0x0302);
    static readonly SUMMARIZE = new Action(0x0303);
    static readonly EXPLAIN_HOW = new Action(0x0304);
    static readonly EXPLAIN_WHY = new Action(0x0305);

    // --- 5. Skill (0x0400-0x04FF) ---
    static readonly CALCULATE = new Action(0x0400);
    static readonly SET_TIMER = new Action(0x0401);
    static readonly KNOWLEDGE_SEARCH = new Action(0x0402);

    // --- 6. Emotion (0x0500-0x05FF) ---
    static readonly EMPATHY = new Action(0x0500);
    static readonly CONCERN = new Action(0x0501);
    static readonly ENCOURAGEMENT = new Action(0x0502);
    static readonly REASSURE = new Action(0x0503);

    // --- 7. Template (0x0600-0x06FF) ---
    static readonly TEMPLATE_LOAD = new Action(0x0600);
    static readonly TEMPLATE_FILL = new Action(0x0601);

    // --- 8. Chain (0x0700-0x07FF) ---
    static readonly CHAIN = new Action(0x0700);
    static readonly FORK = new Action(0x0701);
    static readonly MERGE = new Action(0x0702);

    private constructor(private readonly value: number) {
        Object.freeze(this);
    }

    /**
     * Wraps a raw code. Total: the input is truncated to 16 bits.
     */
    static fromU16(value: number): Action {
        return new Action(value & 0xFFFF);
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

    public isSystem(): boolean { return this.category() === ActionCategory.SYSTEM; }
    public isResponse(): boolean { return this.category() === ActionCategory.RESPONSE; }
    public isQuery(): boolean { return this.category() === ActionCategory.QUERY; }
    public isKnowledge(): boolean { return this.category() === ActionCategory.KNOWLEDGE; }
    public isSkill(): boolean { return this.category() === ActionCategory.SKILL; }
    public isEmotion(): boolean { return this.category() === ActionCategory.EMOTION; }
    public isTemplate(): boolean { return this.category() === ActionCategory.TEMPLATE; }
    public isChain(): boolean { return this.category() === ActionCategory.CHAIN; }

    public name(): string {
        return ACTION_NAMES.get(this.value) ?? 'UNKNOWN';
    }

    public equals(other: Action): boolean {
        return this.value === other.value;
    }

    public toString(): string {
        return `ACT(0x${hex16(this.value)}:${this.name()})`;
    }

    public toJSON(): number {
        return this.value;
    }
}

const ACTION_NAMES: ReadonlyMap<number, string> = new Map(
    Object.entries(Action)
        .filter((entry): entry is [string, Action] => entry[1] instanceof Action)
        .map(([name, action]): [number, string] => [action.asU16(), name])
);
