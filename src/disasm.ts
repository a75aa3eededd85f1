import { opcodes, script as bscript } from "bitcoinjs-lib";
import { opcodeName } from "./script-spec";

export type OpInstruction = {
    kind: "op";
    opcode: number;
    offset: number;
    length: number;
};

export type PushInstruction = {
    kind: "push";
    opcode: number;
    data: Buffer;
    offset: number;
    length: number;
};

export type Instruction = OpInstruction | PushInstruction;

export type ParseOptions = {
    /**
     * Reject every push that has a shorter encoding.
     */
    minimal?: boolean;
};

export class ScriptDecodeError extends Error {
    public readonly offset: number;

    public constructor(message: string, offset: number) {
        super(`${message} (at byte ${offset})`);
        this.name = "ScriptDecodeError";
        this.offset = offset;
    }
}

const OP_PUSHDATA1 = opcodes.OP_PUSHDATA1;
const OP_PUSHDATA2 = opcodes.OP_PUSHDATA2;
const OP_PUSHDATA4 = opcodes.OP_PUSHDATA4;
const OP_1 = opcodes.OP_1;

function checkMinimalPush(insn: PushInstruction) {
    const { data, opcode, offset } = insn;
    if (data.length == 0) {
        if (opcode != 0) throw new ScriptDecodeError("Empty push must use OP_0", offset);
        return;
    }
    if (data.length == 1 && data[0] >= 1 && data[0] <= 16) {
        throw new ScriptDecodeError(`Push of ${data[0]} must use ${opcodeName(OP_1 + data[0] - 1)}`, offset);
    }
    if (data.length == 1 && data[0] == 0x81) {
        throw new ScriptDecodeError("Push of -1 must use OP_1NEGATE", offset);
    }
    let expected: number;
    if (data.length < OP_PUSHDATA1) expected = data.length;
    else if (data.length <= 0xff) expected = OP_PUSHDATA1;
    else if (data.length <= 0xffff) expected = OP_PUSHDATA2;
    else expected = OP_PUSHDATA4;
    if (opcode != expected) {
        throw new ScriptDecodeError(`Push of ${data.length} bytes must use ${opcodeName(expected)}`, offset);
    }
}

export class ScriptParser {
    private static readPushLength(bytes: Buffer, offset: number, opcode: number): [number, number] {
        const need = (n: number) => {
            if (offset + 1 + n > bytes.length) {
                throw new ScriptDecodeError(`Truncated ${opcodeName(opcode)} length prefix`, offset);
            }
        };
        if (opcode < OP_PUSHDATA1) return [opcode, 1];
        if (opcode == OP_PUSHDATA1) {
            need(1);
            return [bytes.readUInt8(offset + 1), 2];
        }
        if (opcode == OP_PUSHDATA2) {
            need(2);
            return [bytes.readUInt16LE(offset + 1), 3];
        }
        need(4);
        return [bytes.readUInt32LE(offset + 1), 5];
    }

    public static nextInstruction(bytes: Buffer, offset: number, opts: ParseOptions = {}): Instruction {
        if (offset >= bytes.length) {
            throw new ScriptDecodeError("Read past end of script", offset);
        }
        const opcode = bytes[offset];
        if (opcode > OP_PUSHDATA4) {
            return { kind: "op", opcode, offset, length: 1 };
        }
        const [dataLength, headerLength] = this.readPushLength(bytes, offset, opcode);
        const start = offset + headerLength;
        if (start + dataLength > bytes.length) {
            throw new ScriptDecodeError(`Push of ${dataLength} bytes runs past end of script`, offset);
        }
        const insn: PushInstruction = {
            kind: "push",
            opcode,
            data: bytes.subarray(start, start + dataLength),
            offset,
            length: headerLength + dataLength,
        };
        if (opts.minimal) checkMinimalPush(insn);
        return insn;
    }

    public static *instructions(bytes: Buffer, opts: ParseOptions = {}): Generator<Instruction> {
        let offset = 0;
        while (offset < bytes.length) {
            const insn = this.nextInstruction(bytes, offset, opts);
            offset += insn.length;
            yield insn;
        }
    }

    public static parseAll(bytes: Buffer, opts: ParseOptions = {}): Instruction[] {
        return Array.from(this.instructions(bytes, opts));
    }

    public static countInstructions(bytes: Buffer): number {
        let count = 0;
        for (const _ of this.instructions(bytes)) count++;
        return count;
    }
}

// Value of a pushed script number of at most 4 bytes in minimal form, otherwise null.
export function pushedScriptNumber(insn: PushInstruction): number | null {
    try {
        return bscript.number.decode(insn.data, 4, true);
    } catch (_) {
        return null;
    }
}

export function formatInstruction(insn: Instruction): string {
    if (insn.kind == "op") return opcodeName(insn.opcode);
    if (insn.data.length == 0) return "OP_0";
    return `<${insn.data.toString("hex")}>`;
}

export function disassemble(bytes: Buffer): string {
    return Array.from(ScriptParser.instructions(bytes), formatInstruction).join(" ");
}

export function toAsm(bytes: Buffer): string {
    return bscript.toASM(bytes);
}
