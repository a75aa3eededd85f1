import { opcodes } from "bitcoinjs-lib";
import { z } from "zod";
import rawEffects from "./script-spec/effects.json";

/**
 * `[access, change]`: the deepest slot read relative to the stack top before the
 * instruction runs (always `<= 0`) and the net height change afterwards.
 */
const effectSchema = z.tuple([z.number().int().max(0), z.number().int()]);

const opcodeSpecSchema = z.object({
    mnemonic: z.string().regex(/^OP_[0-9A-Z]+$/),
    code: z.number().int().min(0).max(255),
    /**
     * Main stack effect. Absent for control-flow markers resolved by the
     * analyzer itself and for data-dependent opcodes.
     */
    stack: effectSchema.optional(),
    /**
     * Alt stack effect, only present for the two alt stack moves.
     */
    altstack: effectSchema.optional(),
    flow: z.enum(["if", "else", "endif"]).optional(),
    /**
     * `pick`/`roll` take their depth from the last small constant pushed,
     * `unsupported` has no static effect at all, `debug` marks the reserved
     * opcode callers use as an unreachable debug marker.
     */
    dynamic: z.enum(["pick", "roll", "unsupported", "debug"]).optional(),
    /**
     * Value pushed by the small-number opcodes, fed into the PICK/ROLL side channel.
     */
    constant: z.number().int().optional(),
});

const effectTableSchema = z.object({
    version: z.literal(1),
    effects: z.array(opcodeSpecSchema),
});

export type StackEffectPair = z.infer<typeof effectSchema>;

export type OpcodeSpec = z.infer<typeof opcodeSpecSchema>;

export type EffectTable = z.infer<typeof effectTableSchema>;

function loadEffectTable(): Map<number, OpcodeSpec> {
    const table = effectTableSchema.parse(rawEffects);
    const byCode = new Map<number, OpcodeSpec>();
    for (const spec of table.effects) {
        const known = opcodes[spec.mnemonic];
        if (known !== undefined && known !== spec.code) {
            throw new Error(`Opcode table mismatch for ${spec.mnemonic}: ${spec.code} != ${known}`);
        }
        if (byCode.has(spec.code)) {
            throw new Error(`Duplicate opcode table entry for 0x${spec.code.toString(16)}`);
        }
        byCode.set(spec.code, spec);
    }
    return byCode;
}

export const opcodeSpecs: ReadonlyMap<number, OpcodeSpec> = loadEffectTable();

// Later aliases win, so OP_0/OP_1/OP_CHECKLOCKTIMEVERIFY beat OP_FALSE/OP_TRUE/OP_NOP2.
const reverseOpcodes = new Map<number, string>(
    Object.entries(opcodes).map(([name, code]) => [code, name])
);

export function opcodeName(code: number): string {
    return opcodeSpecs.get(code)?.mnemonic
        ?? reverseOpcodes.get(code)
        ?? `OP_UNKNOWN_0x${code.toString(16).padStart(2, "0")}`;
}
