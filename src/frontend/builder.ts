import { opcodes, script as bscript } from "bitcoinjs-lib";
import { InvalidOpcodeError, Pushable, StructuredScript } from "../core/structuredScript";
import { ScriptDecodeError } from "../disasm";
import { opcodeSpecs } from "../script-spec";

// Thin helpers for assembling structured scripts from opcode names and values.

const byMnemonic = new Map<string, number>(Object.entries(opcodes));
for (const spec of opcodeSpecs.values()) {
  if (!byMnemonic.has(spec.mnemonic)) byMnemonic.set(spec.mnemonic, spec.code);
}

export type ScriptItem = string | Pushable;

// Opcode byte for a mnemonic, with or without the OP_ prefix.
export function op(name: string): number {
  const upper = name.toUpperCase();
  const code = byMnemonic.get(upper.startsWith("OP_") ? upper : `OP_${upper}`);
  if (code === undefined) {
    throw new InvalidOpcodeError(`Unknown opcode ${name}`);
  }
  return code;
}

/**
 * Builds a script item by item: strings are opcode names, everything else goes
 * through `pushExpression`.
 *
 *     script("swap_add", "SWAP", 5, "ADD", sub)
 */
export function script(debugIdentifier: string, ...items: ScriptItem[]): StructuredScript {
  let out = new StructuredScript(debugIdentifier);
  for (const item of items) {
    out = typeof item == "string" ? out.pushOpcode(op(item)) : out.pushExpression(item);
  }
  return out;
}

export function fromAsm(debugIdentifier: string, asm: string): StructuredScript {
  return StructuredScript.fromBytes(debugIdentifier, bscript.fromASM(asm));
}

export function fromHex(debugIdentifier: string, hex: string): StructuredScript {
  if (!/^(?:[0-9a-fA-F]{2})*$/.test(hex)) {
    throw new ScriptDecodeError(`Script hex of "${debugIdentifier}" is malformed`, 0);
  }
  return StructuredScript.fromBytes(debugIdentifier, Buffer.from(hex, "hex"));
}
