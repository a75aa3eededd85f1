import type { ScriptHash } from "../core/block";
import type { StructuredScript } from "../core/structuredScript";
import { ScriptDecodeError, ScriptParser } from "../disasm";

export class InternalConsistencyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InternalConsistencyError";
  }
}

// Offsets of already emitted sub-scripts within one output buffer.
export type CompileCache = Map<ScriptHash, number>;

type CompileFrame = {
  script: StructuredScript;
  blockIndex: number;
  hash: ScriptHash | null;
  start: number;
};

// Appends the flattened bytes of `root` to `out` at `pos`, returns the new position.
function emit(root: StructuredScript, out: Buffer, pos: number, cache: CompileCache): number {
  const frames: CompileFrame[] = [{ script: root, blockIndex: 0, hash: null, start: pos }];
  while (frames.length > 0) {
    const frame = frames[frames.length - 1];
    const block = frame.script.blocks[frame.blockIndex];
    if (!block) {
      frames.pop();
      if (pos - frame.start != frame.script.size) {
        throw new InternalConsistencyError(
          `Script "${frame.script.debugIdentifier}" emitted ${pos - frame.start} bytes, declared ${frame.script.size}`
        );
      }
      if (frame.hash != null && !cache.has(frame.hash)) cache.set(frame.hash, frame.start);
      continue;
    }
    frame.blockIndex++;

    if (block.kind == "script") {
      pos += block.buf.bytes().copy(out, pos);
      continue;
    }
    const sub = frame.script.getSubScript(block.hash);
    const cached = cache.get(block.hash);
    if (cached !== undefined) {
      pos += out.copy(out, pos, cached, cached + sub.size);
      continue;
    }
    frames.push({ script: sub, blockIndex: 0, hash: block.hash, start: pos });
  }
  return pos;
}

function checkMinimal(out: Buffer) {
  try {
    ScriptParser.parseAll(out, { minimal: true });
  } catch (e) {
    if (e instanceof ScriptDecodeError) {
      throw new InternalConsistencyError(`Compiled script is not minimal: ${e.message}`);
    }
    throw e;
  }
}

/**
 * Flattens a structured script. Every distinct sub-script is emitted once and
 * later calls copy the bytes already written.
 */
export function compileScript(script: StructuredScript): Buffer {
  return compileFragments([script]);
}

// Compiles fragments back to back into one buffer with a shared cache.
export function compileFragments(fragments: ReadonlyArray<StructuredScript>): Buffer {
  const size = fragments.reduce((acc, f) => acc + f.size, 0);
  const out = Buffer.alloc(size);
  const cache: CompileCache = new Map();
  let pos = 0;
  for (const fragment of fragments) {
    pos = emit(fragment, out, pos, cache);
  }
  if (pos != size) {
    throw new InternalConsistencyError(`Compiled ${pos} bytes, expected ${size}`);
  }
  checkMinimal(out);
  return out;
}
