import { compileFragments } from "../backend/compiler";
import { ChunkerOptions, ChunkerOptionsInput, parseChunkerOptions } from "../config";
import { StructuredScript } from "../core/structuredScript";
import { ScriptParser } from "../disasm";
import { logger } from "../logger";
import {
  AnalyzerSnapshot,
  ControlFlowError,
  plainStackStatus,
  StackAnalyzer,
  StackStatus,
} from "../stackAnalysis";

export type ChunkStats = {
  stackInputSize: number;
  stackOutputSize: number;
  altstackInputSize: number;
  altstackOutputSize: number;
  deepestStackAccessed: number;
  deepestAltstackAccessed: number;
};

export type Chunk = {
  scripts: StructuredScript[];
  size: number;
  stats: ChunkStats;
  // Last small constant pushed before the chunk ends, seen by PICK/ROLL in the next one.
  lastConstant: number | null;
};

export class ChunkerError extends Error {
  public readonly chunkSizes: number[];
  public readonly unclosedIfPositions: number[];

  constructor(message: string, chunkSizes: number[], unclosedIfPositions: number[]) {
    super(`${message} (chunks so far: [${chunkSizes.join(", ")}], unclosed IFs at: [${unclosedIfPositions.join(", ")}])`);
    this.name = "ChunkerError";
    this.chunkSizes = chunkSizes;
    this.unclosedIfPositions = unclosedIfPositions;
  }
}

type WorkItem = {
  script: StructuredScript;
  depth: number;
};

// Fragments of `script` one level down: instructions of a lone literal run, blocks otherwise.
export function splitFragment(script: StructuredScript): StructuredScript[] {
  const id = script.debugIdentifier;
  const [first] = script.blocks;
  if (script.isScriptBuf() && first && first.kind == "script") {
    const bytes = first.buf.bytes();
    return ScriptParser.parseAll(bytes).map((insn) =>
      StructuredScript.fromBytes(id, bytes.subarray(insn.offset, insn.offset + insn.length))
    );
  }
  return script.blocks.map((block) =>
    block.kind == "call" ? script.getSubScript(block.hash) : StructuredScript.fromBytes(id, block.buf.bytes())
  );
}

function isDescendable(script: StructuredScript): boolean {
  return !script.hasStackHint() && !script.isSingleInstruction();
}

/**
 * Greedy partitioner. Fills a chunk fragment by fragment up to the target size,
 * descending into fragments that do not fit, and remembers the last point where
 * the chunk had no open IF and fit the stack limit. Whatever was taken after
 * that point is given back (split further where it carries control flow) until
 * such a point is reached again.
 */
export class Chunker {
  public readonly chunks: Chunk[] = [];
  private readonly options: ChunkerOptions;
  private readonly analyzer = new StackAnalyzer();
  private readonly work: WorkItem[];
  private stackInputSize: number;
  private altstackInputSize: number;
  private lastConstant: number | null = null;
  private position = 0;

  constructor(root: StructuredScript, options: ChunkerOptionsInput) {
    this.options = parseChunkerOptions(options);
    if (!root.isConditionalBalanced()) {
      const position = root.unclosedIfPositions()[0] ?? root.extraEndifPositions()[0] ?? 0;
      throw new ControlFlowError("Cannot chunk a script with unbalanced IF/ENDIF", root.debugIdentifier, position);
    }
    this.work = root.size > 0 ? [{ script: root, depth: 0 }] : [];
    this.stackInputSize = this.options.stackInputSize;
    this.altstackInputSize = this.options.altstackInputSize;
  }

  findChunks(): number[] {
    while (this.work.length > 0) {
      const chunk = this.findNextChunk();
      logger.debug({
        chunk: this.chunks.length,
        size: chunk.size,
        stackIn: chunk.stats.stackInputSize,
        stackOut: chunk.stats.stackOutputSize,
        altstackIn: chunk.stats.altstackInputSize,
        altstackOut: chunk.stats.altstackOutputSize,
      }, "chunk found");
      this.chunks.push(chunk);
      this.position += chunk.size;
      this.stackInputSize = chunk.stats.stackOutputSize;
      this.altstackInputSize = chunk.stats.altstackOutputSize;
      this.lastConstant = chunk.lastConstant;
    }
    return this.chunks.map((c) => c.size);
  }

  private stackFits(status: StackStatus): boolean {
    const height = this.stackInputSize + status.stackChanged + this.altstackInputSize + status.altstackChanged;
    return height <= this.options.stackLimit;
  }

  private findNextChunk(): Chunk {
    const { targetChunkSize, tolerance, maxDescentDepth } = this.options;
    let checkpoint: AnalyzerSnapshot = { status: plainStackStatus(0, 0), lastConstant: this.lastConstant };
    this.analyzer.restore(checkpoint);

    const committed: StructuredScript[] = [];
    let committedSize = 0;
    let pending: WorkItem[] = [];
    let pendingSize = 0;
    let balance = 0;

    const commit = () => {
      for (const item of pending) committed.push(item.script);
      committedSize += pendingSize;
      pending = [];
      pendingSize = 0;
      checkpoint = this.analyzer.snapshot();
    };

    for (;;) {
      const item = this.work.pop();
      if (!item) break;
      const fragment = item.script;
      if (fragment.size == 0) continue;

      const extra = fragment.extraEndifPositions();
      if (extra.length > balance) {
        throw new ControlFlowError(
          "OP_ENDIF closes an OP_IF outside the chunk",
          fragment.debugIdentifier,
          this.position + committedSize + pendingSize + extra[balance]
        );
      }

      if (committedSize + pendingSize + fragment.size <= targetChunkSize) {
        pending.push(item);
        pendingSize += fragment.size;
        balance += fragment.numUnclosedIfs;
        this.analyzer.feed(fragment);
        if (balance == 0 && this.stackFits(this.analyzer.status())) commit();
        continue;
      }

      if (pending.length == 0 && committed.length > 0 && committedSize >= targetChunkSize - tolerance) {
        this.work.push(item);
        break;
      }

      const descendable = isDescendable(fragment);
      if (descendable && item.depth < maxDescentDepth) {
        const pieces = splitFragment(fragment);
        for (let i = pieces.length - 1; i >= 0; i--) {
          this.work.push({ script: pieces[i], depth: item.depth + 1 });
        }
        continue;
      }

      if (descendable && committed.length == 0 && pending.length == 0 && fragment.isConditionalBalanced()) {
        logger.warn({
          chunk: this.chunks.length,
          size: fragment.size,
          target: targetChunkSize,
          script: fragment.debugIdentifier,
        }, "accepting oversized fragment at maximum descent depth");
        pending.push(item);
        pendingSize += fragment.size;
        this.analyzer.feed(fragment);
        if (this.stackFits(this.analyzer.status())) commit();
        break;
      }

      this.work.push(item);
      break;
    }

    // Give back everything after the checkpoint until the chunk is clean again.
    while (pending.length > 0) {
      if (balance == 0) {
        this.analyzer.restore(checkpoint);
        for (const p of pending) this.analyzer.feed(p.script);
        if (this.stackFits(this.analyzer.status())) {
          commit();
          break;
        }
      }
      const last = pending.pop();
      if (!last) break;
      pendingSize -= last.script.size;
      balance -= last.script.numUnclosedIfs;
      if (last.script.containsFlowOp() && isDescendable(last.script)) {
        for (const piece of splitFragment(last.script)) {
          pending.push({ script: piece, depth: last.depth + 1 });
          pendingSize += piece.size;
          balance += piece.numUnclosedIfs;
        }
      } else {
        this.work.push(last);
      }
    }
    this.analyzer.restore(checkpoint);

    if (committed.length == 0) {
      const next = this.work[this.work.length - 1];
      const unclosed = next ? next.script.unclosedIfPositions().map((p) => this.position + p) : [];
      throw new ChunkerError(
        `No fragment fits a chunk of ${targetChunkSize} bytes`,
        this.chunks.map((c) => c.size),
        unclosed
      );
    }

    const { status, lastConstant } = checkpoint;
    return {
      scripts: committed,
      size: committedSize,
      stats: {
        stackInputSize: this.stackInputSize,
        stackOutputSize: this.stackInputSize + status.stackChanged,
        altstackInputSize: this.altstackInputSize,
        altstackOutputSize: this.altstackInputSize + status.altstackChanged,
        deepestStackAccessed: status.deepestStackAccessed,
        deepestAltstackAccessed: status.deepestAltstackAccessed,
      },
      lastConstant,
    };
  }
}

export type CompiledChunks = {
  chunkSizes: number[];
  chunks: Buffer[];
};

export function compileToChunks(script: StructuredScript, options: ChunkerOptionsInput): CompiledChunks {
  const chunker = new Chunker(script, options);
  const chunkSizes = chunker.findChunks();
  return {
    chunkSizes,
    chunks: chunker.chunks.map((c) => compileFragments(c.scripts)),
  };
}
