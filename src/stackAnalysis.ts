import type { ScriptHash } from "./core/block";
import type { StructuredScript } from "./core/structuredScript";
import { Instruction, ScriptParser, pushedScriptNumber } from "./disasm";
import { opcodeName, opcodeSpecs, StackEffectPair } from "./script-spec";

/**
 * Static stack effect of a fragment. Accesses are relative to the stack top
 * before the fragment runs and never positive.
 */
export type StackStatus = {
    deepestStackAccessed: number;
    stackChanged: number;
    deepestAltstackAccessed: number;
    altstackChanged: number;
};

/**
 * Resumable analyzer state between two fragments. Only taken outside of conditionals.
 */
export type AnalyzerSnapshot = {
    status: StackStatus;
    lastConstant: number | null;
};

export class ControlFlowError extends Error {
    public readonly debugPath: string;
    public readonly position: number;

    public constructor(message: string, debugPath: string, position: number) {
        super(`${message} at byte ${position} of "${debugPath}"`);
        this.name = "ControlFlowError";
        this.debugPath = debugPath;
        this.position = position;
    }
}

export class UnanalyzableStackError extends Error {
    public readonly debugPath: string;
    public readonly position: number;

    public constructor(message: string, debugPath: string, position: number) {
        super(`${message} at byte ${position} of "${debugPath}"`);
        this.name = "UnanalyzableStackError";
        this.debugPath = debugPath;
        this.position = position;
    }
}

export class BranchMismatchError extends Error {
    public readonly ifBranch: StackStatus;
    public readonly elseBranch: StackStatus;
    public readonly position: number;

    public constructor(ifBranch: StackStatus, elseBranch: StackStatus, debugPath: string, position: number) {
        super(
            `Conditional arms disagree (stack ${ifBranch.stackChanged} vs ${elseBranch.stackChanged}, ` +
            `altstack ${ifBranch.altstackChanged} vs ${elseBranch.altstackChanged}) ` +
            `at byte ${position} of "${debugPath}"`
        );
        this.name = "BranchMismatchError";
        this.ifBranch = ifBranch;
        this.elseBranch = elseBranch;
        this.position = position;
    }
}

// Largest PICK/ROLL depth taken from a pushed constant.
export const MAX_TRACKED_CONSTANT = 1000;

export function plainStackStatus(access: number, change: number): StackStatus {
    return {
        deepestStackAccessed: access,
        stackChanged: change,
        deepestAltstackAccessed: 0,
        altstackChanged: 0,
    };
}

/**
 * Effect of running `effect` right after `acc`. Items `acc` left on the stack
 * absorb the reads of `effect` before they count as deeper accesses.
 */
export function composeStackStatus(acc: StackStatus, effect: StackStatus): StackStatus {
    return {
        deepestStackAccessed: Math.min(acc.deepestStackAccessed, acc.stackChanged + effect.deepestStackAccessed),
        stackChanged: acc.stackChanged + effect.stackChanged,
        deepestAltstackAccessed: Math.min(acc.deepestAltstackAccessed, acc.altstackChanged + effect.deepestAltstackAccessed),
        altstackChanged: acc.altstackChanged + effect.altstackChanged,
    };
}

// Leaves exactly one result and never reaches below its own starting point.
export function isValidFinalStateWithoutInputs(status: StackStatus): boolean {
    return status.stackChanged == 1
        && status.altstackChanged == 0
        && status.deepestAltstackAccessed == 0
        && status.deepestStackAccessed == 0;
}

export function isValidFinalStateWithInputs(status: StackStatus): boolean {
    return status.stackChanged == 1
        && status.altstackChanged == 0
        && status.deepestAltstackAccessed == 0;
}

type ConditionalFrame = {
    ifBranch: StackStatus | null; // frozen once ELSE is seen
    branch: StackStatus;
    debugPath: string;
    position: number;
};

type AnalysisContext = {
    base: StackStatus;
    conditionals: ConditionalFrame[];
    lastConstant: number | null;
};

type WalkFrame = {
    script: StructuredScript;
    blockIndex: number;
    position: number; // absolute start of the next block
    debugPath: string;
    context: AnalysisContext;
    // Set on frames of sub-scripts analyzed on their own and memoized.
    isolatedHash: ScriptHash | null;
};

const PUSH_EFFECT = plainStackStatus(0, 1);

function effectOf(stack: StackEffectPair | undefined, altstack: StackEffectPair | undefined): StackStatus {
    return {
        deepestStackAccessed: stack ? stack[0] : 0,
        stackChanged: stack ? stack[1] : 0,
        deepestAltstackAccessed: altstack ? altstack[0] : 0,
        altstackChanged: altstack ? altstack[1] : 0,
    };
}

function freshContext(lastConstant: number | null): AnalysisContext {
    return { base: plainStackStatus(0, 0), conditionals: [], lastConstant };
}

function applyEffect(ctx: AnalysisContext, effect: StackStatus) {
    const top = ctx.conditionals[ctx.conditionals.length - 1];
    if (top) {
        top.branch = composeStackStatus(top.branch, effect);
    } else {
        ctx.base = composeStackStatus(ctx.base, effect);
    }
}

function joinPath(parent: string, child: string): string {
    return [parent, child].filter((s) => s.length > 0).join(" ");
}

/**
 * Walks structured scripts instruction by instruction and accumulates their
 * stack effect. Conditional-balanced sub-scripts are analyzed once per hash and
 * composed; unbalanced ones are walked inline so their IFs close in the caller.
 *
 * The analyzer keeps a running state, so the chunker can `feed` fragments one
 * at a time and `restore` a checkpoint when it backtracks.
 */
export class StackAnalyzer {
    private context: AnalysisContext;
    private memo = new Map<ScriptHash, StackStatus>();

    public constructor(initial?: AnalyzerSnapshot) {
        this.context = freshContext(null);
        if (initial) this.restore(initial);
    }

    public static resume(snapshot: AnalyzerSnapshot): StackAnalyzer {
        return new StackAnalyzer(snapshot);
    }

    public restore(snapshot: AnalyzerSnapshot) {
        this.context = {
            base: { ...snapshot.status },
            conditionals: [],
            lastConstant: snapshot.lastConstant,
        };
    }

    /**
     * Effect of `script` on its own. A stack hint is returned as given.
     */
    public analyze(script: StructuredScript): StackStatus {
        const hint = script.stackHint();
        if (hint) return hint;
        const ctx = freshContext(null);
        this.walk(script, ctx);
        const open = ctx.conditionals[ctx.conditionals.length - 1];
        if (open) {
            throw new ControlFlowError("Script ends inside IF opened", open.debugPath, open.position);
        }
        return ctx.base;
    }

    public feed(fragment: StructuredScript) {
        const hint = fragment.stackHint();
        if (hint) {
            applyEffect(this.context, hint);
            this.context.lastConstant = null;
            return;
        }
        this.walk(fragment, this.context);
    }

    public openConditionals(): number {
        return this.context.conditionals.length;
    }

    public lastConstant(): number | null {
        return this.context.lastConstant;
    }

    public snapshot(): AnalyzerSnapshot {
        const open = this.context.conditionals[this.context.conditionals.length - 1];
        if (open) {
            throw new ControlFlowError("Cannot checkpoint inside IF opened", open.debugPath, open.position);
        }
        return { status: { ...this.context.base }, lastConstant: this.context.lastConstant };
    }

    public status(): StackStatus {
        return this.snapshot().status;
    }

    private walk(root: StructuredScript, rootContext: AnalysisContext) {
        const frames: WalkFrame[] = [{
            script: root,
            blockIndex: 0,
            position: 0,
            debugPath: root.debugIdentifier,
            context: rootContext,
            isolatedHash: null,
        }];

        while (frames.length > 0) {
            const frame = frames[frames.length - 1];
            const block = frame.script.blocks[frame.blockIndex];
            if (!block) {
                frames.pop();
                this.finishFrame(frame, frames[frames.length - 1]);
                continue;
            }
            frame.blockIndex++;

            if (block.kind == "script") {
                for (const insn of ScriptParser.instructions(block.buf.bytes())) {
                    this.step(frame.context, insn, frame.position + insn.offset, frame.debugPath);
                }
                frame.position += block.buf.length;
                continue;
            }

            const sub = frame.script.getSubScript(block.hash);
            const start = frame.position;
            frame.position += sub.size;
            const hint = sub.stackHint();
            const known = hint ?? this.memo.get(block.hash);
            if (known) {
                applyEffect(frame.context, known);
                frame.context.lastConstant = null;
                continue;
            }
            const isolated = sub.isConditionalBalanced();
            frames.push({
                script: sub,
                blockIndex: 0,
                position: start,
                debugPath: joinPath(frame.debugPath, sub.debugIdentifier),
                context: isolated ? freshContext(null) : frame.context,
                isolatedHash: isolated ? block.hash : null,
            });
        }
    }

    private finishFrame(frame: WalkFrame, parent: WalkFrame | undefined) {
        if (frame.isolatedHash == null || !parent) return;
        const open = frame.context.conditionals[frame.context.conditionals.length - 1];
        if (open) {
            throw new ControlFlowError("Sub-script ends inside IF opened", open.debugPath, open.position);
        }
        this.memo.set(frame.isolatedHash, frame.context.base);
        applyEffect(parent.context, frame.context.base);
        parent.context.lastConstant = null;
    }

    private step(ctx: AnalysisContext, insn: Instruction, position: number, debugPath: string) {
        if (insn.kind == "push") {
            applyEffect(ctx, PUSH_EFFECT);
            const value = pushedScriptNumber(insn);
            ctx.lastConstant = value != null && value >= 0 && value <= MAX_TRACKED_CONSTANT ? value : null;
            return;
        }

        const spec = opcodeSpecs.get(insn.opcode);
        if (!spec) {
            throw new UnanalyzableStackError(`Undefined opcode ${opcodeName(insn.opcode)}`, debugPath, position);
        }
        const constant = ctx.lastConstant;
        ctx.lastConstant = spec.constant ?? null;

        switch (spec.flow) {
            case "if": {
                applyEffect(ctx, effectOf(spec.stack, spec.altstack));
                ctx.conditionals.push({ ifBranch: null, branch: plainStackStatus(0, 0), debugPath, position });
                return;
            }
            case "else": {
                const top = ctx.conditionals[ctx.conditionals.length - 1];
                if (!top) throw new ControlFlowError("OP_ELSE without OP_IF", debugPath, position);
                if (top.ifBranch) throw new ControlFlowError("Repeated OP_ELSE", debugPath, position);
                top.ifBranch = top.branch;
                top.branch = plainStackStatus(0, 0);
                return;
            }
            case "endif": {
                const top = ctx.conditionals.pop();
                if (!top) throw new ControlFlowError("OP_ENDIF without OP_IF", debugPath, position);
                applyEffect(ctx, mergeBranches(top, debugPath, position));
                return;
            }
        }

        switch (spec.dynamic) {
            case "pick":
            case "roll": {
                if (constant == null) {
                    throw new UnanalyzableStackError(
                        `${spec.mnemonic} depth is not a known constant`, debugPath, position
                    );
                }
                applyEffect(ctx, plainStackStatus(-(constant + 2), spec.dynamic == "roll" ? -1 : 0));
                return;
            }
            case "debug": {
                throw new UnanalyzableStackError(`Debug marker ${spec.mnemonic} reached`, debugPath, position);
            }
            case "unsupported": {
                throw new UnanalyzableStackError(`${spec.mnemonic} has no static stack effect`, debugPath, position);
            }
        }

        applyEffect(ctx, effectOf(spec.stack, spec.altstack));
    }
}

function mergeBranches(frame: ConditionalFrame, debugPath: string, position: number): StackStatus {
    const ifBranch = frame.ifBranch ?? frame.branch;
    const elseBranch = frame.ifBranch ? frame.branch : plainStackStatus(0, 0);
    if (ifBranch.stackChanged != elseBranch.stackChanged || ifBranch.altstackChanged != elseBranch.altstackChanged) {
        throw new BranchMismatchError(ifBranch, elseBranch, debugPath, position);
    }
    return {
        deepestStackAccessed: Math.min(ifBranch.deepestStackAccessed, elseBranch.deepestStackAccessed),
        stackChanged: ifBranch.stackChanged,
        deepestAltstackAccessed: Math.min(ifBranch.deepestAltstackAccessed, elseBranch.deepestAltstackAccessed),
        altstackChanged: ifBranch.altstackChanged,
    };
}
