export { StructuredScript, InvalidOpcodeError, FrozenScriptError, encodeScriptNum } from "./core/structuredScript";
export type { Pushable } from "./core/structuredScript";
export { ScriptBuf, encodeBlocks } from "./core/block";
export type { Block, CallBlock, LiteralBlock, ScriptHash } from "./core/block";
export {
    StackAnalyzer,
    ControlFlowError,
    UnanalyzableStackError,
    BranchMismatchError,
    composeStackStatus,
    plainStackStatus,
    isValidFinalStateWithInputs,
    isValidFinalStateWithoutInputs,
} from "./stackAnalysis";
export type { StackStatus, AnalyzerSnapshot } from "./stackAnalysis";
export { Chunker, ChunkerError, compileToChunks, splitFragment } from "./middle/chunker";
export type { Chunk, ChunkStats, CompiledChunks } from "./middle/chunker";
export { compileScript, compileFragments, InternalConsistencyError } from "./backend/compiler";
export { serializeScript, deserializeScript } from "./backend/serialize";
export type { SerializedScript, SerializedFragment, SerializedBlock } from "./backend/serialize";
export { ScriptParser, ScriptDecodeError, disassemble, toAsm } from "./disasm";
export type { Instruction, OpInstruction, PushInstruction } from "./disasm";
export { opcodeName, opcodeSpecs } from "./script-spec";
export { script, op, fromAsm, fromHex } from "./frontend/builder";
export type { ScriptItem } from "./frontend/builder";
export { ConfigurationError, parseChunkerOptions, DEFAULT_STACK_LIMIT, DEFAULT_MAX_DESCENT_DEPTH } from "./config";
export type { ChunkerOptions, ChunkerOptionsInput } from "./config";
export { logger } from "./logger";
