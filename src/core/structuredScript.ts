import { crypto as bcrypto, opcodes, script as bscript } from "bitcoinjs-lib";
import { compileScript, InternalConsistencyError } from "../backend/compiler";
import { ScriptParser, toAsm } from "../disasm";
import { opcodeName } from "../script-spec";
import { StackAnalyzer, plainStackStatus, type StackStatus } from "../stackAnalysis";
import { Block, ScriptBuf, ScriptHash, encodeBlocks } from "./block";

const { OP_0, OP_1, OP_PUSHDATA4, OP_IF, OP_NOTIF, OP_ENDIF } = opcodes;

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

export class InvalidOpcodeError extends Error {
  public readonly opcode: number | null;

  constructor(message: string, opcode: number | null = null) {
    super(message);
    this.name = "InvalidOpcodeError";
    this.opcode = opcode;
  }
}

export class FrozenScriptError extends Error {
  constructor(debugIdentifier: string) {
    super(`Script "${debugIdentifier}" is registered under its content hash and can no longer change`);
    this.name = "FrozenScriptError";
  }
}

/**
 * Anything `pushExpression` understands. A one-byte `Uint8Array` is pushed as the
 * integer it holds, longer ones as data, arrays element by element.
 */
export type Pushable = number | bigint | Uint8Array | StructuredScript | ReadonlyArray<Pushable>;

// Minimal little-endian sign-magnitude script number, for values outside the
// single-opcode range.
export function encodeScriptNum(value: bigint): Buffer {
  const negative = value < 0n;
  let abs = negative ? -value : value;
  const bytes: number[] = [];
  while (abs > 0n) {
    bytes.push(Number(abs & 0xffn));
    abs >>= 8n;
  }
  if (bytes.length == 0) return Buffer.alloc(0);
  const last = bytes.length - 1;
  if (bytes[last] & 0x80) {
    bytes.push(negative ? 0x80 : 0x00);
  } else if (negative) {
    bytes[last] |= 0x80;
  }
  return Buffer.from(bytes);
}

function checkHint(access: number, change: number) {
  if (!Number.isInteger(access) || access > 0) {
    throw new RangeError(`Hinted access ${access} is not a non-positive integer`);
  }
  if (!Number.isInteger(change)) {
    throw new RangeError(`Hinted change ${change} is not an integer`);
  }
}

/**
 * A script assembled from literal instruction runs and calls to other scripts.
 *
 * Calls are content addressed: a called script is registered in this script's
 * `scriptMap` under the sha256 of its block sequence (plus its stack hint), and
 * registering it freezes it. Every script owns the bodies of all scripts
 * reachable from it, so any script can be compiled, analyzed or chunked on its own.
 *
 * Builder methods append in place and return `this`; always continue with the
 * returned script, since splicing into an empty script adopts the other side.
 */
export class StructuredScript {
  public debugIdentifier: string;
  private _size = 0;
  private _blocks: Block[] = [];
  private _scriptMap = new Map<ScriptHash, StructuredScript>();
  private _stackHint: StackStatus | null = null;
  private _unclosedIfPositions: number[] = [];
  private _extraEndifPositions: number[] = [];
  private _maxIfInterval: [number, number] = [0, 0];
  private _hash: ScriptHash | null = null;

  constructor(debugIdentifier: string = "") {
    this.debugIdentifier = debugIdentifier;
  }

  static fromBytes(debugIdentifier: string, bytes: Uint8Array): StructuredScript {
    return new StructuredScript(debugIdentifier).pushScript(bytes);
  }

  get size(): number {
    return this._size;
  }

  len(): number {
    return this._size;
  }

  get blocks(): ReadonlyArray<Block> {
    return this._blocks;
  }

  get numUnclosedIfs(): number {
    return this._unclosedIfPositions.length - this._extraEndifPositions.length;
  }

  unclosedIfPositions(): number[] {
    return [...this._unclosedIfPositions];
  }

  extraEndifPositions(): number[] {
    return [...this._extraEndifPositions];
  }

  maxIfInterval(): [number, number] {
    return [this._maxIfInterval[0], this._maxIfInterval[1]];
  }

  containsFlowOp(): boolean {
    return this._unclosedIfPositions.length > 0
      || this._extraEndifPositions.length > 0
      || this._maxIfInterval[0] != this._maxIfInterval[1];
  }

  isConditionalBalanced(): boolean {
    return this._unclosedIfPositions.length == 0 && this._extraEndifPositions.length == 0;
  }

  isScriptBuf(): boolean {
    return this._blocks.length == 1 && this._blocks[0].kind == "script";
  }

  isSingleInstruction(): boolean {
    const block = this._blocks.length == 1 ? this._blocks[0] : null;
    if (block == null || block.kind != "script") return false;
    return ScriptParser.nextInstruction(block.buf.bytes(), 0).length == block.buf.length;
  }

  hasStackHint(): boolean {
    return this._stackHint != null;
  }

  stackHint(): StackStatus | null {
    return this._stackHint ? { ...this._stackHint } : null;
  }

  isFrozen(): boolean {
    return this._hash != null;
  }

  /**
   * Content hash of the block sequence and stack hint. Computing it freezes the script.
   */
  hash(): ScriptHash {
    if (this._hash == null) {
      const parts = [encodeBlocks(this._blocks)];
      if (this._stackHint) {
        const hint = Buffer.alloc(16);
        hint.writeInt32LE(this._stackHint.deepestStackAccessed, 0);
        hint.writeInt32LE(this._stackHint.stackChanged, 4);
        hint.writeInt32LE(this._stackHint.deepestAltstackAccessed, 8);
        hint.writeInt32LE(this._stackHint.altstackChanged, 12);
        parts.push(hint);
      }
      this._hash = bcrypto.sha256(Buffer.concat(parts)).toString("hex");
    }
    return this._hash;
  }

  getSubScript(hash: ScriptHash): StructuredScript {
    const script = this._scriptMap.get(hash);
    if (!script) {
      throw new InternalConsistencyError(`Script "${this.debugIdentifier}" calls unknown script ${hash}`);
    }
    return script;
  }

  subScripts(): ReadonlyMap<ScriptHash, StructuredScript> {
    return this._scriptMap;
  }

  // Debug identifier path of the fragment whose literal bytes hold `position`.
  debugInfo(position: number): string {
    if (!Number.isInteger(position) || position < 0 || position >= this._size) {
      throw new RangeError(`Position ${position} is outside script "${this.debugIdentifier}" of ${this._size} bytes`);
    }
    let script: StructuredScript = this;
    let path = this.debugIdentifier;
    let pos = position;
    descend: for (;;) {
      for (const block of script._blocks) {
        if (block.kind == "script") {
          if (pos < block.buf.length) return path;
          pos -= block.buf.length;
          continue;
        }
        const sub = script.getSubScript(block.hash);
        if (pos < sub.size) {
          path = [path, sub.debugIdentifier].filter((s) => s.length > 0).join(" ");
          script = sub;
          continue descend;
        }
        pos -= sub.size;
      }
      throw new InternalConsistencyError(`Block sizes of "${script.debugIdentifier}" do not add up to its size`);
    }
  }

  private assertMutable() {
    if (this._hash != null) throw new FrozenScriptError(this.debugIdentifier);
  }

  private literalTail(): ScriptBuf {
    const last = this._blocks[this._blocks.length - 1];
    if (last && last.kind == "script") return last.buf;
    const buf = new ScriptBuf();
    this._blocks.push({ kind: "script", buf });
    return buf;
  }

  private updateMaxInterval(start: number, end: number) {
    if (end - start > this._maxIfInterval[1] - this._maxIfInterval[0]) {
      this._maxIfInterval = [start, end];
    }
  }

  private trackFlowOp(opcode: number, position: number) {
    if (opcode == OP_IF || opcode == OP_NOTIF) {
      this._unclosedIfPositions.push(position);
    } else if (opcode == OP_ENDIF) {
      const open = this._unclosedIfPositions.pop();
      if (open === undefined) this._extraEndifPositions.push(position);
      else this.updateMaxInterval(open, position);
    }
  }

  pushOpcode(opcode: number): this {
    this.assertMutable();
    if (!Number.isInteger(opcode) || opcode < 0 || opcode > 0xff) {
      throw new InvalidOpcodeError(`Opcode ${opcode} is not a byte`, opcode);
    }
    if (opcode != OP_0 && opcode <= OP_PUSHDATA4) {
      throw new InvalidOpcodeError(`${opcodeName(opcode)} needs push data, use pushSlice`, opcode);
    }
    this.trackFlowOp(opcode, this._size);
    this.literalTail().writeUInt8(opcode);
    this._size += 1;
    return this;
  }

  /**
   * Appends pre-encoded instructions as a new literal block. Bytes that do not
   * decode are rejected with `ScriptDecodeError`.
   */
  pushScript(bytes: Uint8Array): this {
    this.assertMutable();
    if (bytes.length == 0) return this;
    const data = Buffer.from(bytes);
    const insns = ScriptParser.parseAll(data);
    let pos = 0;
    for (const insn of insns) pos += insn.length;
    if (pos != data.length) {
      throw new InternalConsistencyError(`Decoded ${pos} of ${data.length} literal bytes`);
    }
    for (const insn of insns) {
      if (insn.kind == "op") this.trackFlowOp(insn.opcode, this._size + insn.offset);
    }
    this._blocks.push({ kind: "script", buf: ScriptBuf.from(data) });
    this._size += data.length;
    return this;
  }

  /**
   * Splices `other` in as a call. Pending IFs of this script are closed by
   * orphan ENDIFs of `other`, innermost IF first.
   */
  pushEnvScript(other: StructuredScript): this {
    this.assertMutable();
    if (other === this) throw new Error(`Script "${this.debugIdentifier}" cannot call itself`);
    if (other._size == 0) return this;
    if (this._size == 0 && this._stackHint == null && other._stackHint == null) {
      this.adopt(other);
      return this;
    }

    const hash = other.hash();
    const base = this._size;
    const closable = Math.min(this._unclosedIfPositions.length, other._extraEndifPositions.length);
    for (let k = 0; k < closable; k++) {
      const start = this._unclosedIfPositions.pop();
      if (start === undefined) break;
      this.updateMaxInterval(start, base + other._extraEndifPositions[k]);
    }
    const [innerStart, innerEnd] = other._maxIfInterval;
    this.updateMaxInterval(base + innerStart, base + innerEnd);
    for (const p of other._unclosedIfPositions) this._unclosedIfPositions.push(base + p);
    for (const p of other._extraEndifPositions.slice(closable)) this._extraEndifPositions.push(base + p);

    // A registered script brought all of its own callees along already.
    if (!this._scriptMap.has(hash)) {
      for (const [subHash, sub] of other._scriptMap) {
        if (!this._scriptMap.has(subHash)) this._scriptMap.set(subHash, sub);
      }
      this._scriptMap.set(hash, other);
    }
    this._blocks.push({ kind: "call", hash });
    this._size += other._size;
    return this;
  }

  // Copies `other` into this empty script; only the open tail block is shared mutable state.
  private adopt(other: StructuredScript) {
    const lastIndex = other._blocks.length - 1;
    this._blocks = other._blocks.map((block, i): Block =>
      block.kind == "script" && i == lastIndex ? { kind: "script", buf: block.buf.clone() } : block
    );
    this._scriptMap = new Map(other._scriptMap);
    this._unclosedIfPositions = [...other._unclosedIfPositions];
    this._extraEndifPositions = [...other._extraEndifPositions];
    this._maxIfInterval = [other._maxIfInterval[0], other._maxIfInterval[1]];
    this._size = other._size;
    this.debugIdentifier = other.debugIdentifier;
  }

  pushInt(value: number | bigint): this {
    if (typeof value == "number" && !Number.isSafeInteger(value)) {
      throw new RangeError(`${value} is not a safe integer`);
    }
    const n = BigInt(value);
    if (n < I64_MIN || n > I64_MAX) {
      throw new RangeError(`${n} does not fit in 64 bits`);
    }
    if (n == -1n || (n >= 1n && n <= 16n)) {
      return this.pushOpcode(OP_1 + Number(n) - 1);
    }
    if (n == 0n) {
      return this.pushOpcode(OP_0);
    }
    return this.pushSlice(encodeScriptNum(n));
  }

  pushSlice(data: Uint8Array): this {
    this.assertMutable();
    const encoded = bscript.compile([Buffer.from(data)]);
    this.literalTail().write(encoded);
    this._size += encoded.length;
    return this;
  }

  pushKey(key: Uint8Array): this {
    if (key.length != 33 && key.length != 65) {
      throw new RangeError(`Public key must be 33 or 65 bytes, got ${key.length}`);
    }
    return this.pushSlice(key);
  }

  pushXOnlyKey(key: Uint8Array): this {
    if (key.length != 32) {
      throw new RangeError(`X-only public key must be 32 bytes, got ${key.length}`);
    }
    return this.pushSlice(key);
  }

  pushExpression(value: Pushable): this {
    if (value instanceof StructuredScript) return this.pushEnvScript(value);
    if (value instanceof Uint8Array) {
      return value.length == 1 ? this.pushInt(value[0]) : this.pushSlice(value);
    }
    if (typeof value == "number" || typeof value == "bigint") return this.pushInt(value);
    for (const item of value) this.pushExpression(item);
    return this;
  }

  /**
   * Overrides analysis of this script's main stack. The hint is trusted as given
   * apart from its shape: `access` is a non-positive integer.
   */
  addStackHint(access: number, change: number): this {
    this.assertMutable();
    checkHint(access, change);
    this._stackHint = {
      ...(this._stackHint ?? plainStackStatus(0, 0)),
      deepestStackAccessed: access,
      stackChanged: change,
    };
    return this;
  }

  addAltstackHint(access: number, change: number): this {
    this.assertMutable();
    checkHint(access, change);
    this._stackHint = {
      ...(this._stackHint ?? plainStackStatus(0, 0)),
      deepestAltstackAccessed: access,
      altstackChanged: change,
    };
    return this;
  }

  analyzeStack(): StackStatus {
    return this.stackHint() ?? new StackAnalyzer().analyze(this);
  }

  compile(): Buffer {
    return compileScript(this);
  }

  toAsm(): string {
    return toAsm(this.compile());
  }
}
