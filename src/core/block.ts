// Literal instruction bytes of a structured script. Appends grow the backing
// buffer geometrically; `bytes()` is a view valid until the next append.
export class ScriptBuf {
  private buffer: Buffer;
  private pos: number;

  constructor(initialCapacity: number = 16) {
    this.buffer = Buffer.alloc(Math.max(1, initialCapacity));
    this.pos = 0;
  }

  static from(bytes: Uint8Array): ScriptBuf {
    const buf = new ScriptBuf(bytes.length);
    buf.write(bytes);
    return buf;
  }

  get length(): number {
    return this.pos;
  }

  private ensureCapacity(needed: number): void {
    if (this.pos + needed <= this.buffer.length) return;
    let capacity = this.buffer.length * 2;
    while (this.pos + needed > capacity) {
      capacity *= 2;
    }
    const next = Buffer.alloc(capacity);
    this.buffer.copy(next, 0, 0, this.pos);
    this.buffer = next;
  }

  write(bytes: Uint8Array): void {
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.pos);
    this.pos += bytes.length;
  }

  writeUInt8(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos] = value & 0xff;
    this.pos += 1;
  }

  bytes(): Buffer {
    return this.buffer.subarray(0, this.pos);
  }

  clone(): ScriptBuf {
    return ScriptBuf.from(this.bytes());
  }
}

export type ScriptHash = string; // hex sha256 of a script's block sequence

export type CallBlock = { kind: 'call'; hash: ScriptHash };

export type LiteralBlock = { kind: 'script'; buf: ScriptBuf };

export type Block = CallBlock | LiteralBlock;

const CALL_TAG = 0x01;
const SCRIPT_TAG = 0x00;

// Byte image of a block sequence, the preimage of a script's content hash.
export function encodeBlocks(blocks: ReadonlyArray<Block>): Buffer {
  const parts: Buffer[] = [];
  for (const block of blocks) {
    if (block.kind === 'call') {
      parts.push(Buffer.from([CALL_TAG]), Buffer.from(block.hash, 'hex'));
    } else {
      const header = Buffer.alloc(5);
      header.writeUInt8(SCRIPT_TAG, 0);
      header.writeUInt32LE(block.buf.length, 1);
      parts.push(header, block.buf.bytes());
    }
  }
  return Buffer.concat(parts);
}
