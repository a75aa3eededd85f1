import {
  disassemble,
  PushInstruction,
  pushedScriptNumber,
  ScriptDecodeError,
  ScriptParser,
} from '../src/disasm';
import { opcodeName } from '../src/script-spec';
import { bytes } from './helpers/scripts';

function decodeError(run: () => unknown): ScriptDecodeError | null {
  try {
    run();
  } catch (e) {
    if (e instanceof ScriptDecodeError) return e;
    throw e;
  }
  return null;
}

function push(data: Buffer): PushInstruction {
  return { kind: 'push', opcode: data.length, data, offset: 0, length: data.length + 1 };
}

describe('ScriptParser', () => {
  test('reports offsets and lengths', () => {
    const insns = ScriptParser.parseAll(bytes(0x4c, 0x02, 0xaa, 0xbb, 0x76));
    expect(insns).toEqual([
      { kind: 'push', opcode: 0x4c, data: bytes(0xaa, 0xbb), offset: 0, length: 4 },
      { kind: 'op', opcode: 0x76, offset: 4, length: 1 },
    ]);
    expect(ScriptParser.countInstructions(bytes(0x4c, 0x02, 0xaa, 0xbb, 0x76))).toBe(2);
  });

  test('rejects truncated pushes', () => {
    expect(decodeError(() => ScriptParser.parseAll(bytes(0x76, 0x4d, 0x01)))?.offset).toBe(1);
    expect(decodeError(() => ScriptParser.parseAll(bytes(0x03, 0x01)))?.offset).toBe(0);
  });

  test('minimal mode rejects longer encodings', () => {
    const minimal = { minimal: true };
    expect(decodeError(() => ScriptParser.parseAll(bytes(0x4c, 0x02, 0xaa, 0xbb), minimal))?.offset).toBe(0);
    expect(decodeError(() => ScriptParser.parseAll(bytes(0x4c, 0x00), minimal))).not.toBeNull();
    expect(decodeError(() => ScriptParser.parseAll(bytes(0x51, 0x01, 0x05), minimal))?.offset).toBe(1);
    expect(decodeError(() => ScriptParser.parseAll(bytes(0x01, 0x81), minimal))).not.toBeNull();
    expect(decodeError(() => ScriptParser.parseAll(bytes(0x00, 0x02, 0xaa, 0xbb), minimal))).toBeNull();
  });
});

describe('disassemble', () => {
  test('formats opcodes and data', () => {
    expect(disassemble(bytes(0x00, 0x51, 0x02, 0xab, 0xcd, 0x93))).toBe('OP_0 OP_1 <abcd> OP_ADD');
  });

  test('names come from the effect table first', () => {
    expect(opcodeName(0xba)).toBe('OP_CHECKSIGADD');
    expect(opcodeName(0xb1)).toBe('OP_CHECKLOCKTIMEVERIFY');
    expect(opcodeName(0xc0)).toBe('OP_UNKNOWN_0xc0');
  });
});

describe('pushedScriptNumber', () => {
  test('decodes minimal numbers of up to four bytes', () => {
    expect(pushedScriptNumber(push(bytes(0xe8, 0x03)))).toBe(1000);
    expect(pushedScriptNumber(push(bytes(0x81)))).toBe(-1);
  });

  test('gives up on non-minimal or long numbers', () => {
    expect(pushedScriptNumber(push(bytes(0x05, 0x00)))).toBeNull();
    expect(pushedScriptNumber(push(bytes(1, 2, 3, 4, 5)))).toBeNull();
  });
});
