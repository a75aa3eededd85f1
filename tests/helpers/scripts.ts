import { StructuredScript } from '../../src/core/structuredScript';
import { script, ScriptItem } from '../../src/frontend/builder';

export function repeat(debugIdentifier: string, item: ScriptItem, times: number): StructuredScript {
  return script(debugIdentifier, ...new Array<ScriptItem>(times).fill(item));
}

// Fresh copy of a byte sequence as a Buffer, for comparing compiled output.
export function bytes(...values: number[]): Buffer {
  return Buffer.from(values);
}

/**
 * Nested doubling script: level k is `NOP <level k-1> <level k-1>`, level 0 is `1 ADD`.
 */
export function doubling(levels: number): { script: StructuredScript; expected: Buffer } {
  let current = script('level0', 1, 'ADD');
  let expected = bytes(0x51, 0x93);
  for (let k = 1; k <= levels; k++) {
    current = script(`level${k}`, 'NOP', current, current);
    expected = Buffer.concat([bytes(0x61), expected, expected]);
  }
  return { script: current, expected };
}
