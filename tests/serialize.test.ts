import { ZodError } from 'zod';
import { InternalConsistencyError } from '../src/backend/compiler';
import { deserializeScript, serializeScript } from '../src/backend/serialize';
import { StructuredScript } from '../src/core/structuredScript';
import { script } from '../src/frontend/builder';

function roundTrip(root: StructuredScript): StructuredScript {
  return deserializeScript(JSON.parse(JSON.stringify(serializeScript(root))));
}

describe('serializeScript', () => {
  test('writes blocks and every reachable sub-script', () => {
    const sub = script('sub', 'ADD', 'ADD');
    const root = script('root', 'NOP', sub);
    expect(serializeScript(root)).toEqual({
      debugIdentifier: 'root',
      blocks: [{ script: '61' }, { call: sub.hash() }],
      scripts: {
        [sub.hash()]: { debugIdentifier: 'sub', blocks: [{ script: '9393' }] },
      },
    });
  });
});

describe('deserializeScript', () => {
  test('rebuilds a nested script that compiles and hashes the same', () => {
    const leaf = script('leaf', 1, 'ADD');
    const hinted = new StructuredScript('hinted').addStackHint(-1, 0).pushEnvScript(leaf);
    const mid = script('mid', 'DUP', leaf, hinted, leaf);
    const root = script('root', 'IF', mid, 'ENDIF', hinted);

    const copy = roundTrip(root);
    expect(copy.compile()).toEqual(root.compile());
    expect(copy.size).toBe(root.size);
    expect(copy.getSubScript(hinted.hash()).stackHint()).toEqual({
      deepestStackAccessed: -1,
      stackChanged: 0,
      deepestAltstackAccessed: 0,
      altstackChanged: 0,
    });
    expect(copy.hash()).toBe(root.hash());
  });

  test('a sub-script that does not match its hash is an internal error', () => {
    const sub = script('sub', 'ADD', 'ADD');
    const serialized = serializeScript(script('root', 'NOP', sub));
    serialized.scripts[sub.hash()].blocks = [{ script: '93' }];
    expect(() => deserializeScript(serialized)).toThrow(InternalConsistencyError);
  });

  test('a call to a missing sub-script is an internal error', () => {
    const sub = script('sub', 'ADD', 'ADD');
    const serialized = serializeScript(script('root', 'NOP', sub));
    serialized.scripts = {};
    expect(() => deserializeScript(serialized)).toThrow(InternalConsistencyError);
  });

  test('malformed input is rejected by the schema', () => {
    expect(() => deserializeScript({ debugIdentifier: 'x', blocks: [{ script: 'zz' }], scripts: {} })).toThrow(ZodError);
  });
});
