import { StructuredScript } from '../src/core/structuredScript';
import { script } from '../src/frontend/builder';
import {
  BranchMismatchError,
  ControlFlowError,
  isValidFinalStateWithInputs,
  isValidFinalStateWithoutInputs,
  plainStackStatus,
  StackAnalyzer,
  StackStatus,
  UnanalyzableStackError,
} from '../src/stackAnalysis';
import { repeat } from './helpers/scripts';

function status(
  deepestStackAccessed: number,
  stackChanged: number,
  deepestAltstackAccessed = 0,
  altstackChanged = 0
): StackStatus {
  return { deepestStackAccessed, stackChanged, deepestAltstackAccessed, altstackChanged };
}

function inner1(): StructuredScript {
  return script('inner1', 10, 'ROLL', 2, 'ROLL', 'ADD');
}

function inner2(): StructuredScript {
  return script(
    'inner2',
    1, 'DUP', 'TOALTSTACK', 2, 'DUP', 'TOALTSTACK', 'GREATERTHAN',
    'IF', 'FROMALTSTACK', 'FROMALTSTACK', 'ADD',
    'ELSE', 'FROMALTSTACK', 'FROMALTSTACK', 'SUB',
    'ENDIF'
  );
}

describe('StackAnalyzer composition', () => {
  test('consecutive ADDs reach one slot deeper each', () => {
    expect(repeat('adds', 'ADD', 3).analyzeStack()).toEqual(status(-4, -3));
  });

  test('ROLL depth comes from the preceding small constant', () => {
    expect(inner1().analyzeStack()).toEqual(status(-11, -1));
  });

  test('sub-script effects compose onto the caller', () => {
    const sub = inner1();
    expect(script('outer', sub, sub, 'ADD').analyzeStack()).toEqual(status(-12, -3));
  });

  test('alt stack round trips inside balanced branches', () => {
    expect(inner2().analyzeStack()).toEqual(status(0, 1));
    const sub = inner2();
    expect(script('outer', sub, sub, 'ADD').analyzeStack()).toEqual(status(0, 1));
  });

  test('PICK reads n + 1 items below the constant', () => {
    expect(script('pick', 3, 'PICK').analyzeStack()).toEqual(status(-4, 1));
    expect(script('pick', 20, 'PICK').analyzeStack()).toEqual(status(-21, 1));
  });
});

describe('StackAnalyzer conditionals', () => {
  test('an IF without ELSE merges its access', () => {
    expect(script('cond', 1, 'IF', 120, 'ADD', 'ENDIF').analyzeStack()).toEqual(status(-1, 0));
  });

  test('IF and ELSE arms merge with the deepest access of both', () => {
    const s = script(
      'cond',
      'IF', 'FROMALTSTACK', 'SUB',
      'ELSE', 'FROMALTSTACK', 'FROMALTSTACK', 'ADD', 'TOALTSTACK',
      'ENDIF'
    );
    expect(s.analyzeStack()).toEqual(status(-2, -1, -2, -1));
  });

  test('arms with different net effects are rejected', () => {
    expect(() => script('bad', 'IF', 1, 'ELSE', 'ENDIF').analyzeStack()).toThrow(BranchMismatchError);
    expect(() => script('bad', 'IF', 1, 'ENDIF').analyzeStack()).toThrow(BranchMismatchError);
    expect(() => script('bad', 'IF', 'TOALTSTACK', 'ELSE', 'DROP', 'ENDIF').analyzeStack()).toThrow(BranchMismatchError);
  });

  test('unmatched control flow is rejected', () => {
    expect(() => script('bad', 'ENDIF').analyzeStack()).toThrow(ControlFlowError);
    expect(() => script('bad', 'ELSE').analyzeStack()).toThrow(ControlFlowError);
    expect(() => script('bad', 'IF').analyzeStack()).toThrow(ControlFlowError);
    expect(() => script('bad', 'IF', 'ELSE', 'ELSE', 'ENDIF').analyzeStack()).toThrow(ControlFlowError);
  });

  test('unbalanced sub-scripts close their conditionals in the caller', () => {
    const open = script('open', 'IF');
    const close = script('close', 'ENDIF');
    const root = script('root', 1, open, 5, 'DROP', close);
    expect(root.isConditionalBalanced()).toBe(true);
    expect(root.analyzeStack()).toEqual(status(0, 0));
  });
});

describe('StackAnalyzer alt stack', () => {
  test('moving from the alt stack', () => {
    expect(repeat('from', 'FROMALTSTACK', 3).analyzeStack()).toEqual(status(0, 3, -3, -3));
  });

  test('moving to the alt stack', () => {
    expect(repeat('to', 'TOALTSTACK', 3).analyzeStack()).toEqual(status(-3, -3, 0, 3));
  });
});

describe('StackAnalyzer failures', () => {
  test('PICK and ROLL need a known constant', () => {
    expect(() => script('dyn', 'DUP', 'PICK').analyzeStack()).toThrow(UnanalyzableStackError);
    expect(() => script('dyn', 3, 'DUP', 'ROLL').analyzeStack()).toThrow(UnanalyzableStackError);
    expect(() => script('dyn', 1001, 'PICK').analyzeStack()).toThrow(UnanalyzableStackError);
  });

  test('the debug marker is fatal', () => {
    expect(() => new StructuredScript('dbg').pushOpcode(0x50).analyzeStack()).toThrow(UnanalyzableStackError);
  });

  test('opcodes without a static effect are fatal', () => {
    expect(() => script('multisig', 'CHECKMULTISIG').analyzeStack()).toThrow(UnanalyzableStackError);
  });

  test('errors locate the instruction in the caller', () => {
    const bad = script('bad', 'ADD', 'PICK');
    const root = script('root', 'NOP', 'NOP', bad);
    let caught: unknown;
    try {
      root.analyzeStack();
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(UnanalyzableStackError);
    if (caught instanceof UnanalyzableStackError) {
      expect(caught.position).toBe(3);
      expect(caught.debugPath).toBe('root bad');
    }
  });
});

describe('stack hints', () => {
  test('an accurate hint matches the analysis', () => {
    const computed = script('adds', 'ADD', 'ADD').analyzeStack();
    const hinted = script('adds', 'ADD', 'ADD').addStackHint(-3, -2).analyzeStack();
    expect(hinted).toEqual(computed);
  });

  test('a hint stands in for an unanalyzable sub-script', () => {
    const dynamic = script('dynamic', 'DUP', 'PICK').addStackHint(-3, 0);
    expect(script('root', 'NOP', dynamic, 'ADD').analyzeStack()).toEqual(status(-3, -1));
  });

  test('alt stack hints leave the main stack alone', () => {
    expect(script('alt', 'TOALTSTACK', 'DROP').addAltstackHint(-1, -1).analyzeStack()).toEqual(status(0, 0, -1, -1));
  });
});

describe('resumable analysis', () => {
  test('the last constant carries over a resumed snapshot', () => {
    const analyzer = StackAnalyzer.resume({ status: plainStackStatus(0, 2), lastConstant: 1 });
    analyzer.feed(script('pick', 'PICK'));
    expect(analyzer.status()).toEqual(status(-1, 2));
  });

  test('snapshots are refused inside a conditional', () => {
    const analyzer = new StackAnalyzer();
    analyzer.feed(script('open', 'IF'));
    expect(analyzer.openConditionals()).toBe(1);
    expect(() => analyzer.snapshot()).toThrow(ControlFlowError);
    analyzer.feed(script('close', 'ENDIF'));
    expect(analyzer.snapshot()).toEqual({ status: status(-1, -1), lastConstant: null });
  });
});

describe('final state validators', () => {
  test('a single result without inputs', () => {
    expect(isValidFinalStateWithoutInputs(status(0, 1))).toBe(true);
    expect(isValidFinalStateWithoutInputs(status(-1, 1))).toBe(false);
    expect(isValidFinalStateWithoutInputs(status(0, 2))).toBe(false);
    expect(isValidFinalStateWithoutInputs(status(0, 1, -1, 0))).toBe(false);
  });

  test('inputs may be consumed but the alt stack must stay clean', () => {
    expect(isValidFinalStateWithInputs(status(-1, 1))).toBe(true);
    expect(isValidFinalStateWithInputs(status(-3, 1, 0, 1))).toBe(false);
    expect(isValidFinalStateWithInputs(status(-3, 1, -1, 0))).toBe(false);
  });
});
