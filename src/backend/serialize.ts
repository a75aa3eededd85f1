import { z } from "zod";
import type { ScriptHash } from "../core/block";
import { StructuredScript } from "../core/structuredScript";
import type { StackStatus } from "../stackAnalysis";
import { InternalConsistencyError } from "./compiler";

const hexSchema = z.string().regex(/^(?:[0-9a-f]{2})*$/);

const hashSchema = z.string().regex(/^[0-9a-f]{64}$/);

const stackStatusSchema = z.object({
  deepestStackAccessed: z.number().int().max(0),
  stackChanged: z.number().int(),
  deepestAltstackAccessed: z.number().int().max(0),
  altstackChanged: z.number().int(),
});

const blockSchema = z.union([
  z.object({ call: hashSchema }).strict(),
  z.object({ script: hexSchema }).strict(),
]);

const fragmentSchema = z.object({
  debugIdentifier: z.string(),
  blocks: z.array(blockSchema),
  stackHint: stackStatusSchema.optional(),
});

const serializedScriptSchema = fragmentSchema.extend({
  scripts: z.record(hashSchema, fragmentSchema),
});

export type SerializedBlock = z.infer<typeof blockSchema>;

export type SerializedFragment = z.infer<typeof fragmentSchema>;

export type SerializedScript = z.infer<typeof serializedScriptSchema>;

function serializeFragment(script: StructuredScript): SerializedFragment {
  const fragment: SerializedFragment = {
    debugIdentifier: script.debugIdentifier,
    blocks: script.blocks.map((block): SerializedBlock =>
      block.kind == "call" ? { call: block.hash } : { script: block.buf.bytes().toString("hex") }
    ),
  };
  const hint = script.stackHint();
  if (hint) fragment.stackHint = hint;
  return fragment;
}

/**
 * Structural form of a script: its own blocks plus every sub-script it reaches,
 * keyed by content hash. Literal runs are hex encoded.
 */
export function serializeScript(script: StructuredScript): SerializedScript {
  const scripts: Record<ScriptHash, SerializedFragment> = {};
  for (const [hash, sub] of script.subScripts()) {
    scripts[hash] = serializeFragment(sub);
  }
  return { ...serializeFragment(script), scripts };
}

function rebuild(fragment: SerializedFragment, built: ReadonlyMap<ScriptHash, StructuredScript>): StructuredScript {
  const script = new StructuredScript(fragment.debugIdentifier);
  if (fragment.stackHint) {
    applyHint(script, fragment.stackHint);
  }
  for (const block of fragment.blocks) {
    if ("call" in block) {
      const sub = built.get(block.call);
      if (!sub) throw new InternalConsistencyError(`Sub-script ${block.call} was not rebuilt before its caller`);
      script.pushEnvScript(sub);
    } else {
      script.pushScript(Buffer.from(block.script, "hex"));
    }
  }
  return script;
}

function applyHint(script: StructuredScript, hint: StackStatus) {
  script
    .addStackHint(hint.deepestStackAccessed, hint.stackChanged)
    .addAltstackHint(hint.deepestAltstackAccessed, hint.altstackChanged);
}

function callees(fragment: SerializedFragment): ScriptHash[] {
  const out: ScriptHash[] = [];
  for (const block of fragment.blocks) {
    if ("call" in block) out.push(block.call);
  }
  return out;
}

/**
 * Rebuilds a script from `serializeScript` output, callees before callers.
 * Every rebuilt sub-script must hash to the key it was stored under.
 */
export function deserializeScript(json: unknown): StructuredScript {
  const parsed = serializedScriptSchema.parse(json);
  const fragments = new Map<ScriptHash, SerializedFragment>(Object.entries(parsed.scripts));
  const built = new Map<ScriptHash, StructuredScript>();
  const inProgress = new Set<ScriptHash>();

  const stack: Array<{ hash: ScriptHash; expanded: boolean }> = callees(parsed)
    .reverse()
    .map((hash) => ({ hash, expanded: false }));
  while (stack.length > 0) {
    const top = stack.pop();
    if (!top || built.has(top.hash)) continue;
    const fragment = fragments.get(top.hash);
    if (!fragment) {
      throw new InternalConsistencyError(`Serialized script calls unknown sub-script ${top.hash}`);
    }
    if (top.expanded) {
      const script = rebuild(fragment, built);
      const hash = script.hash();
      if (hash != top.hash) {
        throw new InternalConsistencyError(`Sub-script stored as ${top.hash} rebuilds to ${hash}`);
      }
      built.set(hash, script);
      inProgress.delete(hash);
      continue;
    }
    if (inProgress.has(top.hash)) {
      throw new InternalConsistencyError(`Sub-script ${top.hash} calls itself`);
    }
    inProgress.add(top.hash);
    stack.push({ hash: top.hash, expanded: true });
    for (const callee of callees(fragment).reverse()) {
      if (!built.has(callee)) stack.push({ hash: callee, expanded: false });
    }
  }
  return rebuild(parsed, built);
}
