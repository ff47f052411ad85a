import type { Plugin, Transformer } from 'unified';
import type { Program } from 'estree';
import { is, traverse } from 'estree-toolkit';

import type { PluginOptions } from './types';
import { createModelCallResolver } from './call-resolver';
import { createModelKindVisitor } from './visitor';

export type { ModelKindCallsite, PluginOptions } from './types';

/**
 * Validates (and canonicalizes) the kinds declared in JavaScript model files.
 *
 * @example
 * ```ts
 * unified().use(recmaModelKinds, { callees: ['defineModel'] });
 * // defineModel({ kind: 'full' }) -> defineModel({ kind: { name: 'FULL' } })
 * ```
 */
export const recmaModelKinds: Plugin<[PluginOptions?], Program> = (
  options = {}
) => {
  // 1. Create the declaration matcher.
  //    Contract: returns a `ModelCallMatch` for calls to a configured callee
  //    whose first argument has a static kind key; otherwise `null`.
  const resolveModelCall = createModelCallResolver(
    options.callees ?? ['defineModel'],
    options.kindKey ?? 'kind'
  );

  // 2. Return the unified transformer.
  //    The visitor is created per file: dynamic kinds are reported on it.
  const transformer: Transformer<Program> = (tree, file) => {
    if (!is.program(tree)) return;
    traverse(tree, createModelKindVisitor(resolveModelCall, options, file));
  };

  return transformer;
};
