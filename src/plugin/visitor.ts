import type { NodePath, Visitors, types } from 'estree-toolkit';
import type { VFile } from 'vfile';
import type { ModelCallMatch, ResolveModelCall } from './call-resolver';
import type { PluginOptions } from './types';
import type { BuildTimeValidation } from '../architecture';

import { valueToEstree } from 'estree-util-value-to-estree';

import { isPlainObject } from '../guards';
import { classifyModelKind } from '../model-kind/classifier';
import { dumpModelKind } from '../model-kind/kinds';
import { isString } from '../utils/type-guards';
import { extractStaticValue } from './extractor';

/**
 * Processes a single matched declaration (see {@link BuildTimeValidation}).
 *
 * Pipeline overview
 * -----------------
 * 1. Extract
 *    - Decode the `kind` value into a plain JS value.
 *    - A dynamic value cannot be checked at build time: warn on the file and
 *      leave the declaration untouched.
 *
 * 2. Classify & Validate
 *    - Strings take the bare tag path, objects the mapping path; any other
 *      static value is classified by its text.
 *    - Failures throw `ConfigurationError` and abort the build.
 *
 * 3. Report
 *    - `onModelKind` receives the classified kind.
 *
 * 4. Apply
 *    - Replace the value with the canonical mapping (`dumpModelKind`).
 *
 * Control knobs
 * -------------
 * - `options.applyTransforms` toggles write-back (validation-only when false).
 */
function processModelCall(
  match: ModelCallMatch,
  options: PluginOptions,
  file: VFile
): void {
  const { calleeName, kindProperty } = match;
  const start = kindProperty.loc?.start;

  // 1. Extract
  const extracted = extractStaticValue(kindProperty.value);
  if (!extracted.success) {
    file.message(
      `Cannot check the kind of \`${calleeName}\`: the value is not static`,
      {
        ruleId: 'dynamic-kind',
        source: 'model-kinds',
        place: start ? { line: start.line, column: start.column + 1 } : undefined
      }
    );
    return;
  }

  // 2. Classify & Validate
  const { value } = extracted;
  const classifyOptions = { dialect: options.dialect };
  const kind =
    isString(value) || isPlainObject(value)
      ? classifyModelKind(value, classifyOptions)
      : classifyModelKind(String(value), classifyOptions);

  // 3. Report
  options.onModelKind?.(kind, { calleeName, line: start?.line });

  // 4. Apply
  if (options.applyTransforms ?? true) {
    kindProperty.value = valueToEstree(dumpModelKind(kind));
  }
}

/**
 * Visitor Factory
 * ----------------
 * Composes the declaration matcher and the processor.
 *
 * The matcher checks whether a visited CallExpression declares a model and,
 * on match, returns the `kind` property to process; non-matches are skipped.
 */
export function createModelKindVisitor(
  resolveModelCall: ResolveModelCall,
  options: PluginOptions,
  file: VFile
): Visitors<unknown> {
  return {
    CallExpression(path: NodePath<types.CallExpression>) {
      const match = resolveModelCall(path);
      if (!match) return;

      processModelCall(match, options, file);
    }
  };
}
