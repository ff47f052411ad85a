import type { ModelKind } from '../model-kind/kinds';

/**
 * Context passed to {@link PluginOptions.onModelKind}.
 */
export type ModelKindCallsite = {
  /**
   * Name of the matched declaration function (`'defineModel'`).
   */
  calleeName: string;

  /**
   * 1-based source line of the `kind` property, when the parser recorded
   * locations.
   */
  line?: number;
};

export type PluginOptions = {
  /**
   * Names of the functions that declare models. A call matches by its
   * callee name, plain (`defineModel(...)`) or as a member
   * (`models.defineModel(...)`).
   *
   * @default ['defineModel']
   */
  callees?: readonly string[];

  /**
   * Key of the kind in the declaration object.
   *
   * @default 'kind'
   */
  kindKey?: string;

  /**
   * Controls whether classified kinds are written back to the compiled output.
   *
   * - `true`: Replaces the kind value with its canonical mapping
   *   (Transpiler Mode).
   * - `false`: Classifies and validates only (Linter / Dry-Run Mode).
   *
   * Scenario: Canonical Form
   * - Source: `kind: 'view'`
   * - `true`:  Updates AST to `kind: { name: 'VIEW' }`.
   * - `false`: Leaves AST as `kind: 'view'` (throws if classification fails).
   *
   * @default true
   */
  applyTransforms?: boolean;

  /**
   * Dialect the time column formats of the processed files are written in.
   *
   * @default '' (canonical strftime notation)
   */
  dialect?: string;

  /**
   * Called with every classified kind, in source order.
   */
  onModelKind?: (kind: ModelKind, callsite: ModelKindCallsite) => void;
};
