/**
 * engine/index.ts - Public API of the plan/dispatch engine
 *
 * Tools import from here, never from the individual engine files.
 *
 * Usage:
 *   import { buildPlan, createIdentity, type PlanSpec } from "../engine";
 */

export type {
  Action,
  ActionContext,
  ActionOutcome,
  ActionTemplate,
  ActionTier,
  Command,
  CommandResult,
  CommandRunner,
  ComparatorKind,
  Diagnostic,
  DispatchMode,
  FieldDelta,
  FieldDescriptor,
  FieldValue,
  Plan,
  PlanScope,
  PlanSpec,
  ResourceIdentity,
  ResourceKind,
} from "./types";
export { ACTION_TIERS, DISPATCH_MODES } from "./types";

export { createIdentity, describeIdentity } from "./identity";

export {
  fieldDiffers,
  formatFieldValue,
  formatLabels,
  formatTaint,
  normalizeSet,
  normalizeTaintEffect,
  normalizeTaintString,
  parseWholeNumber,
  splitList,
  withoutReservedLabels,
} from "./comparators";

export { buildPlan, computeDeltas, orderByTier } from "./plan-builder";

export { renderScript, scriptFileName } from "./script";

export { dispatch, type DispatchOptions, type DispatchResult } from "./dispatcher";

export {
  runTool,
  type RunOptions,
  type RunOutcome,
  type RunPhase,
  type ToolDefinition,
  type ToolServices,
} from "./runner";
