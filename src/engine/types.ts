/**
 * types.ts - Data types for the plan/dispatch engine
 *
 * These types flow through one invocation of any tool:
 * - The locator produces a ResourceIdentity
 * - The state provider produces a tool-specific current-state snapshot
 * - The plan builder compares it against the desired state through a
 *   PlanSpec (the tool's descriptor table) and produces a Plan
 * - The dispatcher executes Plan.minimal or serializes Plan.minimal/full
 */

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

export type ResourceKind =
  | "node-pool"
  | "instance"
  | "disk"
  | "workload-identity"
  | "project-iam";

/**
 * Structured identity of the resource a tool operates on.
 *
 * The field meanings shift slightly by kind (see createIdentity); all four
 * name fields are always non-empty.
 */
export interface ResourceIdentity {
  readonly kind: ResourceKind;
  /** GCP project id */
  readonly project: string;
  /** Region or zone; the namespace for workload identity; "global" for IAM */
  readonly location: string;
  /** Cluster, instance, Kubernetes SA, or project - whatever owns the target */
  readonly parent: string;
  /** The target resource name */
  readonly name: string;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

/**
 * A single CLI invocation. Arguments are kept as an array so execution never
 * goes through a shell and scripts can quote each argument exactly once.
 */
export interface Command {
  readonly program: string;
  readonly args: readonly string[];
}

/** Result of running a Command; mirrors the subprocess exit status. */
export interface CommandResult {
  output: string;
  isError: boolean;
}

/** Runs one command synchronously. Injectable so tests never spawn. */
export type CommandRunner = (command: Command) => CommandResult;

// ---------------------------------------------------------------------------
// Deltas
// ---------------------------------------------------------------------------

/**
 * How a field's current and desired values are compared.
 *
 * - exact: string equality (machine type, disk type, image type)
 * - set: equality of normalized string sets (labels, taints, locations)
 * - grow: numeric, desired must be strictly greater (disk size)
 * - presence: existence (service account, IAM binding, annotation)
 */
export type ComparatorKind = "exact" | "set" | "grow" | "presence";

export type FieldValue = string | number | boolean | readonly string[];

export interface FieldDelta {
  readonly field: string;
  readonly comparator: ComparatorKind;
  /** Undefined when the resource (or this attribute of it) does not exist */
  readonly current: FieldValue | undefined;
  /** Undefined when the operator kept the current value */
  readonly desired: FieldValue | undefined;
  readonly differs: boolean;
}

// ---------------------------------------------------------------------------
// Actions and plans
// ---------------------------------------------------------------------------

/**
 * Dependency tiers, in execution order. Creation precedes binding precedes
 * configuration and annotation; prepare/finalize bracket disruptive changes
 * (stopping and starting a VM) so accounts exist before the VM goes down.
 */
export const ACTION_TIERS = [
  "create",
  "bind",
  "prepare",
  "configure",
  "annotate",
  "finalize",
] as const;

export type ActionTier = (typeof ACTION_TIERS)[number];

/** required: current differs from desired. declarative: part of a full rebuild. */
export type ActionClassification = "required" | "declarative";

/** safe-repeat: re-running has no further effect. stateful: must not repeat. */
export type Idempotency = "safe-repeat" | "stateful";

/**
 * What a descriptor hands back for one action; the builder adds fields,
 * tier and classification.
 */
export interface ActionTemplate {
  description: string;
  command: Command;
  /**
   * Read-only probe that succeeds when the action is already satisfied.
   * Scripts render it as `guard || command`.
   */
  guard?: Command;
  /** Overrides the descriptor's idempotency for this action */
  idempotency?: Idempotency;
}

/** One command of a plan, ready to run or to emit */
export interface Action {
  readonly description: string;
  /** Fields this action reconciles; empty for bracket actions */
  readonly fields: readonly string[];
  readonly command: Command;
  /** Exits 0 when the step is already satisfied; the full script skips it then */
  readonly guard?: Command;
  readonly classification: ActionClassification;
  readonly idempotency: Idempotency;
  readonly tier: ActionTier;
}

export interface Diagnostic {
  readonly severity: "info" | "warning";
  readonly message: string;
  readonly field?: string;
}

/**
 * Output of buildPlan: the field deltas and the two action lists derived
 * from them. `minimal` is empty when nothing differs.
 */
export interface Plan {
  readonly identity: ResourceIdentity;
  readonly deltas: readonly FieldDelta[];
  /** REQUIRED actions only, in tier order */
  readonly minimal: readonly Action[];
  /** DECLARATIVE actions covering every tracked field, in tier order */
  readonly full: readonly Action[];
  readonly diagnostics: readonly Diagnostic[];
}

// ---------------------------------------------------------------------------
// Descriptor table
// ---------------------------------------------------------------------------

/** Which of the two emissions a template is being asked for */
export type PlanScope = "minimal" | "full";

export interface ActionContext<S> {
  readonly identity: ResourceIdentity;
  readonly current: S | undefined;
  readonly scope: PlanScope;
}

/**
 * One tracked field of a tool: where to read it, how to compare it, and what
 * to run to reconcile it. Tools declare a table of these instead of
 * scattering `if (changed) append flag` conditionals.
 *
 * A descriptor has either `action` (its own command) or `flags` (its share
 * of the PlanSpec's composite command).
 */
export interface FieldDescriptor<S, D> {
  readonly field: string;
  readonly comparator: ComparatorKind;
  /** Reads the current value; undefined when absent */
  readonly current: (state: S | undefined) => FieldValue | undefined;
  /** Reads the desired value; undefined means keep current */
  readonly desired: (desired: D) => FieldValue | undefined;
  readonly tier?: ActionTier;
  readonly idempotency?: Idempotency;
  /** Disruptive actions pull the PlanSpec's bracket actions into the plan */
  readonly disruptive?: boolean;
  readonly action?: (
    value: FieldValue,
    context: ActionContext<S>
  ) => ActionTemplate;
  readonly flags?: (value: FieldValue) => readonly string[];
}

/** A single recreation command assembled from every `flags` descriptor. */
export interface CompositeTemplate<S> {
  readonly tier: ActionTier;
  readonly idempotency: Idempotency;
  readonly build: (
    flags: readonly string[],
    context: ActionContext<S>
  ) => ActionTemplate;
}

export interface PlanSpec<S, D> {
  readonly fields: readonly FieldDescriptor<S, D>[];
  readonly composite?: CompositeTemplate<S>;
  /** Actions wrapped around disruptive changes (stop before, start after) */
  readonly bracket?: {
    readonly before: (context: ActionContext<S>) => readonly ActionTemplate[];
    readonly after: (context: ActionContext<S>) => readonly ActionTemplate[];
  };
  /** Tool-specific rules checked against the deltas before emission */
  readonly validate?: (deltas: readonly FieldDelta[]) => void;
  readonly diagnostics?: readonly Diagnostic[];
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

export const DISPATCH_MODES = ["execute", "emit-minimal", "emit-full"] as const;

export type DispatchMode = (typeof DISPATCH_MODES)[number];

export type ActionStatus = "succeeded" | "failed" | "not-attempted";

export interface ActionOutcome {
  readonly action: Action;
  readonly status: ActionStatus;
  readonly output?: string;
}
