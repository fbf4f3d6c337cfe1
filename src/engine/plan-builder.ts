/**
 * plan-builder.ts - Turns current + desired state into a Plan
 *
 * The builder knows nothing about node pools, disks or IAM. Each tool hands
 * it a PlanSpec: a table of field descriptors saying where each tracked field
 * lives in the current snapshot and in the desired state, how to compare it,
 * and which command reconciles it. The builder walks that table once.
 *
 * Two emissions per field, independent of each other:
 * - minimal: a REQUIRED action when the field's delta differs
 * - full: a DECLARATIVE action whenever the field has a value at all
 *   (desired, or current when kept), so a full script rebuilds everything
 *
 * Actions are then bucketed by dependency tier (create → bind → prepare →
 * configure → annotate → finalize). The bucketing is explicit: a binding
 * can never land before the account it references, whatever order the
 * descriptors were declared in.
 */

import { fieldDiffers } from "./comparators";
import {
  ACTION_TIERS,
  type Action,
  type ActionClassification,
  type ActionContext,
  type ActionTemplate,
  type ActionTier,
  type FieldDelta,
  type FieldDescriptor,
  type FieldValue,
  type Idempotency,
  type Plan,
  type PlanScope,
  type PlanSpec,
  type ResourceIdentity,
} from "./types";

const DEFAULT_TIER: ActionTier = "configure";
const DEFAULT_IDEMPOTENCY: Idempotency = "safe-repeat";

// ---------------------------------------------------------------------------
// Deltas
// ---------------------------------------------------------------------------

/**
 * Computes one FieldDelta per descriptor.
 *
 * @throws InvalidResizeError when a grow field's desired value is not larger
 */
export function computeDeltas<S, D>(
  spec: PlanSpec<S, D>,
  current: S | undefined,
  desired: D
): FieldDelta[] {
  return spec.fields.map((descriptor) => {
    const currentValue = descriptor.current(current);
    const desiredValue = descriptor.desired(desired);
    return {
      field: descriptor.field,
      comparator: descriptor.comparator,
      current: currentValue,
      desired: desiredValue,
      differs: fieldDiffers(
        descriptor.comparator,
        descriptor.field,
        currentValue,
        desiredValue
      ),
    };
  });
}

/** The value a field should end up with: desired, or current when kept. */
function resolvedValue(delta: FieldDelta): FieldValue | undefined {
  return delta.desired ?? delta.current;
}

// ---------------------------------------------------------------------------
// Emission
// ---------------------------------------------------------------------------

function toAction(
  template: ActionTemplate,
  fields: readonly string[],
  tier: ActionTier,
  idempotency: Idempotency,
  classification: ActionClassification
): Action {
  return {
    description: template.description,
    fields,
    command: template.command,
    ...(template.guard ? { guard: template.guard } : {}),
    classification,
    idempotency: template.idempotency ?? idempotency,
    tier,
  };
}

/**
 * Emits the actions for one scope. `include` decides per delta whether its
 * field takes part: differs for minimal, has-a-value for full.
 */
function emit<S, D>(
  spec: PlanSpec<S, D>,
  deltas: readonly FieldDelta[],
  context: ActionContext<S>,
  include: (delta: FieldDelta) => boolean
): Action[] {
  const classification: ActionClassification =
    context.scope === "minimal" ? "required" : "declarative";
  const actions: Action[] = [];
  let disruptive = false;

  // Per-field actions
  spec.fields.forEach((descriptor: FieldDescriptor<S, D>, i) => {
    const delta = deltas[i];
    const value = resolvedValue(delta);
    if (!descriptor.action || value === undefined || !include(delta)) return;

    actions.push(
      toAction(
        descriptor.action(value, context),
        [descriptor.field],
        descriptor.tier ?? DEFAULT_TIER,
        descriptor.idempotency ?? DEFAULT_IDEMPOTENCY,
        classification
      )
    );
    if (descriptor.disruptive) disruptive = true;
  });

  // Composite recreation command: one action carrying every field's flags
  if (spec.composite) {
    const composite = spec.composite;
    const parts = spec.fields
      .map((descriptor, i) => ({ descriptor, delta: deltas[i] }))
      .filter(({ descriptor }) => descriptor.flags !== undefined);

    if (parts.some(({ delta }) => include(delta))) {
      const flags: string[] = [];
      const fields: string[] = [];
      for (const { descriptor, delta } of parts) {
        const value = resolvedValue(delta);
        if (value === undefined || !descriptor.flags) continue;
        const contributed = descriptor.flags(value);
        if (contributed.length === 0) continue;
        flags.push(...contributed);
        fields.push(descriptor.field);
      }
      actions.push(
        toAction(
          composite.build(flags, context),
          fields,
          composite.tier,
          composite.idempotency,
          classification
        )
      );
    }
  }

  // Bracket actions around disruptive changes
  if (disruptive && spec.bracket) {
    for (const template of spec.bracket.before(context)) {
      actions.push(toAction(template, [], "prepare", DEFAULT_IDEMPOTENCY, classification));
    }
    for (const template of spec.bracket.after(context)) {
      actions.push(toAction(template, [], "finalize", DEFAULT_IDEMPOTENCY, classification));
    }
  }

  return orderByTier(actions);
}

/**
 * Buckets actions by tier in ACTION_TIERS order, keeping declaration order
 * inside each bucket.
 */
export function orderByTier(actions: readonly Action[]): Action[] {
  return ACTION_TIERS.flatMap((tier) =>
    actions.filter((action) => action.tier === tier)
  );
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

/**
 * Builds the minimal and full plans for one resource.
 *
 * @param identity - Parsed, validated resource identity
 * @param current - Current-state snapshot, undefined when the resource does not exist yet
 * @param desired - Operator's desired state; omitted fields keep their current value
 * @param spec - The tool's descriptor table
 * @throws InvalidResizeError / ValidationError before any action is emitted
 */
export function buildPlan<S, D>(
  identity: ResourceIdentity,
  current: S | undefined,
  desired: D,
  spec: PlanSpec<S, D>
): Plan {
  const deltas = computeDeltas(spec, current, desired);
  spec.validate?.(deltas);

  const contextFor = (scope: PlanScope): ActionContext<S> => ({
    identity,
    current,
    scope,
  });

  return {
    identity,
    deltas,
    minimal: emit(spec, deltas, contextFor("minimal"), (delta) => delta.differs),
    full: emit(
      spec,
      deltas,
      contextFor("full"),
      (delta) => resolvedValue(delta) !== undefined
    ),
    diagnostics: spec.diagnostics ?? [],
  };
}
