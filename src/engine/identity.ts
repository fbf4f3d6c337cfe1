import { MissingIdentityFieldError } from "../errors";
import type { ResourceIdentity, ResourceKind } from "./types";

const IDENTITY_FIELDS = ["project", "location", "parent", "name"] as const;

/**
 * Builds an immutable ResourceIdentity, trimming each field.
 *
 * Every field must be non-empty before any state fetch is attempted; the
 * error lists all empty fields at once so the operator can fix the input in
 * one go.
 *
 * @param detail - Appended to the error, typically the expected input format
 * @throws MissingIdentityFieldError
 */
export function createIdentity(
  kind: ResourceKind,
  fields: {
    project?: string;
    location?: string;
    parent?: string;
    name?: string;
  },
  detail?: string
): ResourceIdentity {
  const trimmed = {
    project: fields.project?.trim() ?? "",
    location: fields.location?.trim() ?? "",
    parent: fields.parent?.trim() ?? "",
    name: fields.name?.trim() ?? "",
  };

  const missing = IDENTITY_FIELDS.filter((key) => trimmed[key].length === 0);
  if (missing.length > 0) {
    throw new MissingIdentityFieldError(missing, detail);
  }

  return Object.freeze({ kind, ...trimmed });
}

/**
 * One-line label for progress output, e.g.
 * "node-pool pool-a (cluster prod-cluster, us-central1, project my-project)".
 */
export function describeIdentity(identity: ResourceIdentity): string {
  const owner =
    identity.parent === identity.name ? "" : `${identity.parent}, `;
  return `${identity.kind} ${identity.name} (${owner}${identity.location}, project ${identity.project})`;
}
