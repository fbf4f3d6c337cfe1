/**
 * console-url.ts - Turns operator input into resource identities
 *
 * Operators paste URLs straight from the Cloud Console, often through a
 * terminal that escapes them (`\?project\=...`). Every parser sanitizes
 * first, then extracts the fields; empty fields are reported all at once
 * by createIdentity before anything talks to gcloud.
 *
 * Accepted shapes:
 *   https://console.cloud.google.com/kubernetes/nodepool/<location>/<cluster>/<pool>?project=<project>
 *   https://console.cloud.google.com/compute/instancesDetail/zones/<zone>/instances/<vm>?project=<project>
 *   https://console.cloud.google.com/compute/disksDetail/zones/<zone>/disks/<disk>?project=<project>
 *   .../projects/<project>/zones/<zone>/instances/<vm>        (project in the path)
 *   PROJECT,NAMESPACE,GSA  or  PROJECT,NAMESPACE,KSA,GSA     (workload identity)
 */

import { ParseError } from "../errors";
import { createIdentity, type ResourceIdentity } from "../engine";

const NODE_POOL_URL_FORMAT =
  "Expected https://console.cloud.google.com/kubernetes/nodepool/<location>/<cluster>/<nodepool>?project=<project>";

const COMPUTE_URL_FORMAT =
  "Expected a Cloud Console URL containing zones/<zone>/instances/<name> or zones/<zone>/disks/<name>, " +
  "with the project as ?project=<project> or projects/<project>/ in the path";

const PRINCIPAL_PATTERN = /^(serviceAccount|user|group):.+$/;

/**
 * Removes shell-added backslashes and surrounding whitespace, then trims
 * trailing slashes.
 */
export function sanitizeUrl(url: string): string {
  return url.replace(/\\/g, "").trim().replace(/\/+$/, "");
}

/**
 * Project id from a `projects/<id>/` path segment, else from the
 * `project=` query parameter; "" when neither is present.
 */
export function projectFromUrl(url: string): string {
  const fromPath = /projects\/([^/?#&]+)\//.exec(url);
  if (fromPath) return fromPath[1];
  const fromQuery = /[?&]project=([^&?#]+)/.exec(url);
  return fromQuery ? fromQuery[1] : "";
}

// ---------------------------------------------------------------------------
// GKE node pools
// ---------------------------------------------------------------------------

/**
 * @throws MissingIdentityFieldError naming every field the URL lacks
 */
export function parseNodePoolUrl(url: string): ResourceIdentity {
  const clean = sanitizeUrl(url);
  const marker = "/kubernetes/nodepool/";
  const start = clean.indexOf(marker);
  const section = start === -1 ? "" : clean.slice(start + marker.length).split(/[?#]/)[0];
  const [location, cluster, pool] = section.split("/");

  return createIdentity(
    "node-pool",
    { project: projectFromUrl(clean), location, parent: cluster, name: pool },
    NODE_POOL_URL_FORMAT
  );
}

// ---------------------------------------------------------------------------
// Compute Engine instances and disks
// ---------------------------------------------------------------------------

export interface ComputeTarget {
  type: "instance" | "disk";
  project: string;
  zone: string;
  name: string;
}

/**
 * Parses an instance or disk URL.
 *
 * @throws ParseError when the URL matches neither pattern
 * @throws MissingIdentityFieldError when the project is missing
 */
export function parseComputeUrl(url: string): ComputeTarget {
  const clean = sanitizeUrl(url);
  const match = /zones\/([^/?#]+)\/(instances|disks)\/([^/?#]+)/.exec(clean);
  if (!match) {
    throw new ParseError(`Unrecognized Compute Engine URL "${clean}". ${COMPUTE_URL_FORMAT}`);
  }

  const [, zone, collection, name] = match;
  const type = collection === "instances" ? "instance" : "disk";
  // Validates the project (and the rest) the same way for both types
  const identity = createIdentity(
    type,
    { project: projectFromUrl(clean), location: zone, parent: name, name },
    COMPUTE_URL_FORMAT
  );
  return { type, project: identity.project, zone: identity.location, name: identity.name };
}

/**
 * Instance identity: an instance is its own parent.
 *
 * @throws ParseError for a disk URL or an unrecognized one
 */
export function parseInstanceUrl(url: string): ResourceIdentity {
  const target = parseComputeUrl(url);
  if (target.type !== "instance") {
    throw new ParseError(`Expected a VM instance URL, got a disk URL: ${sanitizeUrl(url)}`);
  }
  return createIdentity("instance", {
    project: target.project,
    location: target.zone,
    parent: target.name,
    name: target.name,
  });
}

// ---------------------------------------------------------------------------
// Workload identity
// ---------------------------------------------------------------------------

/**
 * Parses `PROJECT,NAMESPACE,GSA` or `PROJECT,NAMESPACE,KSA,GSA`.
 *
 * The Kubernetes service account defaults to the GSA's short name. The GSA
 * may be given as a short name or as its full
 * `NAME@PROJECT.iam.gserviceaccount.com` email.
 *
 * Identity: location = namespace, parent = KSA, name = GSA short name.
 */
export function parseWorkloadIdentityArg(arg: string): ResourceIdentity {
  const parts = arg.split(",").map((part) => part.trim());
  if (parts.length < 3 || parts.length > 4) {
    throw new ParseError(
      `Invalid workload identity argument "${arg}". Expected PROJECT,NAMESPACE,GSA or PROJECT,NAMESPACE,KSA,GSA`
    );
  }

  const [project, namespace, first, second = ""] = parts;
  const gsa = second || first;
  const ksa = second ? first : gsa;

  let gsaName = gsa;
  const at = gsa.indexOf("@");
  if (at !== -1) {
    const domain = `${project}.iam.gserviceaccount.com`;
    if (gsa.slice(at + 1) !== domain) {
      throw new ParseError(
        `GCP service account "${gsa}" does not belong to project ${project} (expected NAME@${domain})`
      );
    }
    gsaName = gsa.slice(0, at);
  }

  return createIdentity(
    "workload-identity",
    { project, location: namespace, parent: ksa, name: gsaName },
    "Expected PROJECT,NAMESPACE,GSA or PROJECT,NAMESPACE,KSA,GSA"
  );
}

// ---------------------------------------------------------------------------
// IAM principals
// ---------------------------------------------------------------------------

/**
 * @throws ParseError unless the value is `user:`, `group:` or
 *   `serviceAccount:` followed by an identifier
 */
export function parsePrincipal(value: string): string {
  const principal = value.trim();
  if (!PRINCIPAL_PATTERN.test(principal)) {
    throw new ParseError(
      `Invalid principal "${value}". Expected user:EMAIL, group:EMAIL or serviceAccount:EMAIL`
    );
  }
  return principal;
}
