/**
 * disk-expand - Grow a persistent disk and, optionally, its filesystem
 *
 * Accepts either a disk URL or an instance URL. From an instance, the
 * attached zonal disks are listed and one is selected; from a disk, the
 * attached VM is read from the disk's `users`.
 *
 * Resizing only grows the block device. Growing the partition and the
 * filesystem happens inside the VM, over `gcloud compute ssh`, with
 * assets/expand-filesystem.sh.
 */

import { readFileSync } from "fs";
import { join } from "path";
import { quote } from "shell-quote";
import { z } from "zod";
import { ParseError, ValidationError } from "../errors";
import {
  buildPlan,
  createIdentity,
  type Diagnostic,
  type PlanSpec,
  type ToolDefinition,
  type ToolServices,
} from "../engine";
import { parseComputeUrl } from "../locator/console-url";
import { describeDiskCommand, type ZonalRef } from "../state/commands";
import { lastSegment, type Disk } from "../state/schemas";
import { valueGuard } from "../utils/shell";
import { presetOrAsk, requireFound } from "./common";

export const diskExpandInputSchema = z.object({
  url: z.string().min(1).describe("Cloud Console URL of the disk or of the VM it is attached to"),
  disk: z
    .string()
    .optional()
    .describe("Disk name or index, when the URL is a VM with several disks"),
  size: z.string().optional().describe("New size in GB; prompted for when omitted"),
  expandFilesystem: z
    .boolean()
    .optional()
    .describe("Grow the partition and filesystem inside the VM after resizing"),
});

export type DiskExpandInput = z.infer<typeof diskExpandInputSchema>;

export const diskExpandDescription =
  "Grow a persistent disk and optionally the filesystem inside the VM it is attached to";

/** A disk the operator can pick, with where it is attached */
export interface DiskCandidate {
  project: string;
  zone: string;
  disk: Disk;
  /** Name of the attached VM */
  instance?: string;
  /** Device name inside the VM (/dev/disk/by-id/google-<deviceName>) */
  deviceName?: string;
  index?: number;
  boot?: boolean;
}

export interface DiskExpandDesired {
  candidate: DiskCandidate;
  sizeGb: string;
  expandFilesystem: boolean;
}

const ZONAL_DISK_URL = /projects\/([^/]+)\/zones\/([^/]+)\/disks\/([^/]+)$/;

const SCRIPT_PATH = join(__dirname, "..", "..", "assets", "expand-filesystem.sh");

let remoteScript: string | undefined;

/** The filesystem growth script, without its shebang line */
export function loadExpandScript(): string {
  remoteScript ??= readFileSync(SCRIPT_PATH, "utf-8").replace(/^#!.*\n/, "");
  return remoteScript;
}

function diskRef(candidate: DiskCandidate): ZonalRef {
  return { project: candidate.project, zone: candidate.zone, name: candidate.disk.name };
}

/**
 * Resize, then optionally grow the partition and filesystem over SSH.
 *
 * Disks only grow: a size not above the current one is an
 * InvalidResizeError. Filesystem growth needs an attached VM; without one
 * the plan carries a warning instead.
 */
export function diskExpandSpec(desired: DiskExpandDesired): PlanSpec<DiskCandidate, DiskExpandDesired> {
  const { candidate } = desired;
  const diagnostics: Diagnostic[] = [];
  if (desired.expandFilesystem && !candidate.instance) {
    diagnostics.push({
      severity: "warning",
      field: "filesystem",
      message: `Disk ${candidate.disk.name} is not attached to a VM; only the disk is resized`,
    });
  }

  return {
    fields: [
      {
        field: "sizeGb",
        comparator: "grow",
        current: (state) => state?.disk.sizeGb,
        desired: (d) => d.sizeGb,
        idempotency: "stateful",
        action: (value) => ({
          description: `Resize disk ${candidate.disk.name} to ${value}GB`,
          command: {
            program: "gcloud",
            args: [
              "compute", "disks", "resize", candidate.disk.name,
              "--size", `${value}GB`,
              "--zone", candidate.zone,
              "--project", candidate.project,
              "--quiet",
            ],
          },
          guard: valueGuard(describeDiskCommand(diskRef(candidate), "value(sizeGb)"), "-ge", String(value)),
        }),
      },
      {
        field: "filesystem",
        comparator: "presence",
        // Nothing reports whether the filesystem already fills the disk
        current: () => undefined,
        desired: (d) => (d.expandFilesystem && candidate.instance ? true : undefined),
        tier: "finalize",
        action: () => ({
          description: `Grow the filesystem of ${candidate.disk.name} on VM ${candidate.instance}`,
          command: {
            program: "gcloud",
            args: [
              "compute", "ssh", candidate.instance ?? candidate.disk.name,
              "--zone", candidate.zone,
              "--project", candidate.project,
              "--command",
              quote([
                "bash", "-c", loadExpandScript(),
                "expand-filesystem", candidate.deviceName ?? candidate.disk.name,
              ]),
            ],
          },
        }),
      },
    ],
    diagnostics,
  };
}

// ---------------------------------------------------------------------------
// Fetch
// ---------------------------------------------------------------------------

function fetchFromDisk(
  ref: ZonalRef,
  services: ToolServices
): DiskCandidate[] {
  const disk = requireFound(
    services.state.describeDisk(ref),
    `Disk ${ref.name} not found in zone ${ref.zone} of project ${ref.project}`
  );
  const candidate: DiskCandidate = { project: ref.project, zone: ref.zone, disk };

  const user = disk.users?.[0];
  if (!user) return [candidate];

  const instance = lastSegment(user);
  const vm = services.state.describeInstance({ ...ref, name: instance });
  const attachment = vm.found
    ? vm.value.disks?.find((entry) => lastSegment(entry.source) === disk.name)
    : undefined;

  return [
    {
      ...candidate,
      instance,
      deviceName: attachment?.deviceName,
      index: attachment?.index,
      boot: attachment?.boot,
    },
  ];
}

function fetchFromInstance(ref: ZonalRef, services: ToolServices): DiskCandidate[] {
  const instance = requireFound(
    services.state.describeInstance(ref),
    `VM ${ref.name} not found in zone ${ref.zone} of project ${ref.project}`
  );

  const candidates: DiskCandidate[] = [];
  for (const attached of instance.disks ?? []) {
    const match = ZONAL_DISK_URL.exec(attached.source);
    if (!match) continue; // regional disks
    const [, project, zone, name] = match;
    const disk = requireFound(
      services.state.describeDisk({ project, zone, name }),
      `Disk ${name} attached to VM ${ref.name} not found`
    );
    candidates.push({
      project,
      zone,
      disk,
      instance: instance.name,
      deviceName: attached.deviceName,
      index: attached.index,
      boot: attached.boot,
    });
  }

  if (candidates.length === 0) {
    throw new ValidationError(`VM ${ref.name} has no zonal persistent disks attached`);
  }
  return candidates;
}

// ---------------------------------------------------------------------------
// Resolve
// ---------------------------------------------------------------------------

function candidateLabel(candidate: DiskCandidate): string {
  const parts = [`${candidate.disk.name}`, `${candidate.disk.sizeGb}GB`];
  if (candidate.disk.type) parts.push(lastSegment(candidate.disk.type));
  if (candidate.boot) parts.push("boot");
  return parts.join(", ");
}

/**
 * Picks the disk to grow: the only candidate, the one named (or indexed)
 * by `--disk`, or the operator's choice.
 *
 * @throws ParseError when `--disk` matches no attached disk
 */
export async function selectDisk(
  candidates: readonly DiskCandidate[],
  preset: string | undefined,
  services: ToolServices
): Promise<DiskCandidate> {
  const wanted = preset?.trim();
  if (wanted) {
    const found = candidates.find(
      (c) => c.disk.name === wanted || (c.index !== undefined && String(c.index) === wanted)
    );
    if (!found) {
      const names = candidates.map((c) => c.disk.name).join(", ");
      throw new ParseError(`Disk "${wanted}" is not attached. Attached disks: ${names}`);
    }
    return found;
  }

  if (candidates.length === 1) return candidates[0];

  const name = await services.decisions.choose(
    "Disk to expand",
    "--disk",
    candidates.map((c) => ({ value: c.disk.name, name: candidateLabel(c) }))
  );
  const chosen = candidates.find((c) => c.disk.name === name);
  if (!chosen) throw new ParseError(`Disk "${name}" is not attached`);
  return chosen;
}

/**
 * `disk-expand <url>`: the URL names a disk or a VM. For a VM, the operator
 * picks one of its attached disks (`--disk` to preset).
 */
export const diskExpandTool: ToolDefinition<DiskExpandInput, DiskCandidate[], DiskExpandDesired> = {
  name: "disk-expand",

  locate: (input) => {
    const target = parseComputeUrl(input.url);
    return createIdentity(target.type, {
      project: target.project,
      location: target.zone,
      parent: target.name,
      name: target.name,
    });
  },

  fetch: (_input, identity, services) => {
    const ref: ZonalRef = { project: identity.project, zone: identity.location, name: identity.name };
    return identity.kind === "disk" ? fetchFromDisk(ref, services) : fetchFromInstance(ref, services);
  },

  describe: (candidates) =>
    candidates.map(
      (c) =>
        `  ${c.index ?? "-"}: ${candidateLabel(c)}${c.instance ? ` (attached to ${c.instance})` : " (not attached)"}`
    ),

  resolve: async (input, _identity, candidates, services) => {
    const candidate = await selectDisk(candidates, input.disk, services);

    const sizeGb = await presetOrAsk(
      services,
      input.size,
      `New size of ${candidate.disk.name} in GB (current: ${candidate.disk.sizeGb})`,
      "--size"
    );
    if (sizeGb === undefined) return undefined;

    const expandFilesystem = candidate.instance
      ? input.expandFilesystem ??
        (await services.decisions.confirm(
          `Grow the filesystem on VM ${candidate.instance} after resizing?`,
          "--expand-filesystem",
          true
        ))
      : input.expandFilesystem === true;

    return { candidate, sizeGb, expandFilesystem };
  },

  plan: (_identity, _candidates, desired) => {
    const { candidate } = desired;
    const identity = createIdentity("disk", {
      project: candidate.project,
      location: candidate.zone,
      parent: candidate.instance ?? candidate.disk.name,
      name: candidate.disk.name,
    });
    return buildPlan(identity, candidate, desired, diskExpandSpec(desired));
  },
};
