/**
 * Tools - One ToolDefinition per subcommand
 *
 * Each module exports the tool, the zod schema of its input, and a one-line
 * description used as the subcommand's help text.
 *
 * Usage:
 *   import { vmMachineTypeTool, vmMachineTypeInputSchema } from "./tools";
 */

export {
  nodePoolCloneTool,
  nodePoolCloneInputSchema,
  nodePoolCloneDescription,
  type NodePoolCloneInput,
} from "./node-pool-clone";

export {
  nodePoolUpdateTool,
  nodePoolUpdateInputSchema,
  nodePoolUpdateDescription,
  type NodePoolUpdateInput,
} from "./node-pool-update";

export {
  workloadIdentityTool,
  workloadIdentityInputSchema,
  workloadIdentityDescription,
  type WorkloadIdentityInput,
} from "./workload-identity";

export {
  vmMachineTypeTool,
  vmMachineTypeInputSchema,
  vmMachineTypeDescription,
  type VmMachineTypeInput,
} from "./vm-machine-type";

export {
  vmServiceAccountTool,
  vmServiceAccountInputSchema,
  vmServiceAccountDescription,
  type VmServiceAccountInput,
} from "./vm-service-account";

export {
  diskExpandTool,
  diskExpandInputSchema,
  diskExpandDescription,
  type DiskExpandInput,
} from "./disk-expand";

export {
  iamReplicateTool,
  iamReplicateInputSchema,
  iamReplicateDescription,
  type IamReplicateInput,
} from "./iam-replicate";

export {
  iamApplyTool,
  iamApplyInputSchema,
  iamApplyDescription,
  type IamApplyInput,
} from "./iam-apply";

export { parseToolInput } from "./common";
