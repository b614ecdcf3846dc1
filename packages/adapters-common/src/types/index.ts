export type {
  Instance,
  InstanceStatus,
  MachineImage,
  ImageSummary,
  ImportTask,
  ImportTaskStatus,
} from "./compute";
export type {
  Network,
  Subnet,
  IngressProtocol,
  IngressRule,
  SecurityPolicy,
} from "./network";
export type { BlobRef } from "./storage";
