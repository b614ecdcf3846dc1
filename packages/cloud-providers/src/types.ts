/**
 * Shared types for the provisioning orchestrators.
 */

/** Log callback for streaming provisioning output */
export type LogCallback = (line: string) => void;

/** Pause between poll attempts; injected so tests need not wait */
export type SleepFn = (ms: number) => Promise<void>;

/** Millisecond clock used for uniqueness suffixes */
export type Clock = () => number;

/** Fixed-delay, bounded-attempt polling settings */
export interface PollSettings {
  delayMs: number;
  maxAttempts: number;
}

/** Per-call options for long-running operations */
export interface OperationOptions {
  /** Checked between poll attempts; an in-flight status read is never interrupted */
  signal?: AbortSignal;
}

/** Declared ingress ports */
export interface PortSet {
  tcp: number[];
  udp: number[];
}

/** Input to the security group resolver */
export interface SecurityGroupRequest {
  /** Base for generated group names */
  baseName: string;
  /** Existing group to reuse; only honoured together with `networkId` */
  securityGroupId?: string;
  /** Network the existing group must belong to */
  networkId?: string;
  ports: PortSet;
}

/** Everything needed for a single-instance launch */
export interface LaunchConfig {
  imageId: string;
  instanceType: string;
  subnetId: string;
  securityGroupIds: string[];
  /** Applied to both the instance and its volumes */
  tags: Record<string, string>;
}

/** Discards log output */
export const noopLog: LogCallback = () => {};
