/**
 * Default values for provisioning.
 */

export const DEFAULT_REGION = "us-east-1";

/** Smallest general-purpose class; used when a request names none */
export const DEFAULT_INSTANCE_TYPE = "t2.micro";

export const DEFAULT_DNS_TTL_SECONDS = 300;

/** Source range for generated ingress rules */
export const ANY_IPV4_CIDR = "0.0.0.0/0";

// Image registration
export const ROOT_DEVICE_NAME = "/dev/sda1";
export const ROOT_VOLUME_TYPE = "gp2";
export const IMAGE_ARCHITECTURE = "x86_64";
export const IMAGE_DISK_FORMAT = "raw";
