export * from "./provisioner-config";
export * from "./provision-request";
