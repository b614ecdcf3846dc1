export * from "./provider-utils";
export * from "./polling";
