export type { IComputeService } from "./compute-service";
export type { IImageService } from "./image-service";
export type { IBlobStorageService } from "./storage-service";
export type { IDnsService } from "./dns-service";
