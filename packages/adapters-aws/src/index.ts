// EC2
export { EC2Service, mapInstance } from "./ec2/ec2-service";
export { EC2ImageService } from "./ec2/ec2-image-service";

// S3
export { S3StorageService } from "./s3/s3-storage-service";

// Route 53
export { Route53DnsService, apexZoneName } from "./route53/route53-dns-service";

// Errors
export {
  classifyAwsError,
  withAwsErrors,
  getAwsErrorName,
  isAwsNotFound,
  isAwsDuplicate,
} from "./errors/aws-error-classifier";

export interface AWSConfig {
  region: string;
  credentials?: { accessKeyId: string; secretAccessKey: string };
}
