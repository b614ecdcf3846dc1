export { sanitizeName, sanitizeAwsName } from "./sanitize";
