export {
  type ObjectStore,
  type ObjectBody,
  InMemoryObjectStore,
  ObjectNotFoundError,
} from "./object-store";
export { S3ObjectStore } from "./s3-object-store";
