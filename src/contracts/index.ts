export type {
  MediaKind,
  BoundingBox,
  BlobBackend,
  BlobRef,
  ExampleRecord,
  ExampleStatus,
  NewExample,
  IngestJob,
  MediaUrls,
} from "./types";
