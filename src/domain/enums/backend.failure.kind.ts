export const BackendFailureKinds = [
  "IndexEmpty", // the index holds no vectors, so it has no dimension to match yet
  "DimensionMismatch", // query vector length differs from the index dimension
  "Validation",
  "AccessDenied",
  "NotFound",
  "Throttled",
  "Unavailable",
  "Unknown",
] as const;

export type BackendFailureKind = typeof BackendFailureKinds[number];
