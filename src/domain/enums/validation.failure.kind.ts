export const ValidationFailureKinds = [
  "NotFound",
  "InvalidPath",
  "Empty",
  "SizeExceeded",
  "BlockedExtension",
  "DisallowedType",
  "BatchTooLarge",
] as const;

export type ValidationFailureKind = typeof ValidationFailureKinds[number];
