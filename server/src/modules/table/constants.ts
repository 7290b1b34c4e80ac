// Runtime constants for table instances

export const TABLE_CONSTANTS = {
  // Persistence
  COMMIT_ATTEMPTS: 2,   // first try plus one reload-recompute retry

  // Table ids
  TABLE_ID_LENGTH: 12,
} as const;
