export const FRAMING_CONSTANTS = {
  MAGIC: 'MRLY',
  MAGIC_LENGTH: 4,
  LENGTH_FIELD_SIZE: 4,
  HEADER_LENGTH: 8,
  MAX_BODY_LENGTH: 1024 * 1024,
} as const;
