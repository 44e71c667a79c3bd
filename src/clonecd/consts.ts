/**
 * Byte layout of a raw CloneCD sector record
 */
export const SECTOR_LAYOUT = {
  SECTOR_SIZE: 2352,
  SYNC_OFFSET: 0,
  SYNC_SIZE: 12,
  ADDRESS_MINUTE_OFFSET: 12,
  ADDRESS_SECOND_OFFSET: 13,
  ADDRESS_FRAME_OFFSET: 14,
  MODE_OFFSET: 15,
  HEADER_SIZE: 16,
  CONTENT_SIZE: 2336,
  PAYLOAD_SIZE: 2048,
  EDC_SIZE: 4,
  ECC_SIZE: 276,
} as const;

/**
 * Mode 1 content: data, EDC, 8 reserved bytes, ECC
 */
export const MODE1_LAYOUT = {
  DATA_OFFSET: SECTOR_LAYOUT.HEADER_SIZE,
  EDC_OFFSET: SECTOR_LAYOUT.HEADER_SIZE + SECTOR_LAYOUT.PAYLOAD_SIZE,
  RESERVED_OFFSET:
    SECTOR_LAYOUT.HEADER_SIZE + SECTOR_LAYOUT.PAYLOAD_SIZE + SECTOR_LAYOUT.EDC_SIZE,
  RESERVED_SIZE: 8,
  ECC_OFFSET: SECTOR_LAYOUT.SECTOR_SIZE - SECTOR_LAYOUT.ECC_SIZE,
} as const;

/**
 * Mode 2 content: 8-byte subheader, data, EDC, ECC
 */
export const MODE2_LAYOUT = {
  SUBHEADER_OFFSET: SECTOR_LAYOUT.HEADER_SIZE,
  SUBHEADER_SIZE: 8,
  DATA_OFFSET: SECTOR_LAYOUT.HEADER_SIZE + 8,
  EDC_OFFSET: SECTOR_LAYOUT.HEADER_SIZE + 8 + SECTOR_LAYOUT.PAYLOAD_SIZE,
  ECC_OFFSET: SECTOR_LAYOUT.SECTOR_SIZE - SECTOR_LAYOUT.ECC_SIZE,
} as const;

/**
 * Values of the header mode byte that the converter recognizes
 */
export const SECTOR_MODES = {
  MODE1: 0x01,
  MODE2: 0x02,
  SESSION_MARKER: 0xe2,
} as const;
