/**
 * COBS constants.
 *
 * @module cobsr-codec/constants
 */

/**
 * Frame delimiter. Never present in encoded output.
 */
export const FRAME_DELIMITER = 0x00

/**
 * Largest length code. Marks a full run with no implied zero after it.
 */
export const MAX_CODE = 0xFF

/**
 * Number of data bytes in a full run
 */
export const MAX_RUN_LENGTH = MAX_CODE - 1

/**
 * Largest length the size calculators report. They saturate here.
 */
export const MAX_SIZE = Number.MAX_SAFE_INTEGER

/**
 * Capacity of the lazy encoders' hold buffer
 */
export const HOLD_BUF_SIZE = 255
