/**
 * Table codec constants
 */

/**
 * Cell strings decoded as NA unless the caller adds more
 */
export const DEFAULT_NA_VALUES: readonly string[] = [""];

/**
 * Name given to a column whose header cell is blank
 */
export const UNNAMED_COLUMN_PREFIX = "Unnamed: ";

/**
 * Decimal number as a cell string: 12, -3.5, .5, 1e6
 */
export const NUMERIC_CELL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
