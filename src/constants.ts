import BN from "bn.js";

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;

export const TWO_POW_31 = new BN(2).pow(new BN(31));
export const TWO_POW_32 = new BN(2).pow(new BN(32));

export const DEFAULT_FIELD_WIDTH = 6;
export const MAX_FIELD_WIDTH = 32;

export const EMPTY_MATRIX_PLACEHOLDER = "[Empty Matrix]";

export const DEFAULT_ROW_SWAP = "0,1";
export const DEFAULT_COLUMN_SWAP = "1,2";
export const DEFAULT_ELEMENT_UPDATE = "2,2,99";
