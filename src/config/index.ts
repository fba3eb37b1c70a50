import dotenv from 'dotenv';
import {
  DEFAULT_COLUMN_SWAP,
  DEFAULT_ELEMENT_UPDATE,
  DEFAULT_FIELD_WIDTH,
  DEFAULT_ROW_SWAP,
  MAX_FIELD_WIDTH,
} from '../constants';
import { MatrixConfig } from '../types';

dotenv.config();

function getEnvVarWithDefault(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

function parseIntegerList(name: string, raw: string, count: number): number[] {
  const parts = raw.split(',').map((part) => part.trim());
  if (parts.length !== count || parts.some((part) => !/^[+-]?\d+$/.test(part))) {
    throw new Error(`Invalid ${name} format. Must be ${count} comma-separated integers`);
  }
  return parts.map((part) => parseInt(part, 10));
}

function parsePair(name: string, defaultValue: string): [number, number] {
  const [first, second] = parseIntegerList(
    name,
    getEnvVarWithDefault(name, defaultValue),
    2
  );
  return [first, second];
}

export function loadConfig(): MatrixConfig {
  const [row, col, value] = parseIntegerList(
    'ELEMENT_UPDATE',
    getEnvVarWithDefault('ELEMENT_UPDATE', DEFAULT_ELEMENT_UPDATE),
    3
  );

  const config: MatrixConfig = {
    inputFile: process.env.MATRIX_INPUT_FILE || undefined,
    fieldWidth: parseInt(
      getEnvVarWithDefault('MATRIX_FIELD_WIDTH', String(DEFAULT_FIELD_WIDTH)),
      10
    ),
    rowSwap: parsePair('ROW_SWAP', DEFAULT_ROW_SWAP),
    columnSwap: parsePair('COLUMN_SWAP', DEFAULT_COLUMN_SWAP),
    elementUpdate: { row, col, value },
  };

  return config;
}

export function validateConfig(config: MatrixConfig): void {
  if (
    !Number.isInteger(config.fieldWidth) ||
    config.fieldWidth < 1 ||
    config.fieldWidth > MAX_FIELD_WIDTH
  ) {
    throw new Error(`MATRIX_FIELD_WIDTH must be between 1 and ${MAX_FIELD_WIDTH}`);
  }

  if (!Number.isSafeInteger(config.elementUpdate.value)) {
    throw new Error('ELEMENT_UPDATE value must be a safe integer');
  }
}
