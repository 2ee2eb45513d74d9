import dotenv from 'dotenv';
dotenv.config();

import logger from '../utils/logger';
import { PFLINE_CONFIG } from './constants';

/**
 * How unit-less numbers under a dimension tag are treated at construction:
 * 'reject' raises AmbiguousDimensionError, 'canonical' reads them in the canonical unit.
 */
export type BareNumberPolicy = 'reject' | 'canonical';

export type DefaultConfig = {
  LOG_LEVEL: string;
  RTOL: number;
  ATOL: number;
  STRICT_SHAPES: boolean;
  BARE_NUMBERS: BareNumberPolicy;
};

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    logger.warn(`[CONFIG] ${name}=${raw} is not a non-negative number; using ${fallback}`);
    return fallback;
  }
  return value;
}

function readBoolean(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  logger.warn(`[CONFIG] ${name}=${raw} is not a boolean; using ${fallback}`);
  return fallback;
}

function readBareNumbers(): BareNumberPolicy {
  const raw = process.env.PFL_BARE_NUMBERS;
  if (raw === undefined || raw === '' || raw === 'reject') return 'reject';
  if (raw === 'canonical') return 'canonical';
  logger.warn(`[CONFIG] PFL_BARE_NUMBERS=${raw} must be 'reject' or 'canonical'; using 'reject'`);
  return 'reject';
}

export const DEFAULT_CONFIG: DefaultConfig = {
  LOG_LEVEL: process.env.PFL_LOG_LEVEL || 'info',
  RTOL: readNumber('PFL_RTOL', PFLINE_CONFIG.RTOL),
  ATOL: readNumber('PFL_ATOL', PFLINE_CONFIG.ATOL),
  STRICT_SHAPES: readBoolean('PFL_STRICT_SHAPES', false),
  BARE_NUMBERS: readBareNumbers(),
};

/**
 * Create a custom config with overrides
 */
export function createConfig(overrides: Partial<DefaultConfig>): DefaultConfig {
  return {
    ...DEFAULT_CONFIG,
    ...overrides,
  };
}
