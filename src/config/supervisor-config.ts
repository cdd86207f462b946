/**
 * Supervisor Configuration
 *
 * Responsible for:
 * - Applying default values
 * - Reading environment overrides (TESTRUNNER_*)
 * - Validating overrides against allowed ranges
 *
 * Command line flags always take precedence over anything resolved here.
 */

import { ErrorCode } from '../errors/error-codes';
import { ConfigurationError } from '../errors/supervisor-error';

/**
 * Resolved supervisor configuration
 */
export interface SupervisorConfig {
  /** Prefix of every lifecycle marker line */
  logPrefix: string;
  /** Category tag written in the begin marker */
  childKind: string;
  /** Fraction of the timeout treated as "dangerously close" */
  warningMarginRatio: number;
  /** Timeout applied when --timeout is not given */
  defaultTimeoutSeconds?: number;
  /** Verbose mode when --verbose is not given */
  verbose: boolean;
}

/**
 * Environment variable names
 */
export const ENV_TIMEOUT = 'TESTRUNNER_TIMEOUT';
export const ENV_VERBOSE = 'TESTRUNNER_VERBOSE';
export const ENV_WARNING_MARGIN = 'TESTRUNNER_WARNING_MARGIN';

/**
 * A child finishing within the last 20% of its allowed time triggers the
 * "dangerously close" warning.
 */
export const WARNING_MARGIN_RATIO = 0.2;

/**
 * Default configuration values
 */
export const DEFAULTS: Readonly<SupervisorConfig> = Object.freeze({
  logPrefix: 'testrunner',
  childKind: 'exec',
  warningMarginRatio: WARNING_MARGIN_RATIO,
  verbose: false,
});

/**
 * Validation ranges (exclusive bounds)
 */
const RANGES = {
  warningMarginRatio: { min: 0, max: 1 },
  defaultTimeoutSeconds: { min: 0, max: Number.MAX_SAFE_INTEGER },
};

type Environment = Record<string, string | undefined>;

function parseBoolean(name: string, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (value === '1' || value === 'true' || value === 'yes' || value === 'on') {
    return true;
  }
  if (value === '0' || value === 'false' || value === 'no' || value === 'off' || value === '') {
    return false;
  }
  throw new ConfigurationError(
    ErrorCode.E203_INVALID_ENVIRONMENT_VALUE,
    `${name}=${raw} (expected 1/0, true/false, yes/no, on/off)`,
    { name, value: raw }
  );
}

function parseRanged(name: string, raw: string, range: { min: number; max: number }): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value) || value <= range.min || value >= range.max) {
    throw new ConfigurationError(
      ErrorCode.E203_INVALID_ENVIRONMENT_VALUE,
      `${name}=${raw} (expected a number greater than ${range.min}${
        range.max === Number.MAX_SAFE_INTEGER ? '' : ` and less than ${range.max}`
      })`,
      { name, value: raw }
    );
  }
  return value;
}

/**
 * Load configuration from the given environment
 * @throws ConfigurationError if an override is invalid
 */
export function loadSupervisorConfig(env: Environment = process.env): Readonly<SupervisorConfig> {
  const config: SupervisorConfig = { ...DEFAULTS };

  const timeout = env[ENV_TIMEOUT];
  if (timeout !== undefined && timeout !== '') {
    config.defaultTimeoutSeconds = parseRanged(ENV_TIMEOUT, timeout, RANGES.defaultTimeoutSeconds);
  }

  const verbose = env[ENV_VERBOSE];
  if (verbose !== undefined) {
    config.verbose = parseBoolean(ENV_VERBOSE, verbose);
  }

  const margin = env[ENV_WARNING_MARGIN];
  if (margin !== undefined && margin !== '') {
    config.warningMarginRatio = parseRanged(ENV_WARNING_MARGIN, margin, RANGES.warningMarginRatio);
  }

  return Object.freeze(config);
}
