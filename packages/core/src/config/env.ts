import { ConfigurationError } from '../errors/gateway-error.js';
import {
  DEFAULT_OPERATION_CLASSES,
  validateGovernanceConfig,
  type GovernanceConfig,
  type GovernanceConfigInput,
} from './governance-config.js';
import { parseRate } from './parse-rate.js';

const RATE_ENV_PREFIX = 'TOKENGATE_RATE_';
const DAY_MS = 86_400_000;

/**
 * Overlays environment settings on `base` and validates the result.
 *
 * - `TOKENGATE_RATE_<CLASS>=10/hour` sets a class's limit and window,
 *   creating an unbilled class when it does not exist yet.
 * - `TOKENGATE_SHARE_TTL_DAYS` sets the default link lifetime; `0` disables
 *   expiry.
 * - `TOKENGATE_TOKEN_BYTES` sets the random bytes per token.
 */
export function loadGovernanceConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  base: GovernanceConfigInput = {},
): GovernanceConfig {
  const operationClasses = {
    ...(base.operationClasses ?? DEFAULT_OPERATION_CLASSES),
  };

  for (const [name, value] of Object.entries(env)) {
    if (!name.startsWith(RATE_ENV_PREFIX) || value === undefined) continue;
    const operationClass = name.slice(RATE_ENV_PREFIX.length).toLowerCase();
    operationClasses[operationClass] = {
      ...operationClasses[operationClass],
      ...parseRate(value),
    };
  }

  const share = { ...base.share };
  const ttlDays = env['TOKENGATE_SHARE_TTL_DAYS'];
  if (ttlDays !== undefined) {
    const days = parseNumber('TOKENGATE_SHARE_TTL_DAYS', ttlDays);
    share.defaultTtlMs = days === 0 ? null : Math.round(days * DAY_MS);
  }
  const tokenBytes = env['TOKENGATE_TOKEN_BYTES'];
  if (tokenBytes !== undefined) {
    share.tokenBytes = parseNumber('TOKENGATE_TOKEN_BYTES', tokenBytes);
  }

  return validateGovernanceConfig({ ...base, operationClasses, share });
}

function parseNumber(name: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative number`);
  }
  return value;
}
