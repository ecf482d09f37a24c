import { splitList } from '../boundaries/config-loader';
import type { Config } from '../schemas/config-schemas';
import type { EnvConfig } from '../schemas/env-schemas';
import type { InvestorProfile } from './types';

export interface InvestorOverrides {
  investorName?: string | undefined;
  focusAreas?: string | undefined;
  stage?: string | undefined;
}

/**
 * Command-line flags win over the [investor] config section, which wins
 * over the INVESTOR_* environment variables.
 */
export function resolveInvestorProfile(
  overrides: InvestorOverrides,
  config: Pick<Config, 'investor'>,
  env: Pick<EnvConfig, 'INVESTOR_NAME' | 'INVESTOR_FOCUS_AREAS' | 'INVESTMENT_STAGE'>
): InvestorProfile {
  return {
    name: overrides.investorName ?? config.investor.name ?? env.INVESTOR_NAME,
    focusAreas: overrides.focusAreas !== undefined
      ? splitList(overrides.focusAreas)
      : config.investor.focusAreas ?? splitList(env.INVESTOR_FOCUS_AREAS),
    investmentStage: overrides.stage ?? config.investor.stage ?? env.INVESTMENT_STAGE,
  };
}
