import type { CommonOptions } from '../schemas/cli-schemas';

export enum OutputFormat {
  Line = 'line',
  Json = 'json',
}

export type RuntimeOptions = Pick<CommonOptions,
  'verbose' | 'showPrompt' | 'showPromptTrunc' | 'debugJson' | 'format' | 'config' | 'investorName' | 'focusAreas' | 'stage'>;
