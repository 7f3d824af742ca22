export interface ConfigTemplateAnswers {
  engineCommand?: string | null;
  engineArgs?: string[];
  timeoutMs?: number;
  batchSize?: number;
}

export interface WorkspaceConfig {
  engine: {
    command: string | null;
    args: string[];
    timeout_ms: number;
  };
  sampling: {
    default_batch_size: number;
    seed: number | null;
  };
  storage: {
    campaigns_dir: string;
  };
}

export const DEFAULT_CONFIG: WorkspaceConfig = {
  engine: {
    command: null,
    args: [],
    timeout_ms: 120_000,
  },
  sampling: {
    default_batch_size: 4,
    seed: null,
  },
  storage: {
    campaigns_dir: 'campaigns',
  },
};

export type SettingsValue = string | number | boolean | null | SettingsValue[] | { [key: string]: SettingsValue };

/**
 * Surrogate and acquisition settings handed to the engine untouched.
 * The kernel is an additive dot-product + rational-quadratic + Matern(ν=1.5) composite.
 */
export const DEFAULT_CAMPAIGN_SETTINGS: { [key: string]: SettingsValue } = {
  surrogate: {
    type: 'gaussian_process',
    kernel: {
      type: 'additive',
      components: [
        { type: 'dot_product', sigma: 0.01 },
        { type: 'rational_quadratic', lengthscale_initial_value: 0.01 },
        { type: 'matern', lengthscale_initial_value: 0.1, nu: 1.5 },
      ],
    },
  },
  acquisition: {
    function: 'qLogEI',
  },
  initial_recommender: 'random',
};

export function configTemplate(answers: ConfigTemplateAnswers = {}): string {
  return JSON.stringify({
    engine: {
      command: answers.engineCommand ?? DEFAULT_CONFIG.engine.command,
      args: answers.engineArgs ?? DEFAULT_CONFIG.engine.args,
      timeout_ms: answers.timeoutMs ?? DEFAULT_CONFIG.engine.timeout_ms,
    },
    sampling: {
      default_batch_size: answers.batchSize ?? DEFAULT_CONFIG.sampling.default_batch_size,
      seed: DEFAULT_CONFIG.sampling.seed,
    },
    storage: {
      campaigns_dir: DEFAULT_CONFIG.storage.campaigns_dir,
    },
  }, null, 2);
}
