import Conf from 'conf';
import { AppConfig, Credentials, DEFAULT_CONFIG } from './types';
import { LANGUAGE_CODES } from './languages';
import { maskSecret } from './errors';

const schema = {
  hotkey: {
    type: 'string' as const,
    minLength: 1,
  },
  cancelKey: {
    type: 'string' as const,
  },
  language: {
    type: 'string' as const,
    enum: [...LANGUAGE_CODES],
  },
  silenceThresholdDb: {
    type: 'number' as const,
    minimum: -60,
    maximum: -10,
  },
  minSilenceMs: {
    type: 'number' as const,
    minimum: 0,
  },
  minSpeechMs: {
    type: 'number' as const,
    minimum: 0,
  },
  postProcessPrompt: {
    type: 'string' as const,
  },
  insertionMode: {
    type: 'string' as const,
    enum: ['paste', 'type'],
  },
  restoreClipboard: {
    type: 'boolean' as const,
  },
  deepgramModel: {
    type: 'string' as const,
  },
  llmModel: {
    type: 'string' as const,
  },
  transcriptionTimeoutMs: {
    type: 'number' as const,
    minimum: 0,
  },
  postProcessTimeoutMs: {
    type: 'number' as const,
    minimum: 0,
  },
};

export interface ConfigStoreOptions {
  /** Directory holding config.json. Defaults to the OS config dir for the project. */
  cwd?: string;
  /** Reload when config.json is edited by hand. */
  watch?: boolean;
}

export class ConfigStore {
  private store: Conf<AppConfig>;

  constructor(options: ConfigStoreOptions = {}) {
    this.store = new Conf<AppConfig>({
      projectName: 'holdtalk',
      cwd: options.cwd,
      schema,
      defaults: DEFAULT_CONFIG,
      watch: options.watch ?? false,
    });
  }

  get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.store.get(key);
  }

  set<K extends keyof AppConfig>(key: K, value: AppConfig[K]): void {
    this.store.set(key, value);
  }

  getAll(): AppConfig {
    return { ...DEFAULT_CONFIG, ...this.store.store };
  }

  onChange<K extends keyof AppConfig>(key: K, callback: (value: AppConfig[K]) => void): () => void {
    return this.store.onDidChange(key, (value) => {
      if (value !== undefined) {
        callback(value);
      }
    });
  }

  reset(): void {
    this.store.clear();
  }

  get path(): string {
    return this.store.path;
  }
}

export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const dir = env.HOLDTALK_CONFIG_DIR?.trim();
  return dir ? dir : undefined;
}

/** Read once at startup; a missing key surfaces as AuthError on first use. */
export function loadCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  return {
    deepgramApiKey: env.DEEPGRAM_API_KEY?.trim() || undefined,
    openaiApiKey: env.OPENAI_API_KEY?.trim() || undefined,
  };
}

export function describeConfig(config: AppConfig, credentials: Credentials): Record<string, unknown> {
  return {
    ...config,
    deepgramApiKey: maskSecret(credentials.deepgramApiKey),
    openaiApiKey: maskSecret(credentials.openaiApiKey),
  };
}
